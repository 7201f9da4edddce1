/**
 * Completion Detector - decides when the whole run should stop
 *
 * Hard signals come from ground truth: backlog.json and @fix_plan.md,
 * read fresh on every check. Soft signals come from agent output and are
 * kept in exit_signals.json as "most recent 10" lists. Soft signals only
 * count cumulatively, and never while the fix plan has unchecked items.
 *
 * Decision order (first match wins):
 *   1. backlog_complete       every task done/cancelled, nothing unreadable,
 *                             fix plan has no unchecked items
 *   2. fix_plan_complete      fix plan exists and every item is checked
 *   3. (unchecked items)      continue; soft signals suppressed
 *   4. done_signals           PROJECT_DONE claims
 *   5. idle_loops             invocations with no observable change
 *   6. test_saturation        invocations that only ran tests
 *   7. completion_indicators  "project is complete"-style phrases
 */

import { isBacklogComplete, loadBacklog } from "./backlog.js";
import { readChecklist, type ChecklistProgress } from "./checklist.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { isRecord, nonNegativeInt, stringOrNull } from "./json.js";
import { RingBuffer } from "./ring-buffer.js";
import { STATE_FILES, type StateStore } from "./state.js";
import type { CompletionConfig, StatusBlockResult } from "./types.js";

const SIGNAL_HISTORY = 10;

const TEST_ONLY_PATTERN = /(only.*test|ran.*tests|test.*pass|all.*tests.*passing)/i;
const IMPLEMENTATION_PATTERN = /(implement|creat|add|fix|updat|modif)/i;

export type ExitReason =
  | "backlog_complete"
  | "fix_plan_complete"
  | "done_signals"
  | "idle_loops"
  | "test_saturation"
  | "completion_indicators";

export interface SignalEntry {
  loop: number;
  detail: string;
  timestamp: string;
}

export interface ExitSignals {
  idleLoops: SignalEntry[];
  doneSignals: SignalEntry[];
  completionIndicators: SignalEntry[];
  testOnlyLoops: SignalEntry[];
}

type SignalKind = keyof ExitSignals;

export interface CompletionReport {
  signals: Record<SignalKind, number>;
  thresholds: Record<SignalKind, number>;
  backlogComplete: boolean;
  checklist: ChecklistProgress;
  projectComplete: boolean;
  exitReason: ExitReason | null;
}

function normalizeEntries(raw: unknown): SignalEntry[] {
  if (!Array.isArray(raw)) return [];
  const entries: SignalEntry[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const loop = nonNegativeInt(item.loop);
    if (loop === null) continue;
    entries.push({
      loop,
      detail: stringOrNull(item.detail) ?? "",
      timestamp: stringOrNull(item.timestamp) ?? "",
    });
  }
  return entries;
}

function normalizeSignals(raw: unknown): ExitSignals | null {
  if (!isRecord(raw)) return null;
  return {
    idleLoops: normalizeEntries(raw.idleLoops),
    doneSignals: normalizeEntries(raw.doneSignals),
    completionIndicators: normalizeEntries(raw.completionIndicators),
    testOnlyLoops: normalizeEntries(raw.testOnlyLoops),
  };
}

function emptySignals(): ExitSignals {
  return { idleLoops: [], doneSignals: [], completionIndicators: [], testOnlyLoops: [] };
}

export class CompletionDetector {
  private logger: Logger;

  constructor(
    private readonly store: StateStore,
    private readonly config: CompletionConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger();
  }

  getSignals(): ExitSignals {
    return this.store.readJson(STATE_FILES.exitSignals, normalizeSignals) ?? emptySignals();
  }

  /** Clears every soft signal; done at the start of each run */
  reset(): void {
    this.store.writeJson(STATE_FILES.exitSignals, emptySignals());
  }

  recordIdleLoop(loop: number, reason: string): void {
    this.record("idleLoops", loop, reason);
  }

  recordDoneSignal(loop: number, source: string): void {
    this.record("doneSignals", loop, source);
  }

  recordCompletionIndicator(loop: number, indicator: string): void {
    this.record("completionIndicators", loop, indicator);
  }

  recordTestOnlyLoop(loop: number): void {
    this.record("testOnlyLoops", loop, "test_only");
  }

  /**
   * Scans one invocation's output for soft signals
   */
  analyzeOutput(output: string, loop: number, block: StatusBlockResult): void {
    if (block.present && block.status.projectDone) {
      this.recordDoneSignal(loop, "status_block");
    }

    const lowered = output.toLowerCase();
    const indicator = this.config.indicators.find((phrase) => lowered.includes(phrase.toLowerCase()));
    if (indicator !== undefined) {
      this.recordCompletionIndicator(loop, indicator);
    }

    if (TEST_ONLY_PATTERN.test(output) && !IMPLEMENTATION_PATTERN.test(output)) {
      this.recordTestOnlyLoop(loop);
    }
  }

  /**
   * Returns the reason the run should stop now, or null to continue
   */
  shouldExitGracefully(): ExitReason | null {
    const checklist = readChecklist(this.store.fixPlanPath);

    if (this.backlogComplete() && checklist.unchecked === 0) {
      return "backlog_complete";
    }
    if (checklist.exists && checklist.total > 0 && checklist.checked === checklist.total) {
      return "fix_plan_complete";
    }
    if (checklist.unchecked > 0) {
      return null;
    }

    const signals = this.getSignals();
    if (signals.doneSignals.length >= this.config.doneSignalThreshold) {
      return "done_signals";
    }
    if (signals.idleLoops.length >= this.config.idleLoopThreshold) {
      return "idle_loops";
    }
    if (signals.testOnlyLoops.length >= this.config.testOnlyLoopThreshold) {
      return "test_saturation";
    }
    if (signals.completionIndicators.length >= this.config.completionIndicatorThreshold) {
      return "completion_indicators";
    }
    return null;
  }

  /**
   * Ground truth only: backlog resolved and no unchecked fix plan items
   */
  isProjectComplete(): boolean {
    return this.backlogComplete() && readChecklist(this.store.fixPlanPath).unchecked === 0;
  }

  describe(): CompletionReport {
    const signals = this.getSignals();
    return {
      signals: {
        idleLoops: signals.idleLoops.length,
        doneSignals: signals.doneSignals.length,
        completionIndicators: signals.completionIndicators.length,
        testOnlyLoops: signals.testOnlyLoops.length,
      },
      thresholds: {
        idleLoops: this.config.idleLoopThreshold,
        doneSignals: this.config.doneSignalThreshold,
        completionIndicators: this.config.completionIndicatorThreshold,
        testOnlyLoops: this.config.testOnlyLoopThreshold,
      },
      backlogComplete: this.backlogComplete(),
      checklist: readChecklist(this.store.fixPlanPath),
      projectComplete: this.isProjectComplete(),
      exitReason: this.shouldExitGracefully(),
    };
  }

  private backlogComplete(): boolean {
    return isBacklogComplete(loadBacklog(this.store.backlogPath, this.logger));
  }

  private record(kind: SignalKind, loop: number, detail: string): void {
    const signals = this.getSignals();
    const ring = new RingBuffer<SignalEntry>(SIGNAL_HISTORY, signals[kind]);
    ring.push({ loop, detail, timestamp: new Date().toISOString() });
    this.store.writeJson(STATE_FILES.exitSignals, { ...signals, [kind]: ring.toArray() });
    this.logger.debug(`Exit signal ${kind}: loop ${loop} (${detail})`);
  }
}
