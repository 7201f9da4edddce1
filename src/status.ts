/**
 * Status snapshot (.cadence/status.json) and status gathering
 *
 * The snapshot is what calling automation reads instead of parsing logs:
 * every halting condition is written here before the process exits.
 * gatherStatus() is the single source for `cadence status`.
 */

import type { CircuitBreaker, CircuitBreakerState } from "./circuit-breaker.js";
import type { CompletionDetector, CompletionReport } from "./completion-detector.js";
import { systemClock, type Clock } from "./clock.js";
import { isRecord, nonNegativeInt, stringOrNull } from "./json.js";
import type { RateLimiter, RateLimitState } from "./rate-limiter.js";
import type { SprintStateManager } from "./sprint-state.js";
import { STATE_FILES, type LockInfo, type StateStore } from "./state.js";
import type { AgentStatus, SprintState } from "./types.js";
import { VERSION } from "./version.js";

export const RUN_STATUSES = [
  "starting",
  "executing",
  "waiting_rate_limit",
  "completed",
  "halted",
  "stopped",
  "interrupted",
  "failed",
] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export interface StatusSnapshot {
  version: string;
  timestamp: string;
  loopCount: number;
  currentSprint: number;
  currentPhase: string;
  callsMadeThisHour: number;
  maxCallsPerHour: number;
  status: RunStatus;
  exitReason: string | null;
  nextReset: string;
  agentStatus: AgentStatus | null;
}

export interface StatusUpdate {
  loopCount: number;
  sprint: number;
  phase: string;
  status: RunStatus;
  exitReason?: string | null;
  /** Replaces the stored agent status; omitted keeps the previous one */
  agentStatus?: AgentStatus;
}

function isRunStatus(value: unknown): value is RunStatus {
  return RUN_STATUSES.some((status) => status === value);
}

function normalizeAgentStatus(raw: unknown): AgentStatus | null {
  if (!isRecord(raw)) return null;
  const { testsStatus } = raw;
  if (testsStatus !== "PASSING" && testsStatus !== "FAILING" && testsStatus !== "NOT_RUN") return null;
  return {
    role: stringOrNull(raw.role) ?? "",
    phase: stringOrNull(raw.phase) ?? "",
    sprint: nonNegativeInt(raw.sprint) ?? 0,
    tasksCompleted: nonNegativeInt(raw.tasksCompleted) ?? 0,
    tasksRemaining: nonNegativeInt(raw.tasksRemaining) ?? 0,
    blockers: stringOrNull(raw.blockers) ?? "none",
    storyPointsDone: nonNegativeInt(raw.storyPointsDone) ?? 0,
    testsStatus,
    phaseComplete: raw.phaseComplete === true,
    projectDone: raw.projectDone === true,
    nextAction: stringOrNull(raw.nextAction) ?? "",
  };
}

function normalizeSnapshot(raw: unknown): StatusSnapshot | null {
  if (!isRecord(raw) || !isRunStatus(raw.status)) return null;
  return {
    version: stringOrNull(raw.version) ?? VERSION,
    timestamp: stringOrNull(raw.timestamp) ?? "",
    loopCount: nonNegativeInt(raw.loopCount) ?? 0,
    currentSprint: nonNegativeInt(raw.currentSprint) ?? 0,
    currentPhase: stringOrNull(raw.currentPhase) ?? "",
    callsMadeThisHour: nonNegativeInt(raw.callsMadeThisHour) ?? 0,
    maxCallsPerHour: nonNegativeInt(raw.maxCallsPerHour) ?? 0,
    status: raw.status,
    exitReason: stringOrNull(raw.exitReason),
    nextReset: stringOrNull(raw.nextReset) ?? "",
    agentStatus: normalizeAgentStatus(raw.agentStatus),
  };
}

export class StatusReporter {
  constructor(
    private readonly store: StateStore,
    private readonly rateLimiter: RateLimiter,
    private readonly clock: Clock = systemClock
  ) {}

  read(): StatusSnapshot | null {
    return this.store.readJson(STATE_FILES.status, normalizeSnapshot);
  }

  update(update: StatusUpdate): StatusSnapshot {
    const previous = this.read();
    const limits = this.rateLimiter.getState();
    const snapshot: StatusSnapshot = {
      version: VERSION,
      timestamp: this.clock.now().toISOString(),
      loopCount: update.loopCount,
      currentSprint: update.sprint,
      currentPhase: update.phase,
      callsMadeThisHour: limits.currentCalls,
      maxCallsPerHour: limits.maxCallsPerHour,
      status: update.status,
      exitReason: update.exitReason ?? null,
      nextReset: this.rateLimiter.nextResetTime().toISOString(),
      agentStatus: update.agentStatus ?? previous?.agentStatus ?? null,
    };
    this.store.writeJson(STATE_FILES.status, snapshot);
    return snapshot;
  }
}

// === `cadence status` ===

export interface StatusData {
  running: boolean;
  lock: LockInfo | null;
  sprint: SprintState;
  circuit: CircuitBreakerState;
  rateLimit: RateLimitState;
  completion: CompletionReport;
  snapshot: StatusSnapshot | null;
}

export function gatherStatus(deps: {
  store: StateStore;
  sprintState: SprintStateManager;
  circuitBreaker: CircuitBreaker;
  rateLimiter: RateLimiter;
  completion: CompletionDetector;
  reporter: StatusReporter;
}): StatusData {
  const lock = deps.store.getLockInfo();
  return {
    running: lock !== null,
    lock,
    sprint: deps.sprintState.getState(),
    circuit: deps.circuitBreaker.getState(),
    rateLimit: deps.rateLimiter.getState(),
    completion: deps.completion.describe(),
    snapshot: deps.reporter.read(),
  };
}

export function formatStatus(data: StatusData): string {
  const lines: string[] = [];
  const { sprint, circuit, rateLimit, completion, snapshot } = data;

  lines.push(data.running && data.lock ? `🟢 Running (PID ${data.lock.pid})` : "⚪ Not running");
  if (snapshot) {
    const reason = snapshot.exitReason ? ` (${snapshot.exitReason})` : "";
    lines.push(`   Last status: ${snapshot.status}${reason} at ${snapshot.timestamp}`);
  }
  lines.push("");

  lines.push(`📍 Sprint ${sprint.currentSprint}, phase ${sprint.currentPhase}`);
  lines.push(`   Phase loops: ${sprint.phaseLoopCount}, rework cycles: ${sprint.reworkCount}`);
  if (sprint.projectDone) lines.push("   Project marked done");
  lines.push("");

  const circuitIcon = circuit.state === "CLOSED" ? "✅" : circuit.state === "HALF_OPEN" ? "⚠️ " : "🚨";
  lines.push(`${circuitIcon} Circuit breaker: ${circuit.state}`);
  if (circuit.reason) lines.push(`   ${circuit.reason}`);
  lines.push(
    `   No progress: ${circuit.consecutiveNoProgress}, consecutive errors: ${circuit.consecutiveFailures}`
  );
  lines.push("");

  lines.push(`⏳ Rate limit: ${rateLimit.currentCalls}/${rateLimit.maxCallsPerHour} calls this hour`);
  lines.push(`   Session total: ${rateLimit.totalCallsSession}, provider limit hits: ${rateLimit.rateLimitHits}`);
  lines.push("");

  const { signals, thresholds } = completion;
  lines.push(`🏁 Completion: ${completion.projectComplete ? "project complete" : "work remaining"}`);
  lines.push(
    `   Done signals ${signals.doneSignals}/${thresholds.doneSignals}, ` +
      `idle loops ${signals.idleLoops}/${thresholds.idleLoops}, ` +
      `test-only ${signals.testOnlyLoops}/${thresholds.testOnlyLoops}, ` +
      `indicators ${signals.completionIndicators}/${thresholds.completionIndicators}`
  );
  if (completion.checklist.exists) {
    lines.push(`   Fix plan: ${completion.checklist.checked}/${completion.checklist.total} checked`);
  }
  if (completion.exitReason) {
    lines.push(`   Would exit now: ${completion.exitReason}`);
  }

  return lines.join("\n");
}
