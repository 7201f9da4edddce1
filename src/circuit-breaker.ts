/**
 * Circuit Breaker - stagnation detector
 *
 * Watches invocation outcomes and halts the run when the agent keeps
 * looping without changing anything, or keeps failing. Two counters drive it:
 * consecutive failures (reset by any error-free outcome) and consecutive
 * no-progress loops (reset by any outcome that changed files).
 *
 *   CLOSED ──2 idle loops──▶ HALF_OPEN ──progress──▶ CLOSED
 *      │                        │
 *      └──── either ceiling ────┴──────────────────▶ OPEN
 *
 * OPEN never heals by itself; only reset() closes it.
 */

import { ConsoleLogger, type Logger } from "./logger.js";
import { isRecord, nonNegativeInt, stringOrNull } from "./json.js";
import { RingBuffer } from "./ring-buffer.js";
import { STATE_FILES, type StateStore } from "./state.js";

export type CircuitState = "CLOSED" | "HALF_OPEN" | "OPEN";

/** Consecutive no-progress loops that move CLOSED to HALF_OPEN */
const HALF_OPEN_AFTER = 2;
const OUTCOME_HISTORY = 10;

export interface InvocationOutcome {
  loop: number;
  filesChanged: number;
  hadError: boolean;
  outputLength: number;
  timestamp: string;
}

export interface CircuitBreakerState {
  state: CircuitState;
  lastChange: string;
  consecutiveNoProgress: number;
  consecutiveFailures: number;
  lastProgressLoop: number;
  totalOpens: number;
  reason: string | null;
  currentLoop: number;
  recentOutcomes: InvocationOutcome[];
}

export interface CircuitTransition {
  timestamp: string;
  loop: number;
  fromState: CircuitState;
  toState: CircuitState;
  reason: string;
}

export interface CircuitBreakerThresholds {
  noProgressThreshold: number;
  sameErrorThreshold: number;
}

function isCircuitState(value: unknown): value is CircuitState {
  return value === "CLOSED" || value === "HALF_OPEN" || value === "OPEN";
}

function normalizeOutcome(raw: unknown): InvocationOutcome | null {
  if (!isRecord(raw)) return null;
  const loop = nonNegativeInt(raw.loop);
  const filesChanged = nonNegativeInt(raw.filesChanged);
  const outputLength = nonNegativeInt(raw.outputLength);
  if (loop === null || filesChanged === null || outputLength === null || typeof raw.hadError !== "boolean") {
    return null;
  }
  return {
    loop,
    filesChanged,
    hadError: raw.hadError,
    outputLength,
    timestamp: stringOrNull(raw.timestamp) ?? "",
  };
}

function normalizeCircuitState(raw: unknown): CircuitBreakerState | null {
  if (!isRecord(raw) || !isCircuitState(raw.state)) return null;

  const consecutiveNoProgress = nonNegativeInt(raw.consecutiveNoProgress);
  const consecutiveFailures = nonNegativeInt(raw.consecutiveFailures);
  if (consecutiveNoProgress === null || consecutiveFailures === null) return null;

  const outcomes = Array.isArray(raw.recentOutcomes) ? raw.recentOutcomes : [];
  return {
    state: raw.state,
    lastChange: stringOrNull(raw.lastChange) ?? new Date().toISOString(),
    consecutiveNoProgress,
    consecutiveFailures,
    lastProgressLoop: nonNegativeInt(raw.lastProgressLoop) ?? 0,
    totalOpens: nonNegativeInt(raw.totalOpens) ?? 0,
    reason: stringOrNull(raw.reason),
    currentLoop: nonNegativeInt(raw.currentLoop) ?? 0,
    recentOutcomes: outcomes
      .map(normalizeOutcome)
      .filter((outcome): outcome is InvocationOutcome => outcome !== null),
  };
}

function normalizeHistory(raw: unknown): CircuitTransition[] | null {
  if (!Array.isArray(raw)) return null;
  const transitions: CircuitTransition[] = [];
  for (const entry of raw) {
    if (
      isRecord(entry) &&
      isCircuitState(entry.fromState) &&
      isCircuitState(entry.toState) &&
      typeof entry.timestamp === "string" &&
      typeof entry.reason === "string"
    ) {
      transitions.push({
        timestamp: entry.timestamp,
        loop: nonNegativeInt(entry.loop) ?? 0,
        fromState: entry.fromState,
        toState: entry.toState,
        reason: entry.reason,
      });
    }
  }
  return transitions;
}

export class CircuitBreaker {
  private logger: Logger;

  constructor(
    private readonly store: StateStore,
    private readonly thresholds: CircuitBreakerThresholds,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger();
  }

  getState(): CircuitBreakerState {
    const stored = this.store.readJson(STATE_FILES.circuitBreaker, normalizeCircuitState);
    if (stored) {
      return stored;
    }
    const fresh = this.closedState(0, null);
    this.store.writeJson(STATE_FILES.circuitBreaker, fresh);
    return fresh;
  }

  getHistory(): CircuitTransition[] {
    return this.store.readJson(STATE_FILES.circuitHistory, normalizeHistory) ?? [];
  }

  shouldHalt(): boolean {
    return this.getState().state === "OPEN";
  }

  /**
   * Feeds one invocation outcome to the breaker.
   * Returns true when the breaker is open afterwards.
   */
  recordOutcome(
    loopNumber: number,
    filesChanged: number,
    hadError: boolean,
    outputLength: number
  ): boolean {
    const current = this.getState();
    const now = new Date().toISOString();

    const hasProgress = filesChanged > 0;
    const consecutiveNoProgress = hasProgress ? 0 : current.consecutiveNoProgress + 1;
    const consecutiveFailures = hadError ? current.consecutiveFailures + 1 : 0;

    const outcomes = new RingBuffer<InvocationOutcome>(OUTCOME_HISTORY, current.recentOutcomes);
    outcomes.push({ loop: loopNumber, filesChanged, hadError, outputLength, timestamp: now });

    let nextState = current.state;
    let reason = current.reason;

    if (current.state !== "OPEN") {
      if (consecutiveNoProgress >= this.thresholds.noProgressThreshold) {
        nextState = "OPEN";
        reason = `No progress detected in ${consecutiveNoProgress} consecutive loops`;
      } else if (consecutiveFailures >= this.thresholds.sameErrorThreshold) {
        nextState = "OPEN";
        reason = `Errors in ${consecutiveFailures} consecutive loops`;
      } else if (current.state === "CLOSED" && consecutiveNoProgress >= HALF_OPEN_AFTER) {
        nextState = "HALF_OPEN";
        reason = `Monitoring: ${consecutiveNoProgress} loops without progress`;
      } else if (current.state === "HALF_OPEN" && hasProgress) {
        nextState = "CLOSED";
        reason = "Progress detected, circuit recovered";
      }
    }

    const changed = nextState !== current.state;
    const next: CircuitBreakerState = {
      state: nextState,
      lastChange: changed ? now : current.lastChange,
      consecutiveNoProgress,
      consecutiveFailures,
      lastProgressLoop: hasProgress ? loopNumber : current.lastProgressLoop,
      totalOpens: changed && nextState === "OPEN" ? current.totalOpens + 1 : current.totalOpens,
      reason,
      currentLoop: loopNumber,
      recentOutcomes: outcomes.toArray(),
    };
    this.store.writeJson(STATE_FILES.circuitBreaker, next);

    if (changed) {
      this.logTransition(current.state, nextState, reason ?? "", loopNumber);
    }

    return nextState === "OPEN";
  }

  /**
   * Operator reset: closes the breaker and clears the counters
   */
  reset(reason: string = "Manual reset"): void {
    const current = this.getState();
    this.store.writeJson(STATE_FILES.circuitBreaker, this.closedState(current.totalOpens, reason));
    if (current.state !== "CLOSED") {
      this.logTransition(current.state, "CLOSED", reason, current.currentLoop);
    }
    this.logger.log(`✅ Circuit breaker reset to CLOSED (${reason})`);
  }

  /**
   * Clears the counters at the start of a sprint. An open breaker stays
   * open: stagnation needs an operator reset.
   */
  resetForNewSprint(sprint: number): void {
    const current = this.getState();
    if (current.state === "OPEN") {
      this.logger.debug(`Circuit breaker still open at start of sprint ${sprint}`);
      return;
    }
    const reason = `Sprint ${sprint} started`;
    this.store.writeJson(STATE_FILES.circuitBreaker, this.closedState(current.totalOpens, reason));
    if (current.state === "HALF_OPEN") {
      this.logTransition(current.state, "CLOSED", reason, current.currentLoop);
    }
  }

  private closedState(totalOpens: number, reason: string | null): CircuitBreakerState {
    return {
      state: "CLOSED",
      lastChange: new Date().toISOString(),
      consecutiveNoProgress: 0,
      consecutiveFailures: 0,
      lastProgressLoop: 0,
      totalOpens,
      reason,
      currentLoop: 0,
      recentOutcomes: [],
    };
  }

  private logTransition(
    fromState: CircuitState,
    toState: CircuitState,
    reason: string,
    loop: number
  ): void {
    const history = this.getHistory();
    history.push({ timestamp: new Date().toISOString(), loop, fromState, toState, reason });
    this.store.writeJson(STATE_FILES.circuitHistory, history);

    switch (toState) {
      case "OPEN":
        this.logger.error(`🚨 CIRCUIT BREAKER OPENED: ${reason}`);
        break;
      case "HALF_OPEN":
        this.logger.warn(`⚠️  Circuit breaker monitoring: ${reason}`);
        break;
      case "CLOSED":
        this.logger.log(`✅ Circuit breaker closed: ${reason}`);
        break;
    }
  }
}
