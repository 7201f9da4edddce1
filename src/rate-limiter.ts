/**
 * Rate Limiter - hourly invocation quota
 *
 * The bucket is the local calendar hour (YYYYMMDDHH), not a sliding window:
 * a call at 10:59 and another at 11:01 land in different buckets. The
 * counter resets whenever the hour key changes. A missing or corrupt state
 * document is recreated with zero usage.
 */

import { hourKey, nextHour, formatCountdown, systemClock, type Clock } from "./clock.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { isRecord, nonNegativeInt } from "./json.js";
import { STATE_FILES, type StateStore } from "./state.js";

export interface RateLimitState {
  maxCallsPerHour: number;
  currentCalls: number;
  hourKey: string;
  lastReset: string;
  totalCallsSession: number;
  rateLimitHits: number;
}

export interface RateLimiterOptions {
  clock?: Clock;
  logger?: Logger;
  /** Where the countdown is drawn; defaults to stdout */
  output?: { write(text: string): unknown };
}

function normalizeRateLimitState(raw: unknown): Omit<RateLimitState, "maxCallsPerHour"> | null {
  if (!isRecord(raw)) return null;

  const currentCalls = nonNegativeInt(raw.currentCalls);
  const totalCallsSession = nonNegativeInt(raw.totalCallsSession);
  const rateLimitHits = nonNegativeInt(raw.rateLimitHits);
  if (
    currentCalls === null ||
    totalCallsSession === null ||
    rateLimitHits === null ||
    typeof raw.hourKey !== "string" ||
    typeof raw.lastReset !== "string"
  ) {
    return null;
  }

  return {
    currentCalls,
    hourKey: raw.hourKey,
    lastReset: raw.lastReset,
    totalCallsSession,
    rateLimitHits,
  };
}

export class RateLimiter {
  private clock: Clock;
  private logger: Logger;
  private output: { write(text: string): unknown };

  constructor(
    private readonly store: StateStore,
    private readonly maxCallsPerHour: number,
    options: RateLimiterOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new ConsoleLogger();
    this.output = options.output ?? process.stdout;
  }

  /**
   * Current state, rolled over to the current hour if needed
   */
  getState(): RateLimitState {
    const now = this.clock.now();
    const currentKey = hourKey(now);
    const stored = this.store.readJson(STATE_FILES.rateLimit, normalizeRateLimitState);

    if (!stored) {
      return this.save(this.freshState(now));
    }

    let state: RateLimitState = { ...stored, maxCallsPerHour: this.maxCallsPerHour };
    if (state.hourKey !== currentKey) {
      this.logger.debug(`Rate limiter reset for new hour: ${currentKey}`);
      state = { ...state, currentCalls: 0, hourKey: currentKey, lastReset: now.toISOString() };
      this.save(state);
    }
    return state;
  }

  canInvoke(): boolean {
    const state = this.getState();
    if (state.currentCalls >= state.maxCallsPerHour) {
      this.logger.warn(
        `Rate limit reached: ${state.currentCalls}/${state.maxCallsPerHour} calls this hour`
      );
      return false;
    }
    return true;
  }

  /**
   * Counts one invocation against the current hour. Returns the new count.
   */
  recordInvocation(): number {
    const state = this.getState();
    const next = this.save({
      ...state,
      currentCalls: state.currentCalls + 1,
      totalCallsSession: state.totalCallsSession + 1,
    });
    return next.currentCalls;
  }

  callsThisHour(): number {
    return this.getState().currentCalls;
  }

  remainingCalls(): number {
    const state = this.getState();
    return Math.max(0, state.maxCallsPerHour - state.currentCalls);
  }

  /**
   * Notes that the agent itself reported a provider-side rate limit
   */
  recordRateLimitHit(): void {
    const state = this.getState();
    this.save({ ...state, rateLimitHits: state.rateLimitHits + 1 });
    this.logger.warn("Rate limit hit recorded");
  }

  nextResetTime(): Date {
    return nextHour(this.clock.now());
  }

  /**
   * Blocks until the next calendar hour, drawing a countdown, then zeroes
   * the counter. Only a process signal interrupts the wait.
   */
  async waitForReset(): Promise<void> {
    const state = this.getState();
    const target = this.nextResetTime();
    this.logger.warn(
      `Rate limit reached (${state.currentCalls}/${state.maxCallsPerHour}). Waiting until ${target.toLocaleTimeString()}...`
    );

    while (true) {
      const remainingMs = target.getTime() - this.clock.now().getTime();
      if (remainingMs <= 0) break;
      this.output.write(`\r⏳ Time until reset: ${formatCountdown(Math.ceil(remainingMs / 1000))}`);
      await this.clock.sleep(Math.min(1000, remainingMs));
    }
    this.output.write("\n");

    const now = this.clock.now();
    const current = this.getState();
    this.save({ ...current, currentCalls: 0, hourKey: hourKey(now), lastReset: now.toISOString() });
    this.logger.log("✅ Rate limit reset! Ready for new calls.");
  }

  /**
   * Operator reset: zeroes all counters
   */
  reset(): void {
    this.save(this.freshState(this.clock.now()));
    this.logger.log("Rate limiter reset");
  }

  private freshState(now: Date): RateLimitState {
    return {
      maxCallsPerHour: this.maxCallsPerHour,
      currentCalls: 0,
      hourKey: hourKey(now),
      lastReset: now.toISOString(),
      totalCallsSession: 0,
      rateLimitHits: 0,
    };
  }

  private save(state: RateLimitState): RateLimitState {
    this.store.writeJson(STATE_FILES.rateLimit, state);
    return state;
  }
}
