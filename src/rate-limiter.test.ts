import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { RateLimiter } from "./rate-limiter.js";
import { ManualClock } from "./clock.js";
import { SilentLogger } from "./logger.js";
import { StateStore } from "./state.js";

describe("RateLimiter", () => {
  let testDir: string;
  let store: StateStore;
  let clock: ManualClock;
  let written: string[];

  function createLimiter(maxCallsPerHour: number): RateLimiter {
    return new RateLimiter(store, maxCallsPerHour, {
      clock,
      logger: new SilentLogger(),
      output: { write: (text: string) => written.push(text) },
    });
  }

  beforeEach(() => {
    testDir = join(tmpdir(), `cadence-rate-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
    store = new StateStore(testDir, new SilentLogger());
    clock = new ManualClock("2026-01-15T10:20:00");
    written = [];
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("starts with an empty bucket", () => {
    const limiter = createLimiter(100);

    expect(limiter.canInvoke()).toBe(true);
    expect(limiter.callsThisHour()).toBe(0);
    expect(limiter.remainingCalls()).toBe(100);
    expect(limiter.getState().hourKey).toBe("2026011510");
  });

  it("allows every call below the ceiling and refuses at it", () => {
    const limiter = createLimiter(5);

    for (let i = 0; i < 5; i++) {
      expect(limiter.canInvoke()).toBe(true);
      limiter.recordInvocation();
    }

    expect(limiter.canInvoke()).toBe(false);
    expect(limiter.remainingCalls()).toBe(0);
  });

  it("reopens the bucket when the clock hour rolls over", () => {
    const limiter = createLimiter(2);
    limiter.recordInvocation();
    limiter.recordInvocation();
    expect(limiter.canInvoke()).toBe(false);

    clock.advance(40 * 60 * 1000); // 10:20 -> 11:00

    expect(limiter.canInvoke()).toBe(true);
    expect(limiter.callsThisHour()).toBe(0);
    expect(limiter.getState().totalCallsSession).toBe(2);
  });

  it("treats calls two minutes apart across an hour boundary as separate buckets", () => {
    clock = new ManualClock("2026-01-15T10:59:00");
    const limiter = createLimiter(1);
    limiter.recordInvocation();
    expect(limiter.canInvoke()).toBe(false);

    clock.advance(2 * 60 * 1000);
    expect(limiter.canInvoke()).toBe(true);
  });

  it("persists the count across instances", () => {
    createLimiter(10).recordInvocation();
    createLimiter(10).recordInvocation();

    expect(createLimiter(10).callsThisHour()).toBe(2);
  });

  it("recreates a corrupt state document with zero usage", () => {
    store.ensureStateDir();
    writeFileSync(join(testDir, ".cadence", "rate_limit.json"), "not json");

    const limiter = createLimiter(3);
    expect(limiter.callsThisHour()).toBe(0);
    expect(limiter.getState().totalCallsSession).toBe(0);
  });

  it("counts provider rate-limit hits", () => {
    const limiter = createLimiter(3);
    limiter.recordRateLimitHit();
    limiter.recordRateLimitHit();

    expect(limiter.getState().rateLimitHits).toBe(2);
  });

  it("waits for the next hour with a countdown and zeroes the counter", async () => {
    clock = new ManualClock("2026-01-15T10:59:58");
    const limiter = createLimiter(2);
    limiter.recordInvocation();
    limiter.recordInvocation();

    await limiter.waitForReset();

    expect(written).toEqual([
      "\r⏳ Time until reset: 00:00:02",
      "\r⏳ Time until reset: 00:00:01",
      "\n",
    ]);
    expect(clock.sleeps).toEqual([1000, 1000]);
    expect(clock.now().getHours()).toBe(11);
    expect(limiter.callsThisHour()).toBe(0);
    expect(limiter.canInvoke()).toBe(true);
  });

  it("reports the start of the next hour as the reset time", () => {
    const limiter = createLimiter(2);
    const reset = limiter.nextResetTime();

    expect(reset.getHours()).toBe(11);
    expect(reset.getMinutes()).toBe(0);
  });

  it("operator reset clears all counters", () => {
    const limiter = createLimiter(2);
    limiter.recordInvocation();
    limiter.recordRateLimitHit();

    limiter.reset();

    const state = limiter.getState();
    expect(state.currentCalls).toBe(0);
    expect(state.totalCallsSession).toBe(0);
    expect(state.rateLimitHits).toBe(0);
  });
});
