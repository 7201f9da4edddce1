import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ManualClock, nextHour } from "./clock.js";
import { SilentLogger } from "./logger.js";
import { RateLimiter } from "./rate-limiter.js";
import { StateStore } from "./state.js";
import { StatusReporter } from "./status.js";
import type { AgentStatus } from "./types.js";
import { VERSION } from "./version.js";

const agentStatus: AgentStatus = {
  role: "developer",
  phase: "implementation",
  sprint: 1,
  tasksCompleted: 2,
  tasksRemaining: 1,
  blockers: "none",
  storyPointsDone: 5,
  testsStatus: "PASSING",
  phaseComplete: false,
  projectDone: false,
  nextAction: "finish TASK-003",
};

describe("StatusReporter", () => {
  let testDir: string;
  let store: StateStore;
  let clock: ManualClock;
  let limiter: RateLimiter;
  let reporter: StatusReporter;

  beforeEach(() => {
    testDir = join(tmpdir(), `cadence-status-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
    store = new StateStore(testDir, new SilentLogger());
    clock = new ManualClock("2026-01-15T10:20:00");
    limiter = new RateLimiter(store, 50, { clock, logger: new SilentLogger(), output: { write: () => true } });
    reporter = new StatusReporter(store, limiter, clock);
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("returns null before the first update", () => {
    expect(reporter.read()).toBeNull();
  });

  it("writes the snapshot with rate limit figures", () => {
    limiter.recordInvocation();
    limiter.recordInvocation();

    reporter.update({ loopCount: 4, sprint: 1, phase: "planning", status: "executing" });

    const raw = JSON.parse(readFileSync(join(testDir, ".cadence", "status.json"), "utf-8"));
    expect(raw.version).toBe(VERSION);
    expect(raw.timestamp).toBe(clock.now().toISOString());
    expect(raw.loopCount).toBe(4);
    expect(raw.currentSprint).toBe(1);
    expect(raw.currentPhase).toBe("planning");
    expect(raw.callsMadeThisHour).toBe(2);
    expect(raw.maxCallsPerHour).toBe(50);
    expect(raw.status).toBe("executing");
    expect(raw.exitReason).toBeNull();
    expect(raw.agentStatus).toBeNull();
    expect(new Date(raw.nextReset).getTime()).toBe(nextHour(clock.now()).getTime());
  });

  it("keeps the last agent status until a new one arrives", () => {
    reporter.update({ loopCount: 1, sprint: 1, phase: "implementation", status: "executing", agentStatus });
    reporter.update({ loopCount: 2, sprint: 1, phase: "implementation", status: "halted", exitReason: "circuit_breaker_open" });

    const snapshot = reporter.read();
    expect(snapshot?.status).toBe("halted");
    expect(snapshot?.exitReason).toBe("circuit_breaker_open");
    expect(snapshot?.agentStatus).toEqual(agentStatus);

    const replacement = { ...agentStatus, tasksCompleted: 3, tasksRemaining: 0 };
    reporter.update({ loopCount: 3, sprint: 1, phase: "qa", status: "executing", agentStatus: replacement });
    expect(reporter.read()?.agentStatus).toEqual(replacement);
  });
});
