import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { execSync } from "child_process";
import { mkdirSync, rmSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { tmpdir } from "os";

vi.mock("./metrics.js", () => ({
  recordInvocation: vi.fn(),
}));

import type { AgentRequest, AgentResult, AgentRunner } from "./agent-runner-interface.js";
import { createEmptyBacklog, saveBacklog } from "./backlog.js";
import type { ChangeTracker } from "./changes.js";
import { ManualClock } from "./clock.js";
import { createDefaultConfig } from "./config.js";
import { createControllerContext, type ControllerContext } from "./context.js";
import { SilentLogger } from "./logger.js";
import { recordInvocation } from "./metrics.js";
import { fileTimestamp, PhaseExecutor } from "./phase-executor.js";
import type { Config, Task, TaskStatus } from "./types.js";

type Handler = (request: AgentRequest) => AgentResult;

class FakeRunner implements AgentRunner {
  readonly requests: AgentRequest[] = [];

  constructor(private readonly handler: Handler) {}

  async run(request: AgentRequest): Promise<AgentResult> {
    this.requests.push(request);
    return this.handler(request);
  }

  abort(): void {}
}

function fixedChanges(counts: number[]): ChangeTracker {
  let call = 0;
  return {
    snapshot: () => null,
    changesSince: () => counts[Math.min(call++, counts.length - 1)],
  };
}

function success(output: string): AgentResult {
  return { outcome: "success", output, exitCode: 0, durationMs: 1000 };
}

function task(id: string, status: TaskStatus, sprint: number | null = 1): Task {
  return {
    id,
    title: id,
    type: "feature",
    priority: 2,
    story_points: 3,
    status,
    sprint_id: sprint,
    acceptance_criteria: [],
    dependencies: [],
  };
}

describe("fileTimestamp", () => {
  it("formats local time for file names", () => {
    expect(fileTimestamp(new Date(2026, 0, 5, 9, 3, 7))).toBe("2026-01-05_09-03-07");
  });
});

describe("PhaseExecutor", () => {
  let testDir: string;
  let config: Config;
  let clock: ManualClock;

  function writeBacklog(items: Task[]): void {
    saveBacklog(join(testDir, "backlog.json"), { ...createEmptyBacklog("demo"), items });
  }

  function writePlan(sprint: number): void {
    mkdirSync(join(testDir, "sprints", `sprint_${sprint}`), { recursive: true });
    writeFileSync(join(testDir, "sprints", `sprint_${sprint}`, "plan.md"), "# Plan\n");
  }

  function createContext(runner: AgentRunner, changes?: ChangeTracker): ControllerContext {
    return createControllerContext(config, testDir, {
      logger: new SilentLogger(),
      clock,
      runner,
      changes,
      output: { write: () => true },
    });
  }

  beforeEach(() => {
    testDir = join(tmpdir(), `cadence-executor-test-${Date.now()}`);
    mkdirSync(join(testDir, "prompts"), { recursive: true });
    for (const role of ["product_owner", "developer", "qa"]) {
      writeFileSync(join(testDir, "prompts", `${role}.md`), `# ${role}\n`);
    }
    config = createDefaultConfig("demo");
    clock = new ManualClock("2026-01-15T10:20:00");
    vi.mocked(recordInvocation).mockClear();
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("completes implementation from the backlog alone when no status block is printed", async () => {
    writeBacklog([task("TASK-001", "in_progress"), task("TASK-002", "ready")]);
    const runner = new FakeRunner(() => {
      writeBacklog([task("TASK-001", "implemented"), task("TASK-002", "implemented")]);
      return success("Implemented both tasks.");
    });
    const ctx = createContext(runner, fixedChanges([2]));

    const outcome = await new PhaseExecutor(ctx).execute("implementation", 1);

    expect(outcome).toEqual({ kind: "complete" });
    expect(runner.requests).toHaveLength(1);
    expect(runner.requests[0].role).toBe("developer");
    expect(runner.requests[0].timeoutMs).toBe(15 * 60 * 1000);
    expect(runner.requests[0].outputFile).toBe(
      join(testDir, "logs", "agent_output", "output_developer_implementation_sprint1_2026-01-15_10-20-00.log")
    );
    expect(ctx.sprintState.getState().currentPhase).toBe("implementation");
    expect(ctx.sprintState.getState().phaseLoopCount).toBe(1);
    expect(ctx.completion.getSignals().idleLoops.map((entry) => entry.detail)).toEqual(["no_status_block"]);
    expect(ctx.rateLimiter.callsThisHour()).toBe(1);
    expect(clock.sleeps).toEqual([5000]);
    expect(vi.mocked(recordInvocation)).toHaveBeenCalledTimes(1);
  });

  it("opens the circuit after five invocations without changes", async () => {
    writeBacklog([task("TASK-001", "ready")]);
    const runner = new FakeRunner(() => success("Still thinking about the design."));
    const ctx = createContext(runner, fixedChanges([0]));

    const outcome = await new PhaseExecutor(ctx).execute("implementation", 1);

    expect(outcome).toEqual({ kind: "circuit_open" });
    expect(runner.requests).toHaveLength(5);
    expect(ctx.circuitBreaker.getState().state).toBe("OPEN");
    expect(ctx.circuitBreaker.getState().reason).toBe("No progress detected in 5 consecutive loops");
  });

  it("halts before invoking when the circuit is already open", async () => {
    writeBacklog([task("TASK-001", "ready")]);
    const runner = new FakeRunner(() => success(""));
    const ctx = createContext(runner, fixedChanges([0]));
    for (let loop = 1; loop <= 5; loop++) {
      ctx.circuitBreaker.recordOutcome(loop, 0, false, 0);
    }

    const outcome = await new PhaseExecutor(ctx).execute("planning", 1);

    expect(outcome).toEqual({ kind: "circuit_open" });
    expect(runner.requests).toHaveLength(0);
  });

  it("returns after the phase's loop ceiling", async () => {
    writeBacklog([task("TASK-001", "backlog", null)]);
    const runner = new FakeRunner(() => success("Drafted part of the plan."));
    const ctx = createContext(runner, fixedChanges([1]));
    const executor = new PhaseExecutor(ctx);

    const outcome = await executor.execute("planning", 1);

    expect(outcome).toEqual({ kind: "max_loops" });
    expect(runner.requests).toHaveLength(3);
    expect(runner.requests.every((request) => request.role === "product_owner")).toBe(true);
    expect(executor.loopCount).toBe(3);
    expect(ctx.circuitBreaker.getState().state).toBe("CLOSED");
  });

  it("exits gracefully before invoking when the backlog is resolved", async () => {
    writeBacklog([task("TASK-001", "done"), task("TASK-002", "cancelled")]);
    const runner = new FakeRunner(() => success(""));
    const ctx = createContext(runner, fixedChanges([0]));

    const outcome = await new PhaseExecutor(ctx).execute("implementation", 1);

    expect(outcome).toEqual({ kind: "graceful_exit", reason: "backlog_complete" });
    expect(runner.requests).toHaveLength(0);
  });

  it("waits for the next hour when the quota is used up", async () => {
    config.rateLimiting.maxCallsPerHour = 1;
    writeBacklog([task("TASK-001", "backlog", null)]);
    const runner = new FakeRunner(() => {
      if (runner.requests.length === 2) writePlan(1);
      return success("Planned the sprint.");
    });
    const ctx = createContext(runner, fixedChanges([1]));

    const outcome = await new PhaseExecutor(ctx).execute("planning", 1);

    expect(outcome).toEqual({ kind: "complete" });
    expect(runner.requests).toHaveLength(2);
    expect(clock.now().getHours()).toBe(11);
    expect(ctx.rateLimiter.callsThisHour()).toBe(1);
    expect(ctx.sprintState.getState().phaseLoopCount).toBe(2);
  });

  it("backs off and counts failures until the breaker opens", async () => {
    writeBacklog([task("TASK-001", "ready")]);
    const runner = new FakeRunner(() => ({
      outcome: "error",
      output: "ERROR: agent crashed",
      exitCode: 1,
      durationMs: 200,
    }));
    const ctx = createContext(runner, fixedChanges([0]));

    const outcome = await new PhaseExecutor(ctx).execute("implementation", 1);

    expect(outcome).toEqual({ kind: "circuit_open" });
    expect(runner.requests).toHaveLength(3);
    expect(ctx.circuitBreaker.getState().reason).toBe("Errors in 3 consecutive loops");
    expect(ctx.completion.getSignals().idleLoops.map((entry) => entry.detail)).toEqual([
      "error",
      "error",
      "error",
    ]);
    expect(clock.sleeps).toEqual([10000, 10000]);
  });

  it("waits longer after a connection error", async () => {
    config.sprint.planningMaxLoops = 1;
    writeBacklog([task("TASK-001", "backlog", null)]);
    const runner = new FakeRunner(() => ({
      outcome: "connection_error",
      output: "ECONNREFUSED",
      exitCode: 1,
      durationMs: 50,
    }));
    const ctx = createContext(runner, fixedChanges([0]));

    await new PhaseExecutor(ctx).execute("planning", 1);

    expect(clock.sleeps).toEqual([30000]);
  });

  it("treats reported task progress as a change and keeps the status block", async () => {
    config.sprint.planningMaxLoops = 1;
    writeBacklog([task("TASK-001", "backlog", null)]);
    const output = [
      "Assigned tasks to the sprint.",
      "---CADENCE_STATUS---",
      "ROLE: product_owner",
      "PHASE: planning",
      "SPRINT: 1",
      "TASKS_COMPLETED: 1",
      "TASKS_REMAINING: 0",
      "BLOCKERS: none",
      "STORY_POINTS_DONE: 0",
      "TESTS_STATUS: NOT_RUN",
      "PHASE_COMPLETE: true",
      "PROJECT_DONE: false",
      "NEXT_ACTION: write the plan",
      "---END_CADENCE_STATUS---",
    ].join("\n");
    const runner = new FakeRunner(() => success(output));
    const ctx = createContext(runner, fixedChanges([0]));

    const outcome = await new PhaseExecutor(ctx).execute("planning", 1);

    expect(outcome).toEqual({ kind: "max_loops" });
    expect(ctx.circuitBreaker.getState().consecutiveNoProgress).toBe(0);
    expect(ctx.completion.getSignals().idleLoops).toEqual([]);
    expect(ctx.reporter.read()?.agentStatus?.tasksCompleted).toBe(1);
    expect(ctx.reporter.read()?.agentStatus?.phaseComplete).toBe(true);
  });

  it("records provider rate limits and waits for the reset", async () => {
    writeBacklog([task("TASK-001", "backlog", null)]);
    const runner = new FakeRunner(() => {
      if (runner.requests.length === 1) {
        return { outcome: "rate_limited", output: "429 Too Many Requests", exitCode: 1, durationMs: 10 };
      }
      writePlan(1);
      return success("Planned the sprint.");
    });
    const ctx = createContext(runner, fixedChanges([1]));

    const outcome = await new PhaseExecutor(ctx).execute("planning", 1);

    expect(outcome).toEqual({ kind: "complete" });
    expect(ctx.rateLimiter.getState().rateLimitHits).toBe(1);
    expect(clock.now().getHours()).toBe(11);
    expect(ctx.circuitBreaker.getState().consecutiveFailures).toBe(0);
  });

  it("does not count its own state and output files as progress in a git repository", async () => {
    execSync("git init -q", { cwd: testDir, stdio: "ignore" });
    writeBacklog([task("TASK-001", "ready")]);
    const runner = new FakeRunner((request) => {
      mkdirSync(dirname(request.outputFile), { recursive: true });
      writeFileSync(request.outputFile, "Read the code again.\n");
      return success("Read the code again.");
    });
    const ctx = createContext(runner);

    const outcome = await new PhaseExecutor(ctx).execute("implementation", 1);

    expect(outcome).toEqual({ kind: "circuit_open" });
    expect(runner.requests).toHaveLength(5);
    expect(ctx.completion.getSignals().idleLoops.map((entry) => entry.detail)).toEqual([
      "no_changes",
      "no_changes",
      "no_changes",
      "no_changes",
      "no_changes",
    ]);
  });
});
