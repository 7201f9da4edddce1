/**
 * Sprint Controller - the outermost run loop
 *
 * Runs sprint 0 (backlog creation) once, then repeats
 * {planning, implementation ⇄ qa (bounded rework), review} until the
 * backlog is resolved, the circuit breaker opens, a graceful exit fires,
 * or the sprint ceiling is reached. Each way out writes the status
 * snapshot and maps to a fixed process exit code.
 */

import { hasQaFailedTasks, loadBacklog, sprintTasks } from "./backlog.js";
import type { ExitReason } from "./completion-detector.js";
import type { ControllerContext } from "./context.js";
import { recordSprintEnd, recordSprintStart } from "./metrics.js";
import { PhaseExecutor, type PhaseOutcome } from "./phase-executor.js";
import { isPhaseComplete } from "./phases.js";
import type { RunStatus } from "./status.js";
import { EXIT_CODES, type ExitCode, type Phase } from "./types.js";
import { VERSION } from "./version.js";

export interface RunResult {
  exitCode: ExitCode;
  status: RunStatus;
  exitReason: string | null;
}

type SprintResult =
  | { kind: "continue" }
  | { kind: "circuit_open" }
  | { kind: "max_sprints" }
  | { kind: "project_complete" }
  | { kind: "graceful_exit"; reason: ExitReason };

const CONTINUE: SprintResult = { kind: "continue" };

/**
 * Phase outcomes that end the sprint early. Completing a phase or running
 * out of loops both move on to the next phase.
 */
function interruption(outcome: PhaseOutcome): SprintResult | null {
  switch (outcome.kind) {
    case "circuit_open":
      return { kind: "circuit_open" };
    case "graceful_exit":
      return { kind: "graceful_exit", reason: outcome.reason };
    case "complete":
    case "max_loops":
      return null;
  }
}

export class SprintController {
  private readonly executor: PhaseExecutor;

  constructor(private readonly ctx: ControllerContext) {
    this.executor = new PhaseExecutor(ctx);
  }

  /**
   * Runs until a terminal condition. Takes the controller lock for the
   * duration of the run.
   */
  async run(): Promise<RunResult> {
    const { store, logger } = this.ctx;

    if (!store.acquireLock()) {
      const lock = store.getLockInfo();
      logger.error("❌ Another controller is already running in this project");
      if (lock) {
        logger.error(`   PID: ${lock.pid}`);
        logger.error(`   Started: ${lock.startedAt}`);
      }
      return { exitCode: EXIT_CODES.error, status: "failed", exitReason: "already_running" };
    }

    try {
      return await this.runLoop();
    } finally {
      store.releaseLock();
    }
  }

  private async runLoop(): Promise<RunResult> {
    const { config, sprintState, completion, logger } = this.ctx;

    logger.log("🚀 Cadence starting...");
    logger.log(`   Version: ${VERSION}`);
    logger.log(`   Project: ${config.project.name}`);
    logger.log(`   Max calls/hour: ${config.rateLimiting.maxCallsPerHour}`);
    logger.log("");

    completion.reset();
    this.report("starting", null);

    const stopped = await this.runSprintZero();
    if (stopped) {
      return stopped;
    }

    while (!sprintState.getState().projectDone) {
      const resuming = this.isResumingSprint();
      const current = sprintState.getState().currentSprint;

      if (!resuming && current >= config.sprint.maxSprints) {
        logger.warn(`⚠️  Max sprints reached (${current} >= ${config.sprint.maxSprints})`);
        return this.finish("stopped", "max_sprints", EXIT_CODES.maxSprints);
      }

      const exitReason = completion.shouldExitGracefully();
      if (exitReason) {
        return this.gracefulExit(exitReason);
      }

      const result = resuming ? await this.resumeSprint() : await this.startSprint();
      switch (result.kind) {
        case "continue":
          break;
        case "circuit_open":
          return this.circuitHalt();
        case "max_sprints":
          return this.finish("stopped", "max_sprints", EXIT_CODES.maxSprints);
        case "project_complete":
          sprintState.markProjectDone();
          break;
        case "graceful_exit":
          return this.gracefulExit(result.reason);
      }
    }

    logger.log("🎉 Project marked as DONE!");
    return this.finish("completed", "project_complete", EXIT_CODES.projectComplete);
  }

  // === Sprint 0 ===

  /**
   * Creates the backlog with the product owner. Skipped when the backlog
   * already has items. Returns the run's result when sprint 0 ends the
   * run: breaker open, graceful exit, or still no backlog afterwards.
   */
  private async runSprintZero(): Promise<RunResult | null> {
    const { store, logger } = this.ctx;

    const existing = loadBacklog(store.backlogPath, logger);
    if (existing && existing.items.length > 0) {
      logger.log(`📋 Backlog already has ${existing.items.length} items, skipping sprint 0`);
      return null;
    }

    logger.log("=== Sprint 0: Initialization ===");
    const stop = interruption(await this.executor.execute("initialization", 0));
    if (stop?.kind === "circuit_open") {
      return this.circuitHalt();
    }
    if (stop?.kind === "graceful_exit") {
      return this.gracefulExit(stop.reason);
    }

    const backlog = loadBacklog(store.backlogPath, logger);
    if (!backlog || backlog.items.length === 0) {
      logger.error("❌ Sprint 0 failed: no backlog items were created");
      return this.finish("failed", "sprint_zero_failed", EXIT_CODES.error);
    }
    logger.log(`✅ Sprint 0 complete: ${backlog.items.length} backlog items created`);
    return null;
  }

  // === Sprints ===

  /**
   * A sprint resumes when it is not recorded as completed and either got
   * past planning or already has tasks assigned.
   */
  private isResumingSprint(): boolean {
    const { store, sprintState, logger } = this.ctx;
    const state = sprintState.getState();
    if (state.currentSprint === 0) return false;

    const entry = sprintState.historyEntry(state.currentSprint);
    if (entry?.status === "completed") return false;
    if (state.currentPhase !== "planning" && state.currentPhase !== "initialization") return true;

    const backlog = loadBacklog(store.backlogPath, logger);
    return (
      entry?.status === "in_progress" &&
      backlog !== null &&
      sprintTasks(backlog, state.currentSprint).length > 0
    );
  }

  private async startSprint(): Promise<SprintResult> {
    const { config, sprintState, circuitBreaker, clock, logger } = this.ctx;

    const sprint = sprintState.startSprint(config.sprint.maxSprints);
    if (sprint === null) {
      return { kind: "max_sprints" };
    }

    logger.log(`=== Sprint ${sprint} ===`);
    circuitBreaker.resetForNewSprint(sprint);
    this.recordMetrics(() => recordSprintStart(sprint, clock.now()));
    return this.runSprintFrom(sprint, "planning", false);
  }

  private async resumeSprint(): Promise<SprintResult> {
    const { sprintState, clock, logger } = this.ctx;
    const state = sprintState.getState();
    const phase = state.currentPhase === "initialization" ? "planning" : state.currentPhase;

    logger.log(`📍 Resuming sprint ${state.currentSprint} from phase: ${phase}`);
    this.recordMetrics(() => recordSprintStart(state.currentSprint, clock.now()));
    return this.runSprintFrom(state.currentSprint, phase, true);
  }

  private async runSprintFrom(sprint: number, from: Phase, resumed: boolean): Promise<SprintResult> {
    const { store, logger } = this.ctx;

    if (from === "planning") {
      if (resumed && isPhaseComplete("planning", sprint, store, logger)) {
        logger.log("📋 Planning already complete, skipping to implementation");
      } else {
        const stop = interruption(await this.executor.execute("planning", sprint));
        if (stop) return this.halt(sprint, stop);
      }
    }

    if (from !== "review") {
      const result = await this.runReworkLoop(sprint, from, resumed);
      if (result.kind !== "continue") return this.halt(sprint, result);
    }

    const stop = interruption(await this.executor.execute("review", sprint));
    if (stop) return this.halt(sprint, stop);

    this.endSprint(sprint);
    if (this.ctx.completion.isProjectComplete()) {
      logger.log(`🎉 Project complete after sprint ${sprint}`);
      return { kind: "project_complete" };
    }
    return CONTINUE;
  }

  /**
   * Implementation then QA, repeated while QA returns tasks as qa_failed,
   * at most maxReworkCycles times. Past the ceiling the sprint moves on
   * to review and unresolved tasks go back to the next planning pass.
   */
  private async runReworkLoop(sprint: number, from: Phase, resumed: boolean): Promise<SprintResult> {
    const { config, store, sprintState, completion, logger } = this.ctx;
    const maxRework = config.sprint.maxReworkCycles;
    let rework = sprintState.getState().reworkCount;
    let firstCycle = true;

    while (rework < maxRework) {
      logger.log(`🔁 Implementation/QA cycle ${rework + 1}/${maxRework}`);

      // A resumed sprint skips implementation it already finished
      const skipImplementation =
        firstCycle &&
        resumed &&
        from !== "implementation" &&
        isPhaseComplete("implementation", sprint, store, logger);
      firstCycle = false;

      if (skipImplementation) {
        logger.log("📋 Implementation already complete, continuing with QA");
      } else {
        const stop = interruption(await this.executor.execute("implementation", sprint));
        if (stop) return stop;
      }

      if (completion.isProjectComplete()) {
        logger.log("🎉 Project complete after implementation");
        this.endSprint(sprint);
        return { kind: "project_complete" };
      }

      const stop = interruption(await this.executor.execute("qa", sprint));
      if (stop) return stop;

      const backlog = loadBacklog(store.backlogPath, logger);
      if (!backlog || !hasQaFailedTasks(backlog, sprint)) {
        logger.log("✅ No QA failures, proceeding to review");
        return CONTINUE;
      }

      rework = sprintState.incrementRework();
      if (rework >= maxRework) {
        logger.warn(`⚠️  Rework limit (${maxRework}) reached for sprint ${sprint}, proceeding to review`);
        return CONTINUE;
      }
      logger.warn(`⚠️  QA failures detected, starting rework cycle ${rework}`);
    }

    logger.warn(`⚠️  Rework limit (${maxRework}) already reached for sprint ${sprint}`);
    return CONTINUE;
  }

  private endSprint(sprint: number): void {
    const { sprintState, clock } = this.ctx;
    const reworkCycles = sprintState.getState().reworkCount;
    sprintState.endSprint();
    this.recordMetrics(() => recordSprintEnd(sprint, "completed", reworkCycles, clock.now()));
  }

  /**
   * A sprint stopped by the circuit breaker stays open in the sprint
   * history so the next run resumes it.
   */
  private halt(sprint: number, result: SprintResult): SprintResult {
    if (result.kind === "circuit_open") {
      const { sprintState, clock } = this.ctx;
      const reworkCycles = sprintState.getState().reworkCount;
      this.recordMetrics(() => recordSprintEnd(sprint, "halted", reworkCycles, clock.now()));
    }
    return result;
  }

  // === Exit ===

  private gracefulExit(reason: ExitReason): RunResult {
    const { completion, sprintState, logger } = this.ctx;
    logger.log(`🏁 Graceful exit triggered: ${reason}`);
    if (completion.isProjectComplete()) {
      sprintState.markProjectDone();
      return this.finish("completed", reason, EXIT_CODES.projectComplete);
    }
    return this.finish("completed", reason, EXIT_CODES.success);
  }

  private circuitHalt(): RunResult {
    this.ctx.logger.error("🚨 Circuit breaker opened. Run 'cadence reset-circuit' after investigating.");
    return this.finish("halted", "circuit_breaker", EXIT_CODES.circuitOpen);
  }

  private finish(status: RunStatus, exitReason: string, exitCode: ExitCode): RunResult {
    this.report(status, exitReason);
    this.ctx.logger.log(`Exiting with code ${exitCode} (${status}: ${exitReason})`);
    return { exitCode, status, exitReason };
  }

  /** Current position, for the status snapshot and signal handlers */
  report(status: RunStatus, exitReason: string | null): void {
    const state = this.ctx.sprintState.getState();
    this.ctx.reporter.update({
      loopCount: this.executor.loopCount,
      sprint: state.currentSprint,
      phase: state.currentPhase,
      status,
      exitReason,
    });
  }

  private recordMetrics(write: () => void): void {
    try {
      write();
    } catch (err) {
      this.ctx.logger.warn(
        `Failed to record metrics: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}
