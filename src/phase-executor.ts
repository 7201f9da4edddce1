/**
 * Phase Executor - the invocation loop for one (sprint, phase)
 *
 * Each iteration:
 *   1. halt if the circuit breaker is open
 *   2. wait out the hourly quota if it is used up (does not use a loop)
 *   3. stop early if the completion detector reports an exit reason
 *   4. render the prompt and invoke the agent
 *   5. feed the outcome to the circuit breaker and completion detector
 *   6. stop when the phase's ground-truth predicate holds
 * up to the phase's loop ceiling, after which control returns to the
 * sprint controller without success or halt.
 */

import { join } from "path";
import type { AgentResult } from "./agent-runner-interface.js";
import { outputHasErrors } from "./agent-errors.js";
import type { WorkspaceSnapshot } from "./changes.js";
import type { ExitReason } from "./completion-detector.js";
import { getAgentTimeoutMs } from "./config.js";
import type { ControllerContext } from "./context.js";
import { recordInvocation, type NewInvocation } from "./metrics.js";
import { isPhaseComplete, maxLoopsFor, PHASE_ROLES } from "./phases.js";
import { renderPrompt } from "./prompts.js";
import { parseStatusBlock } from "./status-block.js";
import type { Phase, Role } from "./types.js";

export type PhaseOutcome =
  | { kind: "complete" }
  | { kind: "max_loops" }
  | { kind: "circuit_open" }
  | { kind: "graceful_exit"; reason: ExitReason };

interface InvocationContext {
  phase: Phase;
  role: Role;
  sprint: number;
  loop: number;
  startedAt: Date;
}

/**
 * `YYYY-MM-DD_HH-MM-SS` in local time, for output file names
 */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
    `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export class PhaseExecutor {
  private globalLoop = 0;

  constructor(private readonly ctx: ControllerContext) {}

  /** Invocations made by this executor across all phases */
  get loopCount(): number {
    return this.globalLoop;
  }

  async execute(phase: Phase, sprint: number): Promise<PhaseOutcome> {
    const { config, sprintState, circuitBreaker, rateLimiter, completion, reporter, logger } = this.ctx;
    const role = PHASE_ROLES[phase];
    const maxLoops = maxLoopsFor(phase, config.sprint);

    logger.log(`▶️  Starting ${phase} phase (role: ${role}, sprint: ${sprint})`);
    sprintState.setPhase(phase);

    let loop = 0;
    while (loop < maxLoops) {
      if (circuitBreaker.shouldHalt()) {
        logger.error("🚨 Circuit breaker is open, halting phase execution");
        return { kind: "circuit_open" };
      }

      if (!rateLimiter.canInvoke()) {
        reporter.update({ loopCount: this.globalLoop, sprint, phase, status: "waiting_rate_limit" });
        await rateLimiter.waitForReset();
        continue;
      }

      const exitReason = completion.shouldExitGracefully();
      if (exitReason) {
        logger.log(`🏁 Graceful exit: ${exitReason}`);
        return { kind: "graceful_exit", reason: exitReason };
      }

      loop++;
      this.globalLoop++;
      logger.log(`🔄 ${phase} loop ${loop}/${maxLoops} (global #${this.globalLoop})`);
      reporter.update({ loopCount: this.globalLoop, sprint, phase, status: "executing" });

      const invocation: InvocationContext = {
        phase,
        role,
        sprint,
        loop: this.globalLoop,
        startedAt: this.ctx.clock.now(),
      };
      const opened = await this.invoke(invocation);
      sprintState.incrementPhaseLoop();

      if (opened) {
        logger.error("🚨 Circuit breaker opened, halting phase execution");
        return { kind: "circuit_open" };
      }

      if (isPhaseComplete(phase, sprint, this.ctx.store, logger)) {
        logger.log(`✅ Phase ${phase} complete`);
        return { kind: "complete" };
      }
    }

    logger.warn(`⚠️  Max loops (${maxLoops}) reached for phase: ${phase}`);
    return { kind: "max_loops" };
  }

  /**
   * One agent invocation and its bookkeeping.
   * Returns true when the circuit breaker opened.
   */
  private async invoke(invocation: InvocationContext): Promise<boolean> {
    const { config, store, runner, rateLimiter, completion, circuitBreaker, reporter, clock, logger } = this.ctx;
    const { phase, role, sprint, loop } = invocation;

    const rendered = renderPrompt({ role, phase, sprint, store, now: invocation.startedAt, logger });
    const outputFile = join(
      store.agentOutputDir,
      `output_${role}_${phase}_sprint${sprint}_${fileTimestamp(invocation.startedAt)}.log`
    );

    const before = this.snapshot();
    const result = await runner.run({
      role,
      phase,
      sprint,
      prompt: rendered.prompt,
      outputFile,
      timeoutMs: getAgentTimeoutMs(config, role),
      cwd: store.projectRoot,
    });
    rateLimiter.recordInvocation();
    logger.debug(`Agent finished: ${result.outcome} in ${Math.round(result.durationMs / 1000)}s`);

    switch (result.outcome) {
      case "success": {
        const block = parseStatusBlock(result.output);
        completion.analyzeOutput(result.output, loop, block);

        let reportedProgress = false;
        if (block.present) {
          const { status } = block;
          reporter.update({ loopCount: loop, sprint, phase, status: "executing", agentStatus: status });
          reportedProgress = status.tasksCompleted > 0 || status.storyPointsDone > 0;
          if (status.phaseComplete) {
            logger.debug("Agent reports PHASE_COMPLETE; checking the backlog");
          }
        } else {
          logger.debug("No status block in agent output");
        }

        const filesChanged = this.changesSince(before) + (reportedProgress ? 1 : 0);
        const hadError = outputHasErrors(result.output);
        if (filesChanged === 0) {
          completion.recordIdleLoop(loop, "no_changes");
        } else if (!block.present) {
          completion.recordIdleLoop(loop, "no_status_block");
        }

        logger.log(`✅ Agent execution completed (${filesChanged} change(s))`);
        this.recordMetrics(invocation, result, filesChanged, hadError);
        const opened = circuitBreaker.recordOutcome(loop, filesChanged, hadError, result.output.length);
        if (!opened) {
          await clock.sleep(config.delays.betweenCallsSeconds * 1000);
        }
        return opened;
      }

      case "rate_limited":
        logger.warn("⏳ Agent hit the provider's rate limit");
        rateLimiter.recordRateLimitHit();
        this.recordMetrics(invocation, result, 0, false);
        reporter.update({ loopCount: loop, sprint, phase, status: "waiting_rate_limit" });
        await rateLimiter.waitForReset();
        return false;

      case "timeout":
      case "auth_error":
      case "connection_error":
      case "error": {
        if (result.outcome === "timeout") {
          logger.warn(`⏰ Agent timed out after ${Math.round(result.durationMs / 1000)}s`);
        } else if (result.outcome === "auth_error") {
          logger.error("🔐 Agent failed to authenticate; check the agent's credentials");
        } else if (result.outcome === "connection_error") {
          logger.error("🌐 Agent could not connect");
        } else {
          logger.error(`❌ Agent execution failed (exit code: ${result.exitCode ?? "none"})`);
        }

        completion.recordIdleLoop(loop, result.outcome);
        this.recordMetrics(invocation, result, 0, true);
        const opened = circuitBreaker.recordOutcome(loop, 0, true, result.output.length);
        if (!opened) {
          const delay =
            result.outcome === "connection_error"
              ? config.delays.connectionRetrySeconds
              : config.delays.errorRetrySeconds;
          await clock.sleep(delay * 1000);
        }
        return opened;
      }

      default: {
        const unknown: never = result.outcome;
        throw new Error(`Unknown agent outcome: ${String(unknown)}`);
      }
    }
  }

  private snapshot(): WorkspaceSnapshot | null {
    try {
      return this.ctx.changes.snapshot(this.ctx.store.projectRoot);
    } catch (err) {
      this.ctx.logger.warn(
        `Failed to snapshot workspace: ${err instanceof Error ? err.message : String(err)}`
      );
      return null;
    }
  }

  private changesSince(before: WorkspaceSnapshot | null): number {
    try {
      return this.ctx.changes.changesSince(this.ctx.store.projectRoot, before);
    } catch (err) {
      this.ctx.logger.warn(
        `Failed to count workspace changes: ${err instanceof Error ? err.message : String(err)}`
      );
      return 0;
    }
  }

  private recordMetrics(
    invocation: InvocationContext,
    result: AgentResult,
    filesChanged: number,
    hadError: boolean
  ): void {
    const record: NewInvocation = {
      sprint: invocation.sprint,
      phase: invocation.phase,
      role: invocation.role,
      loop: invocation.loop,
      startedAt: invocation.startedAt,
      durationMs: result.durationMs,
      outcome: result.outcome,
      filesChanged,
      hadError,
      outputLength: result.output.length,
    };
    try {
      recordInvocation(record);
    } catch (err) {
      this.ctx.logger.warn(
        `Failed to record metrics: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}
