/**
 * Wiring for one controller run: every component shares the same
 * StateStore, Clock and Logger.
 */

import type { AgentRunner } from "./agent-runner-interface.js";
import { createAgentRunner } from "./agent-runner-factory.js";
import { controllerPaths, createGitChangeTracker, type ChangeTracker } from "./changes.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import { systemClock, type Clock } from "./clock.js";
import { CompletionDetector } from "./completion-detector.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { RateLimiter } from "./rate-limiter.js";
import { SprintStateManager } from "./sprint-state.js";
import { StateStore } from "./state.js";
import { StatusReporter } from "./status.js";
import type { Config } from "./types.js";

export interface ControllerContext {
  config: Config;
  store: StateStore;
  sprintState: SprintStateManager;
  circuitBreaker: CircuitBreaker;
  rateLimiter: RateLimiter;
  completion: CompletionDetector;
  reporter: StatusReporter;
  runner: AgentRunner;
  changes: ChangeTracker;
  clock: Clock;
  logger: Logger;
}

export interface ContextOptions {
  logger?: Logger;
  clock?: Clock;
  runner?: AgentRunner;
  changes?: ChangeTracker;
  /** Where the rate limit countdown is drawn */
  output?: { write(text: string): unknown };
}

export function createControllerContext(
  config: Config,
  projectRoot: string,
  options: ContextOptions = {}
): ControllerContext {
  const logger = options.logger ?? new ConsoleLogger();
  const clock = options.clock ?? systemClock;
  const store = new StateStore(projectRoot, logger);
  const rateLimiter = new RateLimiter(store, config.rateLimiting.maxCallsPerHour, {
    clock,
    logger,
    output: options.output,
  });

  return {
    config,
    store,
    sprintState: new SprintStateManager(store, logger),
    circuitBreaker: new CircuitBreaker(store, config.circuitBreaker, logger),
    rateLimiter,
    completion: new CompletionDetector(store, config.completion, logger),
    reporter: new StatusReporter(store, rateLimiter, clock),
    runner: options.runner ?? createAgentRunner(config.agent, logger),
    changes:
      options.changes ??
      createGitChangeTracker(controllerPaths(projectRoot, [store.stateDir, store.agentOutputDir])),
    clock,
    logger,
  };
}
