/**
 * Cadence
 * Autonomous sprint controller that drives AI coding agents through
 * planning, implementation, QA and review
 */

export * from "./types.js";
export * from "./config.js";
export * from "./state.js";
export * from "./logger.js";
export * from "./clock.js";
export * from "./backlog.js";
export * from "./checklist.js";
export * from "./status-block.js";
export * from "./completion-detector.js";
export * from "./circuit-breaker.js";
export * from "./rate-limiter.js";
export * from "./sprint-state.js";
export * from "./phases.js";
export * from "./prompts.js";
export * from "./changes.js";
export * from "./agent-runner-interface.js";
export * from "./agent-runner-factory.js";
export * from "./agent-errors.js";
export { CLIAgentRunner, createCLIAgentRunner } from "./cli-agent-runner.js";
export { ClaudeSdkAgentRunner, createClaudeSdkAgentRunner } from "./claude-sdk-agent-runner.js";
export * from "./context.js";
export * from "./phase-executor.js";
export * from "./controller.js";
export * from "./status.js";
export * from "./metrics.js";
export * from "./project.js";
export { VERSION, getVersionString } from "./version.js";
