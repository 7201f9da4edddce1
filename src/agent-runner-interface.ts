/**
 * Agent Runner Interface
 *
 * Defines the contract that both CLI and SDK agent runners implement, so
 * the phase executor can use either without knowing which one it has.
 */

import type { Phase, Role } from "./types.js";

/**
 * How an invocation ended, as far as the controller cares
 */
export type AgentOutcome =
  | "success"
  | "timeout"
  | "rate_limited"
  | "auth_error"
  | "connection_error"
  | "error";

/**
 * One bounded invocation of the agent
 */
export interface AgentRequest {
  role: Role;
  phase: Phase;
  sprint: number;

  /** Fully rendered prompt */
  prompt: string;

  /** Combined stdout/stderr is captured here */
  outputFile: string;

  /** Hard limit; the agent is killed when it passes */
  timeoutMs: number;

  /** Working directory for the agent (the project root) */
  cwd: string;
}

export interface AgentResult {
  outcome: AgentOutcome;

  /** Everything the agent printed */
  output: string;

  /** Process exit code; null when killed by a signal or run in-process */
  exitCode: number | null;

  durationMs: number;
}

export interface AgentRunner {
  /**
   * Runs one invocation. Failures are reported through `outcome`; this
   * only rejects on bugs in the runner itself.
   */
  run(request: AgentRequest): Promise<AgentResult>;

  /**
   * Stops the running invocation, if any. Called on SIGINT/SIGTERM.
   */
  abort(): void;
}
