/**
 * Agent Runner Factory
 *
 * Creates the appropriate agent runner based on configuration.
 */

import type { AgentRunner } from "./agent-runner-interface.js";
import { createCLIAgentRunner } from "./cli-agent-runner.js";
import { createClaudeSdkAgentRunner } from "./claude-sdk-agent-runner.js";
import type { Logger } from "./logger.js";
import type { AgentConfig } from "./types.js";

/**
 * "cli" spawns the configured agent command; "sdk" runs the Claude Agent
 * SDK in-process (API key, pay-per-token).
 */
export function createAgentRunner(config: AgentConfig, logger?: Logger): AgentRunner {
  switch (config.runner) {
    case "cli":
      return createCLIAgentRunner(config, logger);
    case "sdk":
      return createClaudeSdkAgentRunner(config, logger);
    default: {
      const unknown: never = config.runner;
      throw new Error(`Unknown agent runner type: ${String(unknown)}`);
    }
  }
}
