/**
 * Claude SDK Agent Runner
 *
 * Runs the agent in-process via the Claude Agent SDK (requires an API key,
 * pay-per-token). For CLI agents, see cli-agent-runner.ts instead.
 */

import { query } from "@anthropic-ai/claude-agent-sdk";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { AgentRequest, AgentResult, AgentRunner } from "./agent-runner-interface.js";
import { classifyAgentResult } from "./agent-errors.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import type { AgentConfig } from "./types.js";

export class ClaudeSdkAgentRunner implements AgentRunner {
  private abortController: AbortController | null = null;
  private logger: Logger;

  constructor(
    private readonly config: Pick<AgentConfig, "model">,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger();
  }

  async run(request: AgentRequest): Promise<AgentResult> {
    const startTime = Date.now();
    const abortController = new AbortController();
    this.abortController = abortController;

    let output = "";
    let failed = false;
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      this.logger.warn(`⏱️  Agent timed out after ${Math.round(request.timeoutMs / 1000)}s, aborting`);
      abortController.abort();
    }, request.timeoutMs);

    try {
      const queryOptions: Parameters<typeof query>[0]["options"] = {
        cwd: request.cwd,
        model: this.config.model === "auto" ? undefined : this.config.model,
        settingSources: ["user", "project"],
        systemPrompt: { type: "preset", preset: "claude_code" },
        permissionMode: "bypassPermissions",
        allowDangerouslySkipPermissions: true,
        abortController,
      };

      for await (const message of query({ prompt: request.prompt, options: queryOptions })) {
        switch (message.type) {
          case "assistant":
            if (message.error) {
              failed = true;
              output += `ERROR: ${message.error}\n`;
            }
            for (const block of message.message.content) {
              if ("text" in block && block.text) {
                output += block.text + "\n";
              }
            }
            break;

          case "result":
            if (message.subtype !== "success") {
              failed = true;
              if ("errors" in message && message.errors) {
                output += `ERROR: ${message.errors.join("; ")}\n`;
              }
            }
            break;
        }
      }
    } catch (err) {
      failed = true;
      output += `ERROR: ${err instanceof Error ? err.message : String(err)}\n`;
    } finally {
      clearTimeout(timer);
      this.abortController = null;
    }

    this.writeOutput(request.outputFile, output);

    const exitCode = failed ? 1 : 0;
    return {
      outcome: classifyAgentResult({ timedOut, exitCode, output }),
      output,
      exitCode,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Aborts the in-flight query, if any
   */
  abort(): void {
    this.abortController?.abort();
  }

  private writeOutput(path: string, output: string): void {
    try {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(path, output);
    } catch (err) {
      this.logger.warn(`Failed to write agent output to ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

export function createClaudeSdkAgentRunner(config: AgentConfig, logger?: Logger): AgentRunner {
  return new ClaudeSdkAgentRunner(config, logger);
}
