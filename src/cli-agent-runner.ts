/**
 * CLI Agent Runner
 *
 * Runs the agent as a child process (cursor-agent, opencode, claude, or a
 * custom command line) and captures everything it prints to the output file.
 */

import { spawn, type ChildProcess } from "child_process";
import { createWriteStream, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import type { AgentRequest, AgentResult, AgentRunner } from "./agent-runner-interface.js";
import { classifyAgentResult } from "./agent-errors.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import type { AgentConfig } from "./types.js";

/** Grace period between SIGTERM and SIGKILL after a timeout */
const KILL_GRACE_MS = 5000;

export interface AgentCommand {
  command: string;
  args: string[];
  /** Written to stdin when the command takes the prompt there */
  stdin: string | null;
}

/**
 * Builds the command line for the configured agent CLI.
 * `model: "auto"` leaves the choice to the CLI.
 */
export function buildAgentCommand(
  config: Pick<AgentConfig, "command" | "model" | "args">,
  prompt: string
): AgentCommand {
  const modelArgs = config.model === "auto" ? [] : ["--model", config.model];

  if (config.args) {
    const takesPrompt = config.args.some((arg) => arg.includes("{prompt}"));
    return {
      command: config.command,
      args: config.args.map((arg) => arg.replaceAll("{model}", config.model).replaceAll("{prompt}", prompt)),
      stdin: takesPrompt ? null : prompt,
    };
  }

  switch (config.command) {
    case "claude":
      // Prompt via stdin avoids argument length limits
      return {
        command: "claude",
        args: ["-p", ...modelArgs, "--dangerously-skip-permissions"],
        stdin: prompt,
      };
    case "opencode":
      return { command: "opencode", args: ["run", ...modelArgs, prompt], stdin: null };
    default:
      return { command: config.command, args: ["-p", ...modelArgs, prompt], stdin: null };
  }
}

export class CLIAgentRunner implements AgentRunner {
  /** Track running processes for abort */
  private runningProcesses: Set<ChildProcess> = new Set();
  private logger: Logger;

  constructor(
    private readonly config: Pick<AgentConfig, "command" | "model" | "args">,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger();
  }

  run(request: AgentRequest): Promise<AgentResult> {
    const { command, args, stdin } = buildAgentCommand(this.config, request.prompt);
    const startTime = Date.now();

    const outputDir = dirname(request.outputFile);
    if (!existsSync(outputDir)) {
      mkdirSync(outputDir, { recursive: true });
    }
    const logStream = createWriteStream(request.outputFile, { flags: "w" });
    logStream.on("error", (err) => {
      this.logger.warn(`Failed to write agent output to ${request.outputFile}: ${err.message}`);
    });

    this.logger.debug(`Spawning ${command} (timeout ${request.timeoutMs}ms)`);

    return new Promise((resolve) => {
      let output = "";
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const proc = spawn(command, args, {
        cwd: request.cwd,
        stdio: ["pipe", "pipe", "pipe"],
      });
      this.runningProcesses.add(proc);

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        this.logger.warn(`⏱️  Agent timed out after ${Math.round(request.timeoutMs / 1000)}s, stopping it`);
        proc.kill("SIGTERM");
        killTimer = setTimeout(() => proc.kill("SIGKILL"), KILL_GRACE_MS);
      }, request.timeoutMs);

      const capture = (data: Buffer) => {
        output += data.toString();
        logStream.write(data);
      };
      proc.stdout.on("data", capture);
      proc.stderr.on("data", capture);

      proc.stdin.on("error", (err) => {
        this.logger.debug(`Agent stdin closed early: ${err.message}`);
      });
      if (stdin !== null) {
        proc.stdin.write(stdin);
      }
      proc.stdin.end();

      const finish = (exitCode: number | null, extra: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        this.runningProcesses.delete(proc);
        if (extra) {
          output += extra;
          logStream.write(extra);
        }
        logStream.end(() => {
          resolve({
            outcome: classifyAgentResult({ timedOut, exitCode, output }),
            output,
            exitCode,
            durationMs: Date.now() - startTime,
          });
        });
      };

      proc.on("close", (code) => finish(code, ""));

      // Spawn failures (missing binary) arrive here instead of "close"
      proc.on("error", (err) => finish(null, `\nERROR: Failed to start ${command}: ${err.message}\n`));
    });
  }

  /**
   * Kills the running agent process
   */
  abort(): void {
    for (const proc of this.runningProcesses) {
      proc.kill("SIGTERM");
    }
    this.runningProcesses.clear();
  }
}

export function createCLIAgentRunner(config: AgentConfig, logger?: Logger): AgentRunner {
  return new CLIAgentRunner(config, logger);
}
