import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { CLIAgentRunner, buildAgentCommand } from "./cli-agent-runner.js";
import { SilentLogger } from "./logger.js";
import type { AgentRequest } from "./agent-runner-interface.js";

describe("buildAgentCommand", () => {
  it("passes the prompt as the last argument to cursor-agent", () => {
    expect(buildAgentCommand({ command: "cursor-agent", model: "auto", args: null }, "do it")).toEqual({
      command: "cursor-agent",
      args: ["-p", "do it"],
      stdin: null,
    });
  });

  it("uses opencode run with a model", () => {
    expect(buildAgentCommand({ command: "opencode", model: "big-model", args: null }, "do it")).toEqual({
      command: "opencode",
      args: ["run", "--model", "big-model", "do it"],
      stdin: null,
    });
  });

  it("pipes the prompt to claude on stdin", () => {
    expect(buildAgentCommand({ command: "claude", model: "sonnet", args: null }, "do it")).toEqual({
      command: "claude",
      args: ["-p", "--model", "sonnet", "--dangerously-skip-permissions"],
      stdin: "do it",
    });
  });

  it("substitutes placeholders in a custom template", () => {
    expect(
      buildAgentCommand({ command: "my-agent", model: "m1", args: ["--use", "{model}", "--task={prompt}"] }, "do it")
    ).toEqual({
      command: "my-agent",
      args: ["--use", "m1", "--task=do it"],
      stdin: null,
    });
  });

  it("falls back to stdin when the template has no prompt placeholder", () => {
    expect(buildAgentCommand({ command: "my-agent", model: "m1", args: ["--quiet"] }, "do it").stdin).toBe("do it");
  });
});

describe("CLIAgentRunner", () => {
  let testDir: string;

  function request(overrides: Partial<AgentRequest> = {}): AgentRequest {
    return {
      role: "developer",
      phase: "implementation",
      sprint: 1,
      prompt: "hello agent",
      outputFile: join(testDir, "out", "output.log"),
      timeoutMs: 10000,
      cwd: testDir,
      ...overrides,
    };
  }

  function nodeRunner(script: string): CLIAgentRunner {
    return new CLIAgentRunner({ command: process.execPath, model: "auto", args: ["-e", script] }, new SilentLogger());
  }

  beforeEach(() => {
    testDir = join(tmpdir(), `cadence-cli-runner-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("captures output to the result and the output file", async () => {
    const runner = nodeRunner("process.stdin.pipe(process.stdout)");

    const result = await runner.run(request());

    expect(result.outcome).toBe("success");
    expect(result.exitCode).toBe(0);
    expect(result.output).toBe("hello agent");
    expect(readFileSync(join(testDir, "out", "output.log"), "utf-8")).toBe("hello agent");
  });

  it("captures stderr and classifies a failing exit", async () => {
    const runner = nodeRunner("console.error('boom'); process.exit(3)");

    const result = await runner.run(request());

    expect(result.outcome).toBe("error");
    expect(result.exitCode).toBe(3);
    expect(result.output).toBe("boom\n");
  });

  it("kills the agent when the timeout passes", async () => {
    const runner = nodeRunner("setTimeout(() => {}, 60000)");

    const result = await runner.run(request({ timeoutMs: 200 }));

    expect(result.outcome).toBe("timeout");
    expect(result.exitCode).toBeNull();
  });

  it("reports a missing binary as an error outcome", async () => {
    const runner = new CLIAgentRunner(
      { command: join(testDir, "no-such-agent"), model: "auto", args: null },
      new SilentLogger()
    );

    const result = await runner.run(request());

    expect(result.outcome).toBe("error");
    expect(result.output).toContain("Failed to start");
  });
});
