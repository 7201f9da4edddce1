import { describe, it, expect } from "vitest";
import { createAgentRunner } from "./agent-runner-factory.js";
import { CLIAgentRunner } from "./cli-agent-runner.js";
import { ClaudeSdkAgentRunner } from "./claude-sdk-agent-runner.js";
import { createDefaultConfig } from "./config.js";
import { SilentLogger } from "./logger.js";

describe("createAgentRunner", () => {
  const agent = createDefaultConfig("demo").agent;

  it("creates a CLI runner by default", () => {
    expect(createAgentRunner(agent, new SilentLogger())).toBeInstanceOf(CLIAgentRunner);
  });

  it("creates an SDK runner on request", () => {
    expect(createAgentRunner({ ...agent, runner: "sdk" }, new SilentLogger())).toBeInstanceOf(ClaudeSdkAgentRunner);
  });
});
