import { describe, it, expect } from "vitest";
import { extractStatusBlock, parseStatusBlock } from "./status-block.js";

function block(lines: string[]): string {
  return ["---CADENCE_STATUS---", ...lines, "---END_CADENCE_STATUS---"].join("\n");
}

describe("parseStatusBlock", () => {
  it("reports absence when there is no block", () => {
    expect(parseStatusBlock("Did some work, no summary.")).toEqual({ present: false });
    expect(parseStatusBlock("")).toEqual({ present: false });
  });

  it("parses a complete block", () => {
    const output = [
      "Implemented the login form.",
      block([
        "ROLE: developer",
        "PHASE: implementation",
        "SPRINT: 2",
        "TASKS_COMPLETED: 1",
        "TASKS_REMAINING: 3",
        "BLOCKERS: none",
        "STORY_POINTS_DONE: 5",
        "TESTS_STATUS: PASSING",
        "PHASE_COMPLETE: false",
        "PROJECT_DONE: false",
        "NEXT_ACTION: Implement TASK-004",
      ]),
    ].join("\n");

    expect(parseStatusBlock(output)).toEqual({
      present: true,
      status: {
        role: "developer",
        phase: "implementation",
        sprint: 2,
        tasksCompleted: 1,
        tasksRemaining: 3,
        blockers: "none",
        storyPointsDone: 5,
        testsStatus: "PASSING",
        phaseComplete: false,
        projectDone: false,
        nextAction: "Implement TASK-004",
      },
    });
  });

  it("fills defaults for missing and malformed fields", () => {
    const result = parseStatusBlock(block(["ROLE: qa", "TASKS_COMPLETED: many", "TESTS_STATUS: green"]));

    expect(result).toEqual({
      present: true,
      status: {
        role: "qa",
        phase: "",
        sprint: 0,
        tasksCompleted: 0,
        tasksRemaining: 0,
        blockers: "none",
        storyPointsDone: 0,
        testsStatus: "NOT_RUN",
        phaseComplete: false,
        projectDone: false,
        nextAction: "",
      },
    });
  });

  it("accepts yes and 1 as true", () => {
    const result = parseStatusBlock(block(["PHASE_COMPLETE: yes", "PROJECT_DONE: 1"]));

    expect(result.present && result.status.phaseComplete).toBe(true);
    expect(result.present && result.status.projectDone).toBe(true);
  });

  it("uses the last block when the output has several", () => {
    const output = [block(["SPRINT: 1", "PROJECT_DONE: true"]), "more work", block(["SPRINT: 2"])].join("\n");

    const result = parseStatusBlock(output);
    expect(result.present && result.status.sprint).toBe(2);
    expect(result.present && result.status.projectDone).toBe(false);
  });

  it("falls back to line scanning when the block is not valid YAML", () => {
    const result = parseStatusBlock(
      block(["TASKS_COMPLETED: 2", "NEXT_ACTION: Fix login: retry on 401", "BLOCKERS: waiting on API keys"])
    );

    expect(result.present && result.status.tasksCompleted).toBe(2);
    expect(result.present && result.status.nextAction).toBe("Fix login: retry on 401");
    expect(result.present && result.status.blockers).toBe("waiting on API keys");
  });

  it("reads an unterminated block to the end of the output", () => {
    const result = parseStatusBlock("---CADENCE_STATUS---\nTASKS_REMAINING: 4\n");
    expect(result.present && result.status.tasksRemaining).toBe(4);
  });
});

describe("extractStatusBlock", () => {
  it("returns the body between the markers", () => {
    expect(extractStatusBlock("a\n---CADENCE_STATUS---\nROLE: qa\n---END_CADENCE_STATUS---\nb")).toBe("\nROLE: qa\n");
  });
});
