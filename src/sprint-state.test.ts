import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { SilentLogger } from "./logger.js";
import { SprintStateManager } from "./sprint-state.js";
import { StateStore } from "./state.js";

describe("SprintStateManager", () => {
  let testDir: string;
  let manager: SprintStateManager;

  beforeEach(() => {
    testDir = join(tmpdir(), `cadence-sprint-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
    manager = new SprintStateManager(new StateStore(testDir, new SilentLogger()), new SilentLogger());
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("starts at sprint 0 in initialization", () => {
    const state = manager.getState();
    expect(state.currentSprint).toBe(0);
    expect(state.currentPhase).toBe("initialization");
    expect(state.history).toEqual([]);
  });

  it("resets the loop counter on phase entry", () => {
    manager.incrementPhaseLoop();
    expect(manager.incrementPhaseLoop()).toBe(2);

    manager.setPhase("qa");
    const state = manager.getState();
    expect(state.currentPhase).toBe("qa");
    expect(state.phaseLoopCount).toBe(0);
  });

  it("starts a sprint in planning with a history entry and directory", () => {
    manager.incrementRework();

    expect(manager.startSprint(10)).toBe(1);

    const state = manager.getState();
    expect(state.currentSprint).toBe(1);
    expect(state.currentPhase).toBe("planning");
    expect(state.reworkCount).toBe(0);
    expect(state.history).toHaveLength(1);
    expect(state.history[0]).toMatchObject({ sprint: 1, endedAt: null, status: "in_progress" });
    expect(existsSync(join(testDir, "sprints", "sprint_1"))).toBe(true);
  });

  it("refuses to start a sprint past the ceiling", () => {
    expect(manager.startSprint(1)).toBe(1);
    expect(manager.startSprint(1)).toBeNull();
    expect(manager.getState().currentSprint).toBe(1);
  });

  it("closes the history entry when a sprint ends", () => {
    manager.startSprint(10);
    manager.setPhase("review");
    manager.incrementRework();

    manager.endSprint();

    const state = manager.getState();
    expect(state.currentPhase).toBe("planning");
    expect(state.reworkCount).toBe(0);
    expect(state.history[0].status).toBe("completed");
    expect(state.history[0].endedAt).not.toBeNull();
    expect(manager.historyEntry(1)?.status).toBe("completed");
  });

  it("persists the project-done flag", () => {
    manager.markProjectDone();
    expect(manager.getState().projectDone).toBe(true);
  });

  it("recreates a corrupt state document", () => {
    mkdirSync(join(testDir, ".cadence"), { recursive: true });
    writeFileSync(join(testDir, ".cadence", "sprint_state.json"), JSON.stringify({ currentPhase: "party" }));

    expect(manager.getState().currentSprint).toBe(0);
  });
});
