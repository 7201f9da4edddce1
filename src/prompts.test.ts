import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { createEmptyBacklog, saveBacklog } from "./backlog.js";
import { SilentLogger } from "./logger.js";
import { buildSessionContext, installDefaultPrompts, renderPrompt } from "./prompts.js";
import { StateStore } from "./state.js";
import type { Task } from "./types.js";

function task(id: string, overrides: Partial<Task>): Task {
  return {
    id,
    title: id,
    type: "feature",
    priority: 2,
    story_points: 3,
    status: "backlog",
    sprint_id: null,
    acceptance_criteria: [],
    dependencies: [],
    ...overrides,
  };
}

describe("prompts", () => {
  let testDir: string;
  let store: StateStore;

  beforeEach(() => {
    testDir = join(tmpdir(), `cadence-prompts-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
    store = new StateStore(testDir, new SilentLogger());
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe("installDefaultPrompts", () => {
    it("copies one prompt per role and keeps existing files", () => {
      mkdirSync(store.promptsDir, { recursive: true });
      writeFileSync(join(store.promptsDir, "qa.md"), "custom qa prompt");

      const written = installDefaultPrompts(store);

      expect(written.map((path) => path.slice(store.promptsDir.length + 1)).sort()).toEqual([
        "developer.md",
        "product_owner.md",
      ]);
      expect(readFileSync(join(store.promptsDir, "qa.md"), "utf-8")).toBe("custom qa prompt");
    });
  });

  describe("buildSessionContext", () => {
    it("is empty without a backlog", () => {
      expect(buildSessionContext(null, 0, "initialization")).toEqual({
        sprintId: 0,
        phase: "initialization",
        backlog: null,
        sprintStats: null,
      });
    });

    it("summarizes the backlog and the current sprint", () => {
      const backlog = {
        ...createEmptyBacklog("demo"),
        items: [
          task("TASK-001", { status: "done", sprint_id: 1, story_points: 2 }),
          task("TASK-002", { status: "ready", sprint_id: 1, story_points: 5 }),
          task("TASK-003", { status: "backlog", story_points: 8 }),
        ],
      };

      const context = buildSessionContext(backlog, 1, "implementation");

      expect(context.backlog?.totalItems).toBe(3);
      expect(context.backlog?.totalPoints).toBe(15);
      expect(context.backlog?.byStatus.ready).toBe(1);
      expect(context.sprintStats).toEqual({ sprintItems: 2, sprintPoints: 7, completedPoints: 2 });
    });
  });

  describe("renderPrompt", () => {
    it("throws when the role prompt is missing", () => {
      expect(() => renderPrompt({ role: "developer", phase: "implementation", sprint: 1, store })).toThrow(
        /Prompt file not found/
      );
    });

    it("appends the current context and keeps a copy", () => {
      mkdirSync(store.promptsDir, { recursive: true });
      writeFileSync(join(store.promptsDir, "developer.md"), "# Developer\n\nBuild things.\n");
      saveBacklog(store.backlogPath, createEmptyBacklog("demo"));

      const rendered = renderPrompt({
        role: "developer",
        phase: "implementation",
        sprint: 2,
        store,
        now: new Date("2026-01-15T10:00:00.000Z"),
        logger: new SilentLogger(),
      });

      expect(rendered.prompt.startsWith("# Developer\n\nBuild things.\n\n---\n\n## Current Context\n")).toBe(true);
      expect(rendered.prompt).toContain("- **Sprint**: 2\n- **Phase**: implementation\n- **Role**: developer\n");
      expect(rendered.prompt).toContain("- **Timestamp**: 2026-01-15T10:00:00.000Z\n");
      expect(rendered.prompt).toContain('"sprintId": 2');
      expect(rendered.prompt.trimEnd().endsWith("See the prompt above for the required format.")).toBe(true);

      expect(rendered.path).toBe(join(testDir, "logs", "agent_output", "prompt_developer_implementation_sprint2.md"));
      expect(existsSync(rendered.path)).toBe(true);
    });
  });
});
