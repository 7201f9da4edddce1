/**
 * Prompt rendering
 *
 * Each role has a base prompt in prompts/{role}.md at the project root
 * (seeded from templates/prompts/ by `cadence init`). Every invocation
 * appends the current sprint context to it.
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { loadBacklog, sprintTasks, summarizeBacklog, type BacklogSummary } from "./backlog.js";
import type { Logger } from "./logger.js";
import type { StateStore } from "./state.js";
import { STATUS_BLOCK_START } from "./status-block.js";
import type { Backlog, Phase, Role } from "./types.js";

export interface SessionContext {
  sprintId: number;
  phase: Phase;
  backlog: {
    totalItems: number;
    totalPoints: number;
    byStatus: BacklogSummary["byStatus"];
  } | null;
  sprintStats: {
    sprintItems: number;
    sprintPoints: number;
    completedPoints: number;
  } | null;
}

/**
 * Packaged default prompts. Works from both src/ and dist/.
 */
export function templatesDir(): string {
  const thisDir = dirname(fileURLToPath(import.meta.url));
  return join(thisDir, "..", "templates", "prompts");
}

/**
 * Copies the packaged role prompts into the project, keeping any that
 * already exist. Returns the files written.
 */
export function installDefaultPrompts(store: StateStore): string[] {
  const source = templatesDir();
  const target = store.promptsDir;
  if (!existsSync(target)) {
    mkdirSync(target, { recursive: true });
  }

  const written: string[] = [];
  for (const file of readdirSync(source)) {
    if (!file.endsWith(".md")) continue;
    const destination = join(target, file);
    if (!existsSync(destination)) {
      copyFileSync(join(source, file), destination);
      written.push(destination);
    }
  }
  return written;
}

export function buildSessionContext(backlog: Backlog | null, sprint: number, phase: Phase): SessionContext {
  if (!backlog) {
    return { sprintId: sprint, phase, backlog: null, sprintStats: null };
  }

  const summary = summarizeBacklog(backlog);
  const inSprint = sprintTasks(backlog, sprint);
  return {
    sprintId: sprint,
    phase,
    backlog: {
      totalItems: summary.total,
      totalPoints: summary.totalPoints,
      byStatus: summary.byStatus,
    },
    sprintStats:
      sprint > 0
        ? {
            sprintItems: inSprint.length,
            sprintPoints: inSprint.reduce((sum, task) => sum + task.story_points, 0),
            completedPoints: inSprint
              .filter((task) => task.status === "done")
              .reduce((sum, task) => sum + task.story_points, 0),
          }
        : null,
  };
}

export interface RenderPromptOptions {
  role: Role;
  phase: Phase;
  sprint: number;
  store: StateStore;
  now?: Date;
  logger?: Logger;
}

export interface RenderedPrompt {
  prompt: string;
  /** Copy kept under logs/agent_output/ for inspection */
  path: string;
}

/**
 * Base prompt for the role plus a "Current Context" section.
 * Throws when the role's prompt file is missing.
 */
export function renderPrompt(options: RenderPromptOptions): RenderedPrompt {
  const { role, phase, sprint, store } = options;
  const basePath = join(store.promptsDir, `${role}.md`);
  if (!existsSync(basePath)) {
    throw new Error(`Prompt file not found: ${basePath}`);
  }

  let base: string;
  try {
    base = readFileSync(basePath, "utf-8");
  } catch (err) {
    throw new Error(`Failed to read prompt ${basePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const context = buildSessionContext(loadBacklog(store.backlogPath, options.logger), sprint, phase);
  const timestamp = (options.now ?? new Date()).toISOString();

  const prompt = [
    base.trimEnd(),
    "",
    "---",
    "",
    "## Current Context",
    "",
    `- **Sprint**: ${sprint}`,
    `- **Phase**: ${phase}`,
    `- **Role**: ${role}`,
    `- **Timestamp**: ${timestamp}`,
    "",
    "### Session Context",
    "```json",
    JSON.stringify(context, null, 2),
    "```",
    "",
    "---",
    "",
    `**IMPORTANT**: Your response MUST end with a ${STATUS_BLOCK_START} block. See the prompt above for the required format.`,
    "",
  ].join("\n");

  const outputDir = store.agentOutputDir;
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }
  const path = join(outputDir, `prompt_${role}_${phase}_sprint${sprint}.md`);
  writeFileSync(path, prompt);

  return { prompt, path };
}
