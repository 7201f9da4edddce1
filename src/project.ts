/**
 * Project bootstrap for `cadence init`
 */

import { existsSync, mkdirSync } from "fs";
import { createEmptyBacklog, saveBacklog } from "./backlog.js";
import { CADENCE_FOLDER, initializeConfig } from "./config.js";
import { installDefaultPrompts } from "./prompts.js";
import { StateStore } from "./state.js";
import type { Logger } from "./logger.js";
import type { Config } from "./types.js";

export interface InitResult {
  config: Config;
  /** Absolute paths of everything written */
  created: string[];
}

const PROJECT_DIRS: string[][] = [["sprints"], ["reviews"], ["logs", "agent_output"], ["prompts"]];

/**
 * Writes the default config, the working directories, an empty backlog
 * (unless one exists) and the default role prompts.
 * Throws when the directory is already initialized.
 */
export function initializeProject(projectRoot: string, projectName: string, logger?: Logger): InitResult {
  const config = initializeConfig(projectRoot, projectName);
  const store = new StateStore(projectRoot, logger);
  const created: string[] = [store.projectPath(CADENCE_FOLDER, "config.json")];

  store.ensureStateDir();
  for (const segments of PROJECT_DIRS) {
    const dir = store.projectPath(...segments);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
      created.push(dir);
    }
  }

  if (!existsSync(store.backlogPath)) {
    saveBacklog(store.backlogPath, createEmptyBacklog(projectName));
    created.push(store.backlogPath);
  }

  created.push(...installDefaultPrompts(store));
  return { config, created };
}
