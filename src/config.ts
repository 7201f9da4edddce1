/**
 * Config management for Cadence
 *
 * Cadence is project-based: config lives in .cadence/ at the project root.
 * Commands look for .cadence/config.json in the current directory or parents.
 * The config is read once per run; edits take effect on the next run.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { isRecord } from "./json.js";
import { ROLES, type AgentRunnerType, type Config, type Role } from "./types.js";

export const CADENCE_FOLDER = ".cadence";
const CONFIG_FILE = "config.json";

/**
 * Phrases an agent tends to write when it believes the whole project is
 * finished. Only project-scoped wording: "all tasks complete" also ends
 * every sprint, so it is not here. Add to the list through config rather
 * than loosening the matching.
 */
export const DEFAULT_COMPLETION_INDICATORS = [
  "project is complete",
  "project complete",
  "project is finished",
  "entire backlog is done",
  "nothing left in the backlog",
];

/**
 * Default config used when initializing a new project
 */
export function createDefaultConfig(projectName: string): Config {
  return {
    project: { name: projectName },
    sprint: {
      maxSprints: 10,
      maxReworkCycles: 3,
      initializationMaxLoops: 10,
      planningMaxLoops: 3,
      implementationMaxLoops: 20,
      qaMaxLoops: 5,
      reviewMaxLoops: 2,
    },
    rateLimiting: {
      maxCallsPerHour: 100,
    },
    circuitBreaker: {
      noProgressThreshold: 5,
      sameErrorThreshold: 3,
    },
    completion: {
      doneSignalThreshold: 3,
      idleLoopThreshold: 5,
      testOnlyLoopThreshold: 5,
      completionIndicatorThreshold: 3,
      indicators: [...DEFAULT_COMPLETION_INDICATORS],
    },
    agent: {
      runner: "cli",
      command: "cursor-agent",
      model: "auto",
      timeoutMinutes: 15,
      roleTimeouts: {},
      args: null,
    },
    delays: {
      betweenCallsSeconds: 5,
      errorRetrySeconds: 10,
      connectionRetrySeconds: 30,
    },
  };
}

/**
 * Finds the .cadence config directory by walking up from startDir.
 * Returns null if not inside an initialized project.
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  while (true) {
    const cadenceDir = join(dir, CADENCE_FOLDER);
    if (existsSync(join(cadenceDir, CONFIG_FILE))) {
      return cadenceDir;
    }

    const parent = dirname(dir);
    if (parent === dir) break; // Reached root
    dir = parent;
  }

  return null;
}

/**
 * Gets the .cadence config directory.
 * Throws if not inside an initialized project.
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 */
export function getConfigDir(startDir?: string): string {
  const dir = findConfigDir(startDir);
  if (!dir) {
    throw new Error(
      "Not in a Cadence project. Run 'cadence init <name>' in the project directory first."
    );
  }
  return dir;
}

/**
 * The project root is the directory that holds .cadence/
 */
export function getProjectRoot(startDir?: string): string {
  return dirname(getConfigDir(startDir));
}

export function getConfigPath(startDir?: string): string {
  return join(getConfigDir(startDir), CONFIG_FILE);
}

/**
 * Ensures the .cadence/ directory exists in the given directory.
 */
export function ensureConfigDir(baseDir: string = process.cwd()): string {
  const cadenceDir = join(baseDir, CADENCE_FOLDER);
  if (!existsSync(cadenceDir)) {
    mkdirSync(cadenceDir, { recursive: true });
  }
  return cadenceDir;
}

export function isInitialized(startDir?: string): boolean {
  return findConfigDir(startDir) !== null;
}

/**
 * Loads config from .cadence/config.json
 * Throws if the project is not initialized or the file is invalid.
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 */
export function loadConfig(startDir?: string): Config {
  const configPath = getConfigPath(startDir);

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new Error(
      `Failed to load config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return validateConfig(parsed);
}

/**
 * Saves config to .cadence/config.json under the given project root
 */
export function saveConfig(config: Config, projectRoot: string): void {
  const configPath = join(ensureConfigDir(projectRoot), CONFIG_FILE);

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
  } catch (err) {
    throw new Error(
      `Failed to save config to ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Creates .cadence/config.json with defaults in the given directory.
 * Throws if the directory is already initialized.
 */
export function initializeConfig(projectRoot: string, projectName: string): Config {
  const configPath = join(projectRoot, CADENCE_FOLDER, CONFIG_FILE);
  if (existsSync(configPath)) {
    throw new Error(`Cadence is already initialized. Config exists at ${configPath}`);
  }

  const config = createDefaultConfig(projectName);
  saveConfig(config, projectRoot);
  return config;
}

// === Validation ===

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`Invalid config: "${key}" must be an object`);
  }
  return value;
}

function positiveInt(
  obj: Record<string, unknown>,
  key: string,
  fallback: number,
  path: string
): number {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid config: "${path}.${key}" must be a positive integer`);
  }
  return value;
}

function nonNegativeNumber(
  obj: Record<string, unknown>,
  key: string,
  fallback: number,
  path: string
): number {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid config: "${path}.${key}" must be a non-negative number`);
  }
  return value;
}

function str(obj: Record<string, unknown>, key: string, fallback: string, path: string): string {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`Invalid config: "${path}.${key}" must be a non-empty string`);
  }
  return value;
}

function stringList(value: unknown, path: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new Error(`Invalid config: "${path}" must be a list of strings`);
  }
  return value;
}

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

function runnerType(value: string): AgentRunnerType {
  if (value === "cli" || value === "sdk") return value;
  throw new Error(`Invalid config: "agent.runner" must be "cli" or "sdk", got "${value}"`);
}

/**
 * Validates and normalizes a parsed config object, filling defaults
 */
export function validateConfig(parsed: unknown): Config {
  if (!isRecord(parsed)) {
    throw new Error("Invalid config: expected a JSON object");
  }

  const defaults = createDefaultConfig("project");
  const project = section(parsed, "project");
  const sprint = section(parsed, "sprint");
  const rate = section(parsed, "rateLimiting");
  const breaker = section(parsed, "circuitBreaker");
  const completion = section(parsed, "completion");
  const agent = section(parsed, "agent");
  const delays = section(parsed, "delays");

  const roleTimeouts: Partial<Record<Role, number>> = {};
  const rawRoleTimeouts = section(agent, "roleTimeouts");
  for (const key of Object.keys(rawRoleTimeouts)) {
    if (!isRole(key)) {
      throw new Error(`Invalid config: unknown role "${key}" in agent.roleTimeouts`);
    }
    roleTimeouts[key] = positiveInt(rawRoleTimeouts, key, defaults.agent.timeoutMinutes, "agent.roleTimeouts");
  }

  return {
    project: {
      name: str(project, "name", defaults.project.name, "project"),
    },
    sprint: {
      maxSprints: positiveInt(sprint, "maxSprints", defaults.sprint.maxSprints, "sprint"),
      maxReworkCycles: positiveInt(sprint, "maxReworkCycles", defaults.sprint.maxReworkCycles, "sprint"),
      initializationMaxLoops: positiveInt(sprint, "initializationMaxLoops", defaults.sprint.initializationMaxLoops, "sprint"),
      planningMaxLoops: positiveInt(sprint, "planningMaxLoops", defaults.sprint.planningMaxLoops, "sprint"),
      implementationMaxLoops: positiveInt(sprint, "implementationMaxLoops", defaults.sprint.implementationMaxLoops, "sprint"),
      qaMaxLoops: positiveInt(sprint, "qaMaxLoops", defaults.sprint.qaMaxLoops, "sprint"),
      reviewMaxLoops: positiveInt(sprint, "reviewMaxLoops", defaults.sprint.reviewMaxLoops, "sprint"),
    },
    rateLimiting: {
      maxCallsPerHour: positiveInt(rate, "maxCallsPerHour", defaults.rateLimiting.maxCallsPerHour, "rateLimiting"),
    },
    circuitBreaker: {
      noProgressThreshold: positiveInt(breaker, "noProgressThreshold", defaults.circuitBreaker.noProgressThreshold, "circuitBreaker"),
      sameErrorThreshold: positiveInt(breaker, "sameErrorThreshold", defaults.circuitBreaker.sameErrorThreshold, "circuitBreaker"),
    },
    completion: {
      doneSignalThreshold: positiveInt(completion, "doneSignalThreshold", defaults.completion.doneSignalThreshold, "completion"),
      idleLoopThreshold: positiveInt(completion, "idleLoopThreshold", defaults.completion.idleLoopThreshold, "completion"),
      testOnlyLoopThreshold: positiveInt(completion, "testOnlyLoopThreshold", defaults.completion.testOnlyLoopThreshold, "completion"),
      completionIndicatorThreshold: positiveInt(completion, "completionIndicatorThreshold", defaults.completion.completionIndicatorThreshold, "completion"),
      indicators:
        completion.indicators === undefined
          ? defaults.completion.indicators
          : stringList(completion.indicators, "completion.indicators"),
    },
    agent: {
      runner: runnerType(str(agent, "runner", defaults.agent.runner, "agent")),
      command: str(agent, "command", defaults.agent.command, "agent"),
      model: str(agent, "model", defaults.agent.model, "agent"),
      timeoutMinutes: positiveInt(agent, "timeoutMinutes", defaults.agent.timeoutMinutes, "agent"),
      roleTimeouts,
      args:
        agent.args === undefined || agent.args === null
          ? null
          : stringList(agent.args, "agent.args"),
    },
    delays: {
      betweenCallsSeconds: nonNegativeNumber(delays, "betweenCallsSeconds", defaults.delays.betweenCallsSeconds, "delays"),
      errorRetrySeconds: nonNegativeNumber(delays, "errorRetrySeconds", defaults.delays.errorRetrySeconds, "delays"),
      connectionRetrySeconds: nonNegativeNumber(delays, "connectionRetrySeconds", defaults.delays.connectionRetrySeconds, "delays"),
    },
  };
}

/**
 * Timeout in milliseconds for one invocation by the given role
 */
export function getAgentTimeoutMs(config: Config, role: Role): number {
  const minutes = config.agent.roleTimeouts[role] ?? config.agent.timeoutMinutes;
  return minutes * 60 * 1000;
}
