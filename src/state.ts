/**
 * State Store - persisted controller documents
 *
 * One StateStore owns a project's .cadence/ directory and the shared
 * documents at the project root. Components receive the store in their
 * constructor; nothing reads state files through module-level globals.
 *
 * Every write replaces the whole document: the JSON goes to `<name>.tmp`
 * and is renamed over the target, so a reader never sees half a file.
 * Correctness assumes one controller per project, enforced by the lock.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { join } from "path";
import { CADENCE_FOLDER } from "./config.js";
import { ConsoleLogger, type Logger } from "./logger.js";

const LOCK_FILE = "controller.lock";

/** Controller documents under .cadence/ */
export const STATE_FILES = {
  sprintState: "sprint_state.json",
  circuitBreaker: "circuit_breaker.json",
  circuitHistory: "circuit_breaker_history.json",
  rateLimit: "rate_limit.json",
  exitSignals: "exit_signals.json",
  status: "status.json",
} as const;

export type StateFile = (typeof STATE_FILES)[keyof typeof STATE_FILES];

/**
 * Lock file content structure
 */
export interface LockInfo {
  pid: number;
  startedAt: string;
}

/**
 * Writes JSON to `path` via a temp file and rename
 */
export function writeJsonAtomic(path: string, value: unknown): void {
  const tmpPath = `${path}.tmp`;
  try {
    writeFileSync(tmpPath, JSON.stringify(value, null, 2) + "\n", "utf-8");
    renameSync(tmpPath, path);
  } catch (err) {
    throw new Error(
      `Failed to write ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export class StateStore {
  readonly stateDir: string;
  private logger: Logger;

  constructor(readonly projectRoot: string, logger?: Logger) {
    this.stateDir = join(projectRoot, CADENCE_FOLDER);
    this.logger = logger ?? new ConsoleLogger();
  }

  /** Path of a document under .cadence/ */
  statePath(name: string): string {
    return join(this.stateDir, name);
  }

  /** Path relative to the project root */
  projectPath(...segments: string[]): string {
    return join(this.projectRoot, ...segments);
  }

  get backlogPath(): string {
    return this.projectPath("backlog.json");
  }

  get fixPlanPath(): string {
    return this.projectPath("@fix_plan.md");
  }

  get promptsDir(): string {
    return this.projectPath("prompts");
  }

  get agentOutputDir(): string {
    return this.projectPath("logs", "agent_output");
  }

  get logFilePath(): string {
    return this.statePath(join("logs", "cadence.log"));
  }

  get metricsDbPath(): string {
    return this.statePath("metrics.db");
  }

  ensureStateDir(): void {
    if (!existsSync(this.stateDir)) {
      mkdirSync(this.stateDir, { recursive: true });
    }
  }

  exists(name: string): boolean {
    return existsSync(this.statePath(name));
  }

  /**
   * Reads a document under .cadence/ and passes it through `normalize`.
   * Returns null when the file is missing, unparsable, or rejected by
   * `normalize`; callers then recreate the document from defaults.
   */
  readJson<T>(name: string, normalize: (raw: unknown) => T | null): T | null {
    const path = this.statePath(name);
    if (!existsSync(path)) {
      return null;
    }

    try {
      const normalized = normalize(JSON.parse(readFileSync(path, "utf-8")));
      if (normalized === null) {
        this.logger.warn(`Ignoring malformed state file ${path}; starting fresh.`);
      }
      return normalized;
    } catch (err) {
      this.logger.warn(
        `Failed to load state from ${path}: ${err instanceof Error ? err.message : String(err)}`
      );
      return null;
    }
  }

  writeJson(name: string, value: unknown): void {
    this.ensureStateDir();
    writeJsonAtomic(this.statePath(name), value);
  }

  remove(name: string): void {
    const path = this.statePath(name);
    if (existsSync(path)) {
      unlinkSync(path);
    }
  }

  // ============================================================
  // Lock File Management
  // ============================================================

  get lockPath(): string {
    return this.statePath(LOCK_FILE);
  }

  /**
   * Attempts to acquire the controller lock.
   * Returns true if acquired, false if another live controller holds it.
   */
  acquireLock(): boolean {
    this.ensureStateDir();

    if (this.getLockInfo()) {
      return false;
    }

    // Missing, stale, or unreadable: take it over
    const lockInfo: LockInfo = {
      pid: process.pid,
      startedAt: new Date().toISOString(),
    };
    writeFileSync(this.lockPath, JSON.stringify(lockInfo, null, 2));
    return true;
  }

  releaseLock(): void {
    if (!existsSync(this.lockPath)) {
      return;
    }
    try {
      unlinkSync(this.lockPath);
    } catch (err) {
      this.logger.warn(
        `Failed to remove lock file ${this.lockPath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  /**
   * Gets info about the current lock holder, or null if the lock is
   * missing or held by a process that no longer exists.
   */
  getLockInfo(): LockInfo | null {
    if (!existsSync(this.lockPath)) {
      return null;
    }

    let lockInfo: LockInfo;
    try {
      const parsed: unknown = JSON.parse(readFileSync(this.lockPath, "utf-8"));
      if (
        typeof parsed !== "object" ||
        parsed === null ||
        !("pid" in parsed) ||
        typeof parsed.pid !== "number" ||
        !("startedAt" in parsed) ||
        typeof parsed.startedAt !== "string"
      ) {
        return null;
      }
      lockInfo = { pid: parsed.pid, startedAt: parsed.startedAt };
    } catch {
      return null; // Unreadable lock counts as no lock
    }

    try {
      process.kill(lockInfo.pid, 0); // Signal 0 = check if process exists
      return lockInfo;
    } catch {
      return null; // Stale lock
    }
  }
}
