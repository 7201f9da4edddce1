/**
 * Workspace change detection
 *
 * The circuit breaker's progress signal is how many files one invocation
 * touched. A snapshot is taken before the agent runs and compared after:
 * dirty and untracked files are compared by mtime, and commits the agent
 * made in between are counted through the diff between the two HEADs.
 * Paths the controller itself writes on every invocation (state documents,
 * agent output logs) are left out, or every invocation would count as
 * progress.
 */

import { execSync } from "child_process";
import { statSync } from "fs";
import { join, relative, sep } from "path";

export interface WorkspaceSnapshot {
  head: string | null;
  /** Dirty or untracked path -> mtime (ms), or -1 when deleted */
  files: Map<string, number>;
}

export interface ChangeTracker {
  /** Null when `cwd` is not a git repository */
  snapshot(cwd: string): WorkspaceSnapshot | null;
  changesSince(cwd: string, before: WorkspaceSnapshot | null): number;
}

function git(args: string, cwd: string): string {
  return execSync(`git ${args}`, {
    cwd,
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "ignore"],
  });
}

function lines(output: string): string[] {
  return output.split("\n").filter((line) => line.trim() !== "");
}

/**
 * Ignored prefixes are project-relative, "/"-separated
 */
function isIgnored(path: string, ignored: string[]): boolean {
  return ignored.some((prefix) => path === prefix || path.startsWith(`${prefix}/`));
}

function mtime(path: string): number {
  try {
    return statSync(path).mtimeMs;
  } catch {
    return -1; // deleted
  }
}

function currentHead(cwd: string): string | null {
  try {
    return git("rev-parse HEAD", cwd).trim();
  } catch {
    return null; // no commits yet
  }
}

export function takeSnapshot(cwd: string, ignored: string[] = []): WorkspaceSnapshot | null {
  try {
    git("rev-parse --is-inside-work-tree", cwd);
  } catch {
    return null;
  }

  const paths = new Set([
    ...lines(git("diff --name-only --relative", cwd)),
    ...lines(git("diff --name-only --relative --cached", cwd)),
    ...lines(git("ls-files --others --exclude-standard", cwd)),
  ]);

  const files = new Map<string, number>();
  for (const path of paths) {
    if (!isIgnored(path, ignored)) {
      files.set(path, mtime(join(cwd, path)));
    }
  }
  return { head: currentHead(cwd), files };
}

/**
 * Number of distinct files that differ between two snapshots
 */
export function diffSnapshots(
  before: WorkspaceSnapshot,
  after: WorkspaceSnapshot,
  committed: string[] = []
): number {
  const changed = new Set(committed);
  for (const [path, time] of after.files) {
    if (before.files.get(path) !== time) changed.add(path);
  }
  for (const path of before.files.keys()) {
    if (!after.files.has(path)) changed.add(path);
  }
  return changed.size;
}

/**
 * Change tracker over git. `ignored` holds paths relative to the project
 * root whose changes never count.
 */
export function createGitChangeTracker(ignored: string[] = []): ChangeTracker {
  return {
    snapshot: (cwd) => takeSnapshot(cwd, ignored),

    changesSince(cwd, before) {
      const after = takeSnapshot(cwd, ignored);
      if (!after) return 0;
      const baseline = before ?? { head: after.head, files: new Map<string, number>() };

      let committed: string[] = [];
      if (baseline.head && after.head && baseline.head !== after.head) {
        committed = lines(git(`diff --name-only --relative ${baseline.head} ${after.head}`, cwd));
      } else if (!baseline.head && after.head) {
        committed = lines(git(`show --name-only --relative --pretty=format: ${after.head}`, cwd));
      }
      return diffSnapshots(
        baseline,
        after,
        committed.filter((path) => !isIgnored(path, ignored))
      );
    },
  };
}

/**
 * Project-relative form of the directories the controller writes into
 */
export function controllerPaths(projectRoot: string, dirs: string[]): string[] {
  return dirs
    .map((dir) => relative(projectRoot, dir).split(sep).join("/"))
    .filter((path) => path !== "" && !path.startsWith(".."));
}
