/**
 * Backlog - the task list in backlog.json
 *
 * The agent edits backlog.json directly; the controller only reads it.
 * The CRUD helpers here back the `cadence backlog` commands, and the
 * query helpers back the phase predicates and the completion detector.
 */

import { existsSync, readFileSync } from "fs";
import { ConsoleLogger, type Logger } from "./logger.js";
import { isRecord, nonNegativeInt, stringOrNull } from "./json.js";
import { writeJsonAtomic } from "./state.js";
import {
  TASK_STATUSES,
  TASK_TYPES,
  type Backlog,
  type Task,
  type TaskStatus,
  type TaskType,
} from "./types.js";

// === Status graph ===

/**
 * Forward transitions. Any status may also move to cancelled.
 */
const TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  backlog: ["ready"],
  ready: ["in_progress"],
  in_progress: ["implemented"],
  implemented: ["qa_in_progress"],
  qa_in_progress: ["qa_passed", "qa_failed"],
  qa_passed: ["done"],
  qa_failed: ["in_progress"],
  done: [],
  cancelled: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  if (from === to) return false;
  if (to === "cancelled") return from !== "cancelled";
  return TRANSITIONS[from].includes(to);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export function isTaskType(value: unknown): value is TaskType {
  return TASK_TYPES.some((type) => type === value);
}

// === Loading & saving ===

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function normalizeTask(raw: unknown): Task | null {
  if (!isRecord(raw)) return null;
  if (typeof raw.id !== "string" || typeof raw.title !== "string" || !isTaskStatus(raw.status)) {
    return null;
  }

  const task: Task = {
    id: raw.id,
    title: raw.title,
    type: isTaskType(raw.type) ? raw.type : "feature",
    priority: nonNegativeInt(raw.priority) ?? 3,
    story_points: nonNegativeInt(raw.story_points) ?? 0,
    status: raw.status,
    sprint_id: nonNegativeInt(raw.sprint_id),
    acceptance_criteria: stringArray(raw.acceptance_criteria),
    dependencies: stringArray(raw.dependencies),
  };

  const description = stringOrNull(raw.description);
  if (description !== null) task.description = description;
  const failureReason = stringOrNull(raw.failure_reason);
  if (failureReason !== null) task.failure_reason = failureReason;

  return task;
}

export function createEmptyBacklog(project: string): Backlog {
  const now = new Date().toISOString();
  return {
    project,
    items: [],
    unreadable: [],
    metadata: { totalItems: 0, totalPoints: 0, createdAt: now, lastUpdated: now },
  };
}

/**
 * Loads backlog.json. Returns null when the file is missing or unreadable,
 * which callers treat as "not initialized". Entries that are not valid
 * tasks land in `unreadable`, and the backlog never counts as complete
 * while any remain.
 */
export function loadBacklog(path: string, logger: Logger = new ConsoleLogger()): Backlog | null {
  if (!existsSync(path)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    logger.warn(`Failed to read backlog ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.items)) {
    logger.warn(`Ignoring backlog ${path}: expected an object with an "items" list`);
    return null;
  }

  const items: Task[] = [];
  const unreadable: unknown[] = [];
  for (const raw of parsed.items) {
    const task = normalizeTask(raw);
    if (task) {
      items.push(task);
    } else {
      logger.warn(`Malformed backlog item, treated as unresolved: ${JSON.stringify(raw)}`);
      unreadable.push(raw);
    }
  }

  const metadata = isRecord(parsed.metadata) ? parsed.metadata : {};
  const now = new Date().toISOString();
  return {
    project: stringOrNull(parsed.project) ?? "",
    items,
    unreadable,
    metadata: {
      totalItems: items.length,
      totalPoints: sumPoints(items),
      createdAt: stringOrNull(metadata.createdAt) ?? now,
      lastUpdated: stringOrNull(metadata.lastUpdated) ?? now,
    },
  };
}

function requireBacklog(path: string, logger?: Logger): Backlog {
  const backlog = loadBacklog(path, logger);
  if (!backlog) {
    throw new Error(`No backlog at ${path}. Run 'cadence init <name>' first.`);
  }
  return backlog;
}

/**
 * Writes the backlog with recomputed totals. Unreadable entries go back
 * after the tasks so a CLI edit never loses what the agent wrote.
 */
export function saveBacklog(path: string, backlog: Backlog): Backlog {
  const saved: Backlog = {
    ...backlog,
    metadata: {
      ...backlog.metadata,
      totalItems: backlog.items.length,
      totalPoints: sumPoints(backlog.items),
      lastUpdated: new Date().toISOString(),
    },
  };
  writeJsonAtomic(path, {
    project: saved.project,
    items: [...saved.items, ...saved.unreadable],
    metadata: saved.metadata,
  });
  return saved;
}

// === CRUD ===

/**
 * Next id after the highest TASK-NNN in use
 */
export function nextTaskId(items: Task[]): string {
  let highest = 0;
  for (const item of items) {
    const match = item.id.match(/^TASK-(\d+)$/);
    if (match) {
      highest = Math.max(highest, parseInt(match[1], 10));
    }
  }
  return `TASK-${String(highest + 1).padStart(3, "0")}`;
}

export interface NewTask {
  title: string;
  description?: string;
  type?: TaskType;
  priority?: number;
  storyPoints?: number;
  acceptanceCriteria?: string[];
  dependencies?: string[];
}

export function addTask(path: string, input: NewTask, logger?: Logger): Task {
  const backlog = requireBacklog(path, logger);

  const task: Task = {
    id: nextTaskId(backlog.items),
    title: input.title,
    type: input.type ?? "feature",
    priority: input.priority ?? 3,
    story_points: input.storyPoints ?? 0,
    status: "backlog",
    sprint_id: null,
    acceptance_criteria: input.acceptanceCriteria ?? [],
    dependencies: input.dependencies ?? [],
  };
  if (input.description) task.description = input.description;

  saveBacklog(path, { ...backlog, items: [...backlog.items, task] });
  return task;
}

/**
 * Moves a task along the status graph. A failure reason is kept only
 * while the task is qa_failed.
 */
export function updateTaskStatus(
  path: string,
  id: string,
  status: TaskStatus,
  reason?: string,
  logger?: Logger
): Task {
  const backlog = requireBacklog(path, logger);
  const existing = backlog.items.find((item) => item.id === id);
  if (!existing) {
    throw new Error(`Task ${id} not found`);
  }
  if (!canTransition(existing.status, status)) {
    throw new Error(`Cannot move ${id} from ${existing.status} to ${status}`);
  }

  const updated: Task = { ...existing, status };
  delete updated.failure_reason;
  if (status === "qa_failed") {
    updated.failure_reason = reason ?? "unspecified";
  }

  saveBacklog(path, {
    ...backlog,
    items: backlog.items.map((item) => (item.id === id ? updated : item)),
  });
  return updated;
}

export interface TaskFilter {
  status?: TaskStatus;
  sprint?: number;
}

export function listTasks(backlog: Backlog, filter: TaskFilter = {}): Task[] {
  return backlog.items.filter(
    (item) =>
      (filter.status === undefined || item.status === filter.status) &&
      (filter.sprint === undefined || item.sprint_id === filter.sprint)
  );
}

export interface BacklogSummary {
  total: number;
  byStatus: Record<TaskStatus, number>;
  totalPoints: number;
  donePoints: number;
  unreadable: number;
}

export function summarizeBacklog(backlog: Backlog): BacklogSummary {
  const byStatus: Record<TaskStatus, number> = {
    backlog: 0,
    ready: 0,
    in_progress: 0,
    implemented: 0,
    qa_in_progress: 0,
    qa_passed: 0,
    qa_failed: 0,
    done: 0,
    cancelled: 0,
  };
  for (const item of backlog.items) {
    byStatus[item.status]++;
  }
  return {
    total: backlog.items.length,
    byStatus,
    totalPoints: sumPoints(backlog.items),
    donePoints: sumPoints(backlog.items.filter((item) => item.status === "done")),
    unreadable: backlog.unreadable.length,
  };
}

// === Controller queries ===

export function sprintTasks(backlog: Backlog, sprint: number): Task[] {
  return backlog.items.filter((item) => item.sprint_id === sprint);
}

export function countByStatus(tasks: Task[], ...statuses: TaskStatus[]): number {
  return tasks.filter((task) => statuses.includes(task.status)).length;
}

export function hasQaFailedTasks(backlog: Backlog, sprint: number): boolean {
  return countByStatus(sprintTasks(backlog, sprint), "qa_failed") > 0;
}

/**
 * True when the backlog has items, every item is done or cancelled, and
 * nothing in it failed to parse. An open P1 bug is unresolved like any
 * other task; a cancelled one counts as resolved.
 */
export function isBacklogComplete(backlog: Backlog | null): boolean {
  if (!backlog || backlog.items.length === 0 || backlog.unreadable.length > 0) return false;
  return backlog.items.every((item) => item.status === "done" || item.status === "cancelled");
}

function sumPoints(items: Task[]): number {
  return items.reduce((sum, item) => sum + item.story_points, 0);
}
