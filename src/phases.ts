/**
 * Phase table: who runs each phase, how many loops it gets, and the
 * ground-truth predicate that ends it.
 *
 * Predicates look only at files on disk. A PHASE_COMPLETE claim in the
 * agent's status block never ends a phase by itself.
 */

import { existsSync } from "fs";
import { countByStatus, loadBacklog, sprintTasks } from "./backlog.js";
import type { Logger } from "./logger.js";
import type { StateStore } from "./state.js";
import type { Phase, Role, SprintLimits } from "./types.js";

export const PHASE_ROLES: Record<Phase, Role> = {
  initialization: "product_owner",
  planning: "product_owner",
  implementation: "developer",
  qa: "qa",
  review: "product_owner",
};

export function maxLoopsFor(phase: Phase, limits: SprintLimits): number {
  switch (phase) {
    case "initialization":
      return limits.initializationMaxLoops;
    case "planning":
      return limits.planningMaxLoops;
    case "implementation":
      return limits.implementationMaxLoops;
    case "qa":
      return limits.qaMaxLoops;
    case "review":
      return limits.reviewMaxLoops;
  }
}

export function planDocumentPaths(store: StateStore, sprint: number): string[] {
  return [
    store.projectPath("sprints", `sprint_${sprint}`, "plan.md"),
    store.projectPath("sprints", `sprint_${sprint}_plan.md`),
  ];
}

export function reviewDocumentPaths(store: StateStore, sprint: number): string[] {
  return [
    store.projectPath("reviews", `sprint_${sprint}_review.md`),
    store.projectPath("reviews", `sprint_${sprint}`, "review.md"),
  ];
}

export function hasPlanDocument(store: StateStore, sprint: number): boolean {
  return planDocumentPaths(store, sprint).some((path) => existsSync(path));
}

export function hasReviewDocument(store: StateStore, sprint: number): boolean {
  return reviewDocumentPaths(store, sprint).some((path) => existsSync(path));
}

/**
 * - initialization: the backlog has at least one item
 * - planning: a plan document exists for the sprint
 * - implementation: no sprint task is ready or in_progress
 * - qa: no sprint task is still implemented (waiting for QA)
 *
 * Implementation and qa are never complete while the backlog holds
 * unreadable entries, since those may belong to the sprint.
 * - review: a review document exists for the sprint
 */
export function isPhaseComplete(
  phase: Phase,
  sprint: number,
  store: StateStore,
  logger?: Logger
): boolean {
  switch (phase) {
    case "initialization": {
      const backlog = loadBacklog(store.backlogPath, logger);
      return backlog !== null && backlog.items.length > 0;
    }
    case "planning":
      return hasPlanDocument(store, sprint);
    case "implementation": {
      const backlog = loadBacklog(store.backlogPath, logger);
      if (backlog && backlog.unreadable.length > 0) return false;
      const tasks = backlog ? sprintTasks(backlog, sprint) : [];
      return countByStatus(tasks, "ready", "in_progress") === 0;
    }
    case "qa": {
      const backlog = loadBacklog(store.backlogPath, logger);
      if (backlog && backlog.unreadable.length > 0) return false;
      const tasks = backlog ? sprintTasks(backlog, sprint) : [];
      return countByStatus(tasks, "implemented") === 0;
    }
    case "review":
      return hasReviewDocument(store, sprint);
  }
}
