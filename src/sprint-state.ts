/**
 * Sprint state - where the run is in the project/sprint/phase hierarchy
 *
 * Persisted in .cadence/sprint_state.json after every change so a
 * restarted controller can resume the sprint it was in.
 */

import { existsSync, mkdirSync } from "fs";
import { ConsoleLogger, type Logger } from "./logger.js";
import { isRecord, nonNegativeInt, stringOrNull } from "./json.js";
import { STATE_FILES, type StateStore } from "./state.js";
import {
  PHASES,
  type Phase,
  type SprintHistoryEntry,
  type SprintOutcome,
  type SprintState,
} from "./types.js";

function isPhase(value: unknown): value is Phase {
  return PHASES.some((phase) => phase === value);
}

function isOutcome(value: unknown): value is SprintOutcome {
  return value === "in_progress" || value === "completed";
}

function normalizeHistory(raw: unknown): SprintHistoryEntry[] {
  if (!Array.isArray(raw)) return [];
  const entries: SprintHistoryEntry[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const sprint = nonNegativeInt(item.sprint);
    const startedAt = stringOrNull(item.startedAt);
    if (sprint === null || startedAt === null || !isOutcome(item.status)) continue;
    entries.push({ sprint, startedAt, endedAt: stringOrNull(item.endedAt), status: item.status });
  }
  return entries;
}

function normalizeSprintState(raw: unknown): SprintState | null {
  if (!isRecord(raw)) return null;

  const currentSprint = nonNegativeInt(raw.currentSprint);
  if (currentSprint === null || !isPhase(raw.currentPhase)) return null;

  const now = new Date().toISOString();
  return {
    currentSprint,
    currentPhase: raw.currentPhase,
    phaseLoopCount: nonNegativeInt(raw.phaseLoopCount) ?? 0,
    reworkCount: nonNegativeInt(raw.reworkCount) ?? 0,
    projectDone: raw.projectDone === true,
    startedAt: stringOrNull(raw.startedAt) ?? now,
    lastUpdated: stringOrNull(raw.lastUpdated) ?? now,
    history: normalizeHistory(raw.history),
  };
}

export class SprintStateManager {
  private logger: Logger;

  constructor(private readonly store: StateStore, logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger();
  }

  getState(): SprintState {
    const stored = this.store.readJson(STATE_FILES.sprintState, normalizeSprintState);
    if (stored) {
      return stored;
    }
    const now = new Date().toISOString();
    return this.save({
      currentSprint: 0,
      currentPhase: "initialization",
      phaseLoopCount: 0,
      reworkCount: 0,
      projectDone: false,
      startedAt: now,
      lastUpdated: now,
      history: [],
    });
  }

  /** Entering a phase resets its loop counter */
  setPhase(phase: Phase): void {
    const state = this.getState();
    this.save({ ...state, currentPhase: phase, phaseLoopCount: 0 });
    this.logger.log(`📍 Entered phase: ${phase}`);
  }

  incrementPhaseLoop(): number {
    const state = this.getState();
    return this.save({ ...state, phaseLoopCount: state.phaseLoopCount + 1 }).phaseLoopCount;
  }

  incrementRework(): number {
    const state = this.getState();
    return this.save({ ...state, reworkCount: state.reworkCount + 1 }).reworkCount;
  }

  /**
   * Begins the next sprint. Returns its number, or null when it would
   * exceed maxSprints.
   */
  startSprint(maxSprints: number): number | null {
    const state = this.getState();
    const sprint = state.currentSprint + 1;
    if (sprint > maxSprints) {
      this.logger.warn(`Sprint ceiling reached (${maxSprints}); not starting sprint ${sprint}`);
      return null;
    }

    this.save({
      ...state,
      currentSprint: sprint,
      currentPhase: "planning",
      phaseLoopCount: 0,
      reworkCount: 0,
      history: [
        ...state.history,
        { sprint, startedAt: new Date().toISOString(), endedAt: null, status: "in_progress" },
      ],
    });

    const sprintDir = this.store.projectPath("sprints", `sprint_${sprint}`);
    if (!existsSync(sprintDir)) {
      mkdirSync(sprintDir, { recursive: true });
    }

    this.logger.log(`🏃 Started sprint ${sprint}`);
    return sprint;
  }

  /**
   * Closes the current sprint in the history. The phase goes back to
   * planning so a restart starts the next sprint instead of resuming.
   */
  endSprint(): void {
    const state = this.getState();
    const endedAt = new Date().toISOString();
    this.save({
      ...state,
      currentPhase: "planning",
      phaseLoopCount: 0,
      reworkCount: 0,
      history: state.history.map((entry) =>
        entry.sprint === state.currentSprint && entry.endedAt === null
          ? { ...entry, endedAt, status: "completed" }
          : entry
      ),
    });
    this.logger.log(`🏁 Sprint ${state.currentSprint} completed`);
  }

  markProjectDone(): void {
    this.save({ ...this.getState(), projectDone: true });
  }

  historyEntry(sprint: number): SprintHistoryEntry | undefined {
    return this.getState().history.find((entry) => entry.sprint === sprint);
  }

  private save(state: SprintState): SprintState {
    const next = { ...state, lastUpdated: new Date().toISOString() };
    this.store.writeJson(STATE_FILES.sprintState, next);
    return next;
  }
}
