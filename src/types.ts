/**
 * Core types for the Cadence sprint controller
 */

// === Configuration ===

export interface SprintLimits {
  maxSprints: number;
  maxReworkCycles: number;
  initializationMaxLoops: number;
  planningMaxLoops: number;
  implementationMaxLoops: number;
  qaMaxLoops: number;
  reviewMaxLoops: number;
}

export interface CompletionConfig {
  doneSignalThreshold: number;
  idleLoopThreshold: number;
  testOnlyLoopThreshold: number;
  completionIndicatorThreshold: number;
  /** Phrases that count as an in-agent completion claim (case-insensitive) */
  indicators: string[];
}

export interface AgentConfig {
  /** "cli" spawns an agent command, "sdk" drives the Claude Agent SDK in-process */
  runner: AgentRunnerType;
  /** Executable for the cli runner: cursor-agent, opencode, claude, or anything with `args` */
  command: string;
  model: string;
  timeoutMinutes: number;
  /** Per-role timeout overrides in minutes */
  roleTimeouts: Partial<Record<Role, number>>;
  /** Custom argument template; `{model}` and `{prompt}` are substituted */
  args: string[] | null;
}

export interface Config {
  project: {
    name: string;
  };
  sprint: SprintLimits;
  rateLimiting: {
    maxCallsPerHour: number;
  };
  circuitBreaker: {
    noProgressThreshold: number;
    sameErrorThreshold: number;
  };
  completion: CompletionConfig;
  agent: AgentConfig;
  delays: {
    betweenCallsSeconds: number;
    errorRetrySeconds: number;
    connectionRetrySeconds: number;
  };
}

export type AgentRunnerType = "cli" | "sdk";

// === Sprint vocabulary ===

export const PHASES = ["initialization", "planning", "implementation", "qa", "review"] as const;
export type Phase = (typeof PHASES)[number];

export const ROLES = ["product_owner", "developer", "qa"] as const;
export type Role = (typeof ROLES)[number];

// === Tasks ===

export const TASK_STATUSES = [
  "backlog",
  "ready",
  "in_progress",
  "implemented",
  "qa_in_progress",
  "qa_passed",
  "qa_failed",
  "done",
  "cancelled",
] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_TYPES = ["feature", "bug", "spike", "infra", "chore"] as const;
export type TaskType = (typeof TASK_TYPES)[number];

/**
 * A backlog item. Field names match backlog.json, which the agent edits directly.
 */
export interface Task {
  id: string;              // e.g. "TASK-001"
  title: string;
  description?: string;
  type: TaskType;
  priority: number;        // 1 is most urgent
  story_points: number;
  status: TaskStatus;
  sprint_id: number | null;
  acceptance_criteria: string[];
  dependencies: string[];
  failure_reason?: string; // only while qa_failed
}

export interface Backlog {
  project: string;
  items: Task[];
  /** Entries that could not be read as tasks; written back unchanged on save */
  unreadable: unknown[];
  metadata: {
    totalItems: number;
    totalPoints: number;
    createdAt: string;
    lastUpdated: string;
  };
}

// === Sprint state ===

export type SprintOutcome = "in_progress" | "completed";

export interface SprintHistoryEntry {
  sprint: number;
  startedAt: string;
  endedAt: string | null;
  status: SprintOutcome;
}

export interface SprintState {
  currentSprint: number;   // 0 is initialization
  currentPhase: Phase;
  phaseLoopCount: number;
  reworkCount: number;
  projectDone: boolean;
  startedAt: string;
  lastUpdated: string;
  history: SprintHistoryEntry[];
}

// === Agent status block ===

export type TestsStatus = "PASSING" | "FAILING" | "NOT_RUN";

export interface AgentStatus {
  role: string;
  phase: string;
  sprint: number;
  tasksCompleted: number;
  tasksRemaining: number;
  blockers: string;
  storyPointsDone: number;
  testsStatus: TestsStatus;
  phaseComplete: boolean;
  projectDone: boolean;
  nextAction: string;
}

export type StatusBlockResult =
  | { present: true; status: AgentStatus }
  | { present: false };

// === Exit codes ===

/**
 * Process exit codes. Calling automation branches on these, so they never change.
 */
export const EXIT_CODES = {
  success: 0,
  error: 1,
  circuitOpen: 10,
  projectComplete: 20,
  maxSprints: 21,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
