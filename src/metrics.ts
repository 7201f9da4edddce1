/**
 * Metrics Database - SQLite for invocation and sprint tracking
 *
 * One row per agent invocation and one per sprint, kept in
 * .cadence/metrics.db for `cadence metrics`.
 */

import Database from "better-sqlite3";
import { dirname } from "path";
import { mkdirSync, existsSync } from "fs";
import type { AgentOutcome } from "./agent-runner-interface.js";
import type { Phase, Role } from "./types.js";

let dbPath: string | null = null;
let db: Database.Database | null = null;

/**
 * Invocation database record
 */
export interface InvocationRecord {
  id: number;
  sprint: number;
  phase: string;
  role: string;
  loop: number;
  started_at: string;
  duration_ms: number;
  outcome: string;
  files_changed: number;
  had_error: number; // 0 or 1
  output_length: number;
}

export interface NewInvocation {
  sprint: number;
  phase: Phase;
  role: Role;
  loop: number;
  startedAt: Date;
  durationMs: number;
  outcome: AgentOutcome;
  filesChanged: number;
  hadError: boolean;
  outputLength: number;
}

/**
 * Sprint run database record
 */
export interface SprintRunRecord {
  sprint: number;
  started_at: string;
  ended_at: string | null;
  status: "in_progress" | "completed" | "halted";
  rework_cycles: number;
}

/**
 * Aggregated metrics by phase
 */
export interface PhaseMetrics {
  phase: string;
  invocation_count: number;
  success_count: number;
  avg_duration_ms: number;
  files_changed: number;
}

export interface OutcomeCount {
  outcome: string;
  count: number;
}

/**
 * Points the module at a database file (":memory:" in tests).
 * Closes any open connection.
 */
export function initDb(path: string): void {
  closeDb();
  dbPath = path;
}

/**
 * Gets or creates the database connection
 */
export function getMetricsDb(): Database.Database {
  if (db) return db;
  if (!dbPath) {
    throw new Error("Metrics database not initialized; call initDb() first");
  }

  if (dbPath !== ":memory:") {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(dbPath);

  // Enable WAL mode for better concurrent access
  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS invocations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sprint INTEGER NOT NULL,
      phase TEXT NOT NULL,
      role TEXT NOT NULL,
      loop INTEGER NOT NULL,
      started_at TEXT NOT NULL,
      duration_ms INTEGER NOT NULL DEFAULT 0,
      outcome TEXT NOT NULL,
      files_changed INTEGER NOT NULL DEFAULT 0,
      had_error INTEGER NOT NULL DEFAULT 0,
      output_length INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS sprint_runs (
      sprint INTEGER PRIMARY KEY,
      started_at TEXT NOT NULL,
      ended_at TEXT,
      status TEXT NOT NULL DEFAULT 'in_progress',
      rework_cycles INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_invocation_sprint ON invocations(sprint);
    CREATE INDEX IF NOT EXISTS idx_invocation_phase ON invocations(phase);
  `);

  return db;
}

export function recordInvocation(invocation: NewInvocation): void {
  const database = getMetricsDb();
  const stmt = database.prepare<[number, string, string, number, string, number, string, number, number, number]>(`
    INSERT INTO invocations
      (sprint, phase, role, loop, started_at, duration_ms, outcome, files_changed, had_error, output_length)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  stmt.run(
    invocation.sprint,
    invocation.phase,
    invocation.role,
    invocation.loop,
    invocation.startedAt.toISOString(),
    Math.round(invocation.durationMs),
    invocation.outcome,
    invocation.filesChanged,
    invocation.hadError ? 1 : 0,
    invocation.outputLength
  );
}

/**
 * Records the start of a sprint. A resumed sprint keeps its original start.
 */
export function recordSprintStart(sprint: number, startedAt: Date): void {
  const database = getMetricsDb();
  const stmt = database.prepare<[number, string]>(`
    INSERT OR IGNORE INTO sprint_runs (sprint, started_at, status, rework_cycles)
    VALUES (?, ?, 'in_progress', 0)
  `);
  stmt.run(sprint, startedAt.toISOString());
}

/**
 * Records the end of a sprint, creating the row if its start was never seen
 */
export function recordSprintEnd(
  sprint: number,
  status: "completed" | "halted",
  reworkCycles: number,
  endedAt: Date
): void {
  const database = getMetricsDb();
  const iso = endedAt.toISOString();
  recordSprintStart(sprint, endedAt);
  const stmt = database.prepare<[string, string, number, number]>(`
    UPDATE sprint_runs
    SET ended_at = ?, status = ?, rework_cycles = ?
    WHERE sprint = ?
  `);
  stmt.run(iso, status, reworkCycles, sprint);
}

export function getInvocations(sprint?: number): InvocationRecord[] {
  const database = getMetricsDb();
  if (sprint === undefined) {
    return database.prepare<[], InvocationRecord>(`SELECT * FROM invocations ORDER BY id`).all();
  }
  return database
    .prepare<[number], InvocationRecord>(`SELECT * FROM invocations WHERE sprint = ? ORDER BY id`)
    .all(sprint);
}

/**
 * Gets metrics aggregated by phase
 */
export function getPhaseMetrics(): PhaseMetrics[] {
  const database = getMetricsDb();
  const stmt = database.prepare<[], PhaseMetrics>(`
    SELECT
      phase,
      COUNT(*) as invocation_count,
      SUM(CASE WHEN outcome = 'success' THEN 1 ELSE 0 END) as success_count,
      COALESCE(AVG(duration_ms), 0) as avg_duration_ms,
      COALESCE(SUM(files_changed), 0) as files_changed
    FROM invocations
    GROUP BY phase
    ORDER BY MIN(id)
  `);
  return stmt.all();
}

export function getOutcomeCounts(): OutcomeCount[] {
  const database = getMetricsDb();
  const stmt = database.prepare<[], OutcomeCount>(`
    SELECT outcome, COUNT(*) as count
    FROM invocations
    GROUP BY outcome
    ORDER BY count DESC, outcome
  `);
  return stmt.all();
}

export function getSprintRuns(): SprintRunRecord[] {
  const database = getMetricsDb();
  return database.prepare<[], SprintRunRecord>(`SELECT * FROM sprint_runs ORDER BY sprint`).all();
}

/**
 * Closes the database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Clears all metrics data (useful for testing)
 */
export function clearMetrics(): void {
  const database = getMetricsDb();
  database.exec(`
    DELETE FROM invocations;
    DELETE FROM sprint_runs;
  `);
}

/**
 * Text report for `cadence metrics`
 */
export function formatMetrics(): string {
  const phases = getPhaseMetrics();
  const outcomes = getOutcomeCounts();
  const sprints = getSprintRuns();

  if (phases.length === 0 && sprints.length === 0) {
    return "No invocations recorded yet.";
  }

  const lines: string[] = ["Invocations by phase:"];
  for (const p of phases) {
    const avgSeconds = (p.avg_duration_ms / 1000).toFixed(1);
    lines.push(
      `  ${p.phase.padEnd(16)} ${p.invocation_count} runs, ${p.success_count} ok, avg ${avgSeconds}s, ${p.files_changed} files`
    );
  }

  lines.push("", "Outcomes:");
  for (const o of outcomes) {
    lines.push(`  ${o.outcome.padEnd(16)} ${o.count}`);
  }

  lines.push("", "Sprints:");
  for (const s of sprints) {
    const ended = s.ended_at ?? "-";
    lines.push(`  Sprint ${s.sprint}: ${s.status} (rework ${s.rework_cycles}) ${s.started_at} → ${ended}`);
  }

  return lines.join("\n");
}
