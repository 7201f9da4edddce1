/**
 * Status block parser
 *
 * Agents are asked to end every reply with:
 *
 *   ---CADENCE_STATUS---
 *   ROLE: developer
 *   PHASE: implementation
 *   SPRINT: 2
 *   TASKS_COMPLETED: 1
 *   TASKS_REMAINING: 3
 *   BLOCKERS: none
 *   STORY_POINTS_DONE: 5
 *   TESTS_STATUS: PASSING
 *   PHASE_COMPLETE: false
 *   PROJECT_DONE: false
 *   NEXT_ACTION: Implement TASK-004
 *   ---END_CADENCE_STATUS---
 *
 * Nothing guarantees they do. A missing block is the normal "no signal"
 * case, so parsing never throws.
 */

import { parse as parseYaml } from "yaml";
import { isRecord } from "./json.js";
import type { AgentStatus, StatusBlockResult, TestsStatus } from "./types.js";

export const STATUS_BLOCK_START = "---CADENCE_STATUS---";
export const STATUS_BLOCK_END = "---END_CADENCE_STATUS---";

/**
 * Returns the text between the last start marker and the end marker that
 * follows it. An unterminated block runs to the end of the output.
 */
export function extractStatusBlock(output: string): string | null {
  const start = output.lastIndexOf(STATUS_BLOCK_START);
  if (start === -1) return null;

  const bodyStart = start + STATUS_BLOCK_START.length;
  const end = output.indexOf(STATUS_BLOCK_END, bodyStart);
  return output.slice(bodyStart, end === -1 ? undefined : end);
}

function parseFields(body: string): Record<string, unknown> {
  try {
    const parsed: unknown = parseYaml(body, { logLevel: "error" });
    return isRecord(parsed) ? parsed : scanLines(body);
  } catch {
    // Free text after a colon trips YAML
    return scanLines(body);
  }
}

function scanLines(body: string): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const line of body.split("\n")) {
    const match = line.match(/^\s*([A-Z_]+)\s*:\s*(.*?)\s*$/);
    if (match) {
      fields[match[1]] = match[2];
    }
  }
  return fields;
}

function text(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function count(value: unknown): number {
  const parsed = parseInt(text(value), 10);
  return Number.isNaN(parsed) || parsed < 0 ? 0 : parsed;
}

function flag(value: unknown): boolean {
  const normalized = text(value).toLowerCase();
  return normalized === "true" || normalized === "yes" || normalized === "1";
}

function testsStatus(value: unknown): TestsStatus {
  const normalized = text(value).toUpperCase();
  if (normalized === "PASSING" || normalized === "FAILING") return normalized;
  return "NOT_RUN";
}

/**
 * Parses the last status block in `output`
 */
export function parseStatusBlock(output: string): StatusBlockResult {
  const body = extractStatusBlock(output);
  if (body === null) {
    return { present: false };
  }

  const fields = parseFields(body);
  const status: AgentStatus = {
    role: text(fields.ROLE),
    phase: text(fields.PHASE),
    sprint: count(fields.SPRINT),
    tasksCompleted: count(fields.TASKS_COMPLETED),
    tasksRemaining: count(fields.TASKS_REMAINING),
    blockers: text(fields.BLOCKERS) || "none",
    storyPointsDone: count(fields.STORY_POINTS_DONE),
    testsStatus: testsStatus(fields.TESTS_STATUS),
    phaseComplete: flag(fields.PHASE_COMPLETE),
    projectDone: flag(fields.PROJECT_DONE),
    nextAction: text(fields.NEXT_ACTION),
  };
  return { present: true, status };
}
