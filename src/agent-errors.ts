/**
 * Classifies agent output into the outcomes the controller reacts to.
 *
 * The patterns are matched against the whole output. They are kept
 * narrow: "RateLimiter" in a task title must not look like a 429.
 */

import type { AgentOutcome } from "./agent-runner-interface.js";

export const RATE_LIMIT_PATTERNS = [
  /rate limit (exceeded|reached|hit|error)/i,
  /rate.limited/i,
  /too many requests/i,
  /quota exceeded/i,
  /request throttled/i,
  /throttling error/i,
  /\b429\b/,
  /slow down/i,
];

export const AUTH_ERROR_PATTERNS = [
  /unauthorized/i,
  /authentication.*failed/i,
  /invalid.*api.*key/i,
  /not.*authenticated/i,
  /access.*denied/i,
];

export const CONNECTION_ERROR_PATTERNS = [
  /ConnectError/,
  /connection.*(refused|failed)/i,
  /network.*error/i,
  /ECONNREFUSED/,
  /ETIMEDOUT/,
  /ENOTFOUND/,
  /getaddrinfo/,
  /socket.*error/i,
  /could not connect/i,
];

function matchesAny(patterns: RegExp[], text: string): boolean {
  return patterns.some((pattern) => pattern.test(text));
}

export function isRateLimitError(text: string): boolean {
  return matchesAny(RATE_LIMIT_PATTERNS, text);
}

export function isAuthenticationError(text: string): boolean {
  return matchesAny(AUTH_ERROR_PATTERNS, text);
}

export function isConnectionError(text: string): boolean {
  return matchesAny(CONNECTION_ERROR_PATTERNS, text);
}

/**
 * Timeout wins, then rate limit, auth and connection patterns, then the
 * exit code.
 */
export function classifyAgentResult(result: {
  timedOut: boolean;
  exitCode: number | null;
  output: string;
}): AgentOutcome {
  if (result.timedOut) return "timeout";
  if (isRateLimitError(result.output)) return "rate_limited";
  if (isAuthenticationError(result.output)) return "auth_error";
  if (isConnectionError(result.output)) return "connection_error";
  if (result.exitCode !== 0) return "error";
  return "success";
}

/**
 * Errors a successful run still printed. Only line-leading Error: markers
 * and exception names count, so prose about errors does not.
 */
const OUTPUT_ERROR_PATTERN = /(^Error:|^ERROR:|[Ee]xception|Fatal|FATAL)/m;

export function outputHasErrors(output: string): boolean {
  return OUTPUT_ERROR_PATTERN.test(output);
}
