/**
 * Version information for the cadence CLI
 */

import { statSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// Kept in sync with package.json by hand
export const VERSION = "0.3.0";

/**
 * Build timestamp: mtime of the compiled cli.js next to this file
 */
export function getBuildTime(): Date | null {
  try {
    const thisDir = dirname(fileURLToPath(import.meta.url));
    return statSync(join(thisDir, "cli.js")).mtime;
  } catch {
    return null; // running from src/
  }
}

export function getVersionString(): string {
  const buildTime = getBuildTime();
  if (!buildTime) return VERSION;
  // e.g. "0.3.0 (built 2026-01-15 08:15:32)"
  return `${VERSION} (built ${buildTime.toISOString().replace("T", " ").slice(0, 19)})`;
}
