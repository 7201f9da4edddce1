/**
 * Fix plan checklist (@fix_plan.md)
 *
 * A markdown list the agent keeps of known remaining work:
 *
 *   - [x] Wire up login form
 *   - [ ] Handle expired sessions
 *
 * Only lines starting with "- [" count as items.
 */

import { existsSync, readFileSync } from "fs";

export interface ChecklistProgress {
  exists: boolean;
  total: number;
  checked: number;
  unchecked: number;
}

const ITEM = /^- \[/;
const CHECKED = /^- \[[xX]\]/;
const UNCHECKED = /^- \[ \]/;

export function parseChecklist(content: string): Omit<ChecklistProgress, "exists"> {
  let total = 0;
  let checked = 0;
  let unchecked = 0;
  for (const line of content.split("\n")) {
    if (!ITEM.test(line)) continue;
    total++;
    if (CHECKED.test(line)) checked++;
    else if (UNCHECKED.test(line)) unchecked++;
  }
  return { total, checked, unchecked };
}

export function readChecklist(path: string): ChecklistProgress {
  if (!existsSync(path)) {
    return { exists: false, total: 0, checked: 0, unchecked: 0 };
  }
  try {
    return { exists: true, ...parseChecklist(readFileSync(path, "utf-8")) };
  } catch (err) {
    throw new Error(
      `Failed to read checklist ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}
