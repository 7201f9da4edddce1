import { describe, it, expect } from "vitest";
import { join } from "path";
import { tmpdir } from "os";
import { parseChecklist, readChecklist } from "./checklist.js";

describe("parseChecklist", () => {
  it("counts checked and unchecked items", () => {
    const content = [
      "# Fix plan",
      "- [x] Wire up login form",
      "- [X] Add logout",
      "- [ ] Handle expired sessions",
      "  - [ ] nested items are not counted",
      "* [ ] neither are other bullets",
    ].join("\n");

    expect(parseChecklist(content)).toEqual({ total: 3, checked: 2, unchecked: 1 });
  });

  it("counts odd markers toward the total only", () => {
    expect(parseChecklist("- [-] skipped\n- [x] done")).toEqual({ total: 2, checked: 1, unchecked: 0 });
  });
});

describe("readChecklist", () => {
  it("reports a missing file", () => {
    expect(readChecklist(join(tmpdir(), "cadence-no-such-fix-plan.md"))).toEqual({
      exists: false,
      total: 0,
      checked: 0,
      unchecked: 0,
    });
  });
});
