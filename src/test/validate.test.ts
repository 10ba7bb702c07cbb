import { describe, expect, it } from "vitest";
import type { RenameEntry } from "../renamer.js";
import { memorySnapshot, validatePlan } from "../validate.js";
import type { DirectorySnapshot } from "../validate.js";
import { entry } from "./helpers.js";

function conflicts(
  entries: RenameEntry[],
  snapshot: DirectorySnapshot,
  sourcesVacate = true,
): readonly string[] {
  const result = validatePlan({ entries, indexWidth: 0 }, snapshot, { sourcesVacate });
  if (result.ok) return [];
  expect(result.error.kind).toBe("PlanError");
  return result.error.message.split("\n");
}

describe("validatePlan", () => {
  it("accepts distinct targets that collide with nothing", () => {
    const plan = { entries: [entry("a", "x"), entry("b", "y")], indexWidth: 0 };
    const result = validatePlan(plan, memorySnapshot(["a", "b"]), { sourcesVacate: true });
    expect(result).toEqual({ ok: true, value: plan });
  });

  it("rejects two sources written to one target", () => {
    expect(conflicts([entry("a", "x"), entry("b", "x")], memorySnapshot(["a", "b"]))).toEqual([
      "Multiple files (a, b) would be written to x",
    ]);
  });

  it("rejects a target that is an existing file left in place", () => {
    expect(conflicts([entry("a", "x")], memorySnapshot(["a", "x"]))).toEqual([
      "Target x already exists for source a",
    ]);
  });

  it("allows a target that is itself renamed away", () => {
    expect(conflicts([entry("a", "b"), entry("b", "c")], memorySnapshot(["a", "b"]))).toEqual([]);
    expect(conflicts([entry("a", "b"), entry("b", "a")], memorySnapshot(["a", "b"]))).toEqual([]);
  });

  it("does not treat copied sources as vacated", () => {
    expect(conflicts([entry("a", "b"), entry("b", "c")], memorySnapshot(["a", "b"]), false)).toEqual([
      "Target b already exists for source a",
    ]);
  });

  it("permits an unchanged name", () => {
    expect(conflicts([entry("a", "a")], memorySnapshot(["a"]))).toEqual([]);
  });

  it("lists every conflict at once", () => {
    const entries = [entry("a", "x"), entry("b", "x"), entry("c", "y")];
    expect(conflicts(entries, memorySnapshot(["a", "b", "c", "y"]))).toEqual([
      "Multiple files (a, b) would be written to x",
      "Target y already exists for source c",
    ]);
  });

  it("rejects a target the filesystem cannot look up", () => {
    const snapshot: DirectorySnapshot = {
      entries: ["a.txt"],
      identify: (name) =>
        name === "a.txt" ? { kind: "entry", id: "a" } : { kind: "invalid", reason: "ENOTDIR: not a directory" },
    };
    expect(conflicts([entry("a.txt", "a.txt/x")], snapshot)).toEqual([
      "Target a.txt/x cannot be used for source a.txt: ENOTDIR: not a directory",
    ]);
  });

  describe("on a case-preserving directory", () => {
    const snapshot: DirectorySnapshot = {
      entries: ["CaSe1q"],
      identify: (name) =>
        name.toLowerCase() === "case1q" ? { kind: "entry", id: "inode-1" } : { kind: "missing" },
    };

    it("allows a case-only rename of the same file", () => {
      expect(conflicts([entry("CaSe1q", "case1q")], snapshot)).toEqual([]);
    });

    it("rejects copying a file onto itself", () => {
      expect(conflicts([entry("CaSe1q", "case1q")], snapshot, false)).toEqual([
        "Target case1q already exists for source CaSe1q",
      ]);
    });
  });
});
