/**
 * Renamer core: list a directory, build the rename plan, apply it with safe ordering.
 */

import {
  chmodSync,
  constants,
  copyFileSync,
  existsSync,
  lstatSync,
  readdirSync,
  renameSync,
  statSync,
  utimesSync,
} from "node:fs";
import { join } from "node:path";
import { ExecutionError, TemplateError, errorMessage, fail, isMissingFile, ok } from "./errors.js";
import type { Result } from "./errors.js";
import type { Output } from "./output.js";
import { groupCount, maxGroupReference, renderTemplate } from "./pattern.js";
import type { MatchSpec, Replacer, TemplateSpec } from "./pattern.js";
import type { DirectorySnapshot } from "./validate.js";

/** One rename operation: source filename → target filename */
export interface RenameEntry {
  readonly source: string;
  readonly target: string;
  readonly groups: readonly string[];
}

export interface RenamePlan {
  readonly entries: readonly RenameEntry[];
  /** Resolved width of rendered index values; 0 when no index was used. */
  readonly indexWidth: number;
}

export interface IndexConfig {
  readonly first: number;
  readonly step: number;
  readonly digits: number | "auto";
  readonly padWith: string;
}

export type CaseTransform = "none" | "lower" | "upper";

export type Renaming =
  | { readonly mode: "template"; readonly template: TemplateSpec; readonly index: IndexConfig }
  | { readonly mode: "simple"; readonly replace: Replacer };

export const DEFAULT_INDEX: IndexConfig = { first: 1, step: 1, digits: "auto", padWith: "0" };

export function listFiles(dir: string): string[] {
  return readdirSync(dir);
}

export function snapshotDirectory(dir: string): DirectorySnapshot {
  return {
    entries: listFiles(dir),
    identify(name) {
      try {
        const stats = lstatSync(join(dir, name));
        return { kind: "entry", id: `${stats.dev}:${stats.ino}` };
      } catch (err: unknown) {
        if (isMissingFile(err)) return { kind: "missing" };
        // ENOTDIR, ENAMETOOLONG and the like: nothing can be created there.
        return { kind: "invalid", reason: errorMessage(err) };
      }
    },
  };
}

function applyCase(name: string, transform: CaseTransform): string {
  switch (transform) {
    case "lower":
      return name.toLowerCase();
    case "upper":
      return name.toUpperCase();
    case "none":
      return name;
  }
}

/** Width of the longest printed value among `count` successive index values. */
export function indexWidth(index: IndexConfig, count: number): number {
  if (index.digits !== "auto") return index.digits;
  if (count === 0) return 0;
  // The sequence is monotonic, so its extremes are the first and last values.
  const last = index.first + (count - 1) * index.step;
  return Math.max(String(index.first).length, String(last).length);
}

export function formatIndex(value: number, width: number, padWith: string): string {
  const text = String(value);
  return text.length >= width ? text : padWith.repeat(width - text.length) + text;
}

function matchedNames(names: readonly string[], match: MatchSpec): RegExpExecArray[] {
  const matches: RegExpExecArray[] = [];
  for (const name of names) {
    if (match.exclude?.test(name)) continue;
    const m = match.pattern.exec(name);
    if (m) matches.push(m);
  }
  return matches;
}

/**
 * Compute the rename plan for `names`, in listing order. Pure: collisions
 * are left for validatePlan.
 */
export function buildPlan(
  names: readonly string[],
  match: MatchSpec,
  renaming: Renaming,
  transform: CaseTransform,
): Result<RenamePlan> {
  const matches = matchedNames(names, match);

  if (renaming.mode === "simple") {
    const entries = matches.map((m) => ({
      source: m[0],
      target: applyCase(renaming.replace(m[0]), transform),
      groups: m.slice(1).map((g) => g ?? ""),
    }));
    return ok({ entries, indexWidth: 0 });
  }

  const { template, index } = renaming;
  const wanted = maxGroupReference(template);
  const available = groupCount(match);
  if (wanted > available) {
    return fail(
      new TemplateError(
        `Template refers to group ${wanted} but the pattern has only ${available} group(s)`,
      ),
    );
  }

  const width = template.usesIndex ? indexWidth(index, matches.length) : 0;
  const entries = matches.map((m, i) => {
    const groups = m.slice(1).map((g) => g ?? "");
    const value = template.usesIndex
      ? formatIndex(index.first + i * index.step, width, index.padWith)
      : "";
    return {
      source: m[0],
      target: applyCase(renderTemplate(template, groups, value), transform),
      groups,
    };
  });
  return ok({ entries, indexWidth: width });
}

export interface ApplyOptions {
  test: boolean;
  copy: boolean;
  output: Output;
}

export interface ExecutionReport {
  readonly done: readonly RenameEntry[];
  /** Entries whose name does not change. */
  readonly skipped: readonly RenameEntry[];
  readonly failures: readonly ExecutionError[];
}

function stagingName(dir: string, i: number, source: string): string {
  let attempt = 0;
  let name = `__rxren_${i}_${source}`;
  while (existsSync(join(dir, name))) {
    attempt += 1;
    name = `__rxren_${i}_${attempt}_${source}`;
  }
  return name;
}

function copyEntry(dir: string, source: string, target: string): void {
  const from = join(dir, source);
  const to = join(dir, target);
  copyFileSync(from, to, constants.COPYFILE_EXCL);
  const stats = statSync(from);
  chmodSync(to, stats.mode);
  utimesSync(to, stats.atime, stats.mtime);
}

/**
 * Execute a validated plan. Failures are recorded per entry and the rest
 * still run; completed renames are not rolled back.
 */
export function applyPlan(dir: string, plan: RenamePlan, options: ApplyOptions): ExecutionReport {
  const { test, copy, output } = options;
  const verb = copy ? "copy" : "rename";
  const done: RenameEntry[] = [];
  const skipped: RenameEntry[] = [];
  const failures: ExecutionError[] = [];

  const pending: RenameEntry[] = [];
  for (const entry of plan.entries) {
    if (entry.source === entry.target) {
      skipped.push(entry);
      if (test) output.note(`file ${entry.source} matches but name doesn't change.`);
    } else {
      pending.push(entry);
    }
  }

  if (test) {
    for (const entry of pending) {
      output.info(`Would ${verb} ${entry.source} -> ${entry.target}`);
      done.push(entry);
    }
    return { done, skipped, failures };
  }

  if (copy) {
    for (const entry of pending) {
      try {
        copyEntry(dir, entry.source, entry.target);
        done.push(entry);
      } catch (err: unknown) {
        failures.push(new ExecutionError(entry.source, entry.target, err, "copy"));
      }
    }
    return { done, skipped, failures };
  }

  // Sources that are also targets move aside first, so chains and swaps never overwrite.
  const targets = new Set(pending.map((e) => e.target));
  const moved = new Map<string, string>();
  const ready: RenameEntry[] = [];
  pending.forEach((entry, i) => {
    if (!targets.has(entry.source)) {
      ready.push(entry);
      return;
    }
    const staged = stagingName(dir, i, entry.source);
    try {
      renameSync(join(dir, entry.source), join(dir, staged));
      moved.set(entry.source, staged);
      ready.push(entry);
    } catch (err: unknown) {
      failures.push(new ExecutionError(entry.source, entry.target, err));
    }
  });

  const stuck = new Set(
    pending.filter((e) => targets.has(e.source) && !moved.has(e.source)).map((e) => e.source),
  );
  for (const entry of ready) {
    const from = moved.get(entry.source) ?? entry.source;
    if (stuck.has(entry.target)) {
      const cause = new Error(`${entry.target} could not be moved out of the way`);
      failures.push(new ExecutionError(entry.source, entry.target, cause));
      if (from !== entry.source) output.warn(`${entry.source} was left as ${from}`);
      continue;
    }
    try {
      renameSync(join(dir, from), join(dir, entry.target));
      done.push(entry);
    } catch (err: unknown) {
      failures.push(new ExecutionError(entry.source, entry.target, err));
      if (from !== entry.source) output.warn(`${entry.source} was left as ${from}`);
    }
  }
  return { done, skipped, failures };
}
