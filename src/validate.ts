/**
 * Plan validation: the whole batch is checked before anything is touched.
 */

import { PlanError, fail, ok } from "./errors.js";
import type { Result } from "./errors.js";
import type { RenamePlan } from "./renamer.js";

/**
 * What a name resolves to. Two names with the same id are the same file
 * (e.g. differing only in case on a case-preserving filesystem).
 */
export type Identity =
  | { readonly kind: "entry"; readonly id: string }
  | { readonly kind: "missing" }
  | { readonly kind: "invalid"; readonly reason: string };

/** The directory as it was when the plan was built. */
export interface DirectorySnapshot {
  readonly entries: readonly string[];
  identify(name: string): Identity;
}

export interface ValidateOptions {
  /** False when sources stay in place (copy mode). */
  sourcesVacate: boolean;
}

/** Snapshot over a fixed list of names, with exact-name identity. */
export function memorySnapshot(entries: readonly string[]): DirectorySnapshot {
  const known = new Set(entries);
  return {
    entries,
    identify: (name) => (known.has(name) ? { kind: "entry", id: name } : { kind: "missing" }),
  };
}

export function validatePlan(
  plan: RenamePlan,
  snapshot: DirectorySnapshot,
  options: ValidateOptions,
): Result<RenamePlan> {
  const conflicts: string[] = [];

  const byTarget = new Map<string, string[]>();
  for (const { source, target } of plan.entries) {
    const sources = byTarget.get(target);
    if (sources) sources.push(source);
    else byTarget.set(target, [source]);
  }
  for (const [target, sources] of byTarget) {
    if (sources.length > 1) {
      conflicts.push(`Multiple files (${sources.join(", ")}) would be written to ${target}`);
    }
  }

  const vacated = new Set(options.sourcesVacate ? plan.entries.map((e) => e.source) : []);
  for (const { source, target } of plan.entries) {
    if (target === source || vacated.has(target)) continue;
    const existing = snapshot.identify(target);
    if (existing.kind === "missing") continue;
    if (existing.kind === "invalid") {
      conflicts.push(`Target ${target} cannot be used for source ${source}: ${existing.reason}`);
      continue;
    }
    // A case-only rename of the source itself; a copy onto itself is not.
    const own = snapshot.identify(source);
    if (options.sourcesVacate && own.kind === "entry" && own.id === existing.id) continue;
    conflicts.push(`Target ${target} already exists for source ${source}`);
  }

  return conflicts.length > 0 ? fail(new PlanError(conflicts)) : ok(plan);
}
