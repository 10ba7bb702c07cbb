/**
 * Rename command: compile, plan, validate, then execute or simulate.
 */

import { existsSync, statSync } from "node:fs";
import { ConfigError, EXIT_FAILURE, EXIT_OK, fail, ok } from "../errors.js";
import type { Result } from "../errors.js";
import type { RenameOptions } from "../flags.js";
import { outputFor } from "../output.js";
import type { Output } from "../output.js";
import { compileMatchSpec, compileReplacer, parseTemplate } from "../pattern.js";
import { applyPlan, buildPlan, snapshotDirectory } from "../renamer.js";
import type { ExecutionReport, Renaming } from "../renamer.js";
import { validatePlan } from "../validate.js";
import { formatSummary, warnOnSeparators } from "./common.js";

function ensureDir(dir: string): Result<string> {
  if (!existsSync(dir)) {
    return fail(new ConfigError(`Directory does not exist: ${dir}`));
  }
  if (!statSync(dir).isDirectory()) {
    return fail(new ConfigError(`Not a directory: ${dir}`));
  }
  return ok(dir);
}

/**
 * Everything up to and including execution. Errors before execution mean
 * nothing was touched.
 */
export function planAndApply(options: RenameOptions, output: Output): Result<ExecutionReport> {
  const { mode, caseInsensitive } = options;
  warnOnSeparators(mode, options.except, output);

  const match = compileMatchSpec(mode.regex, { caseInsensitive, except: options.except });
  if (!match.ok) return match;

  let renaming: Renaming;
  if (mode.kind === "simple") {
    const replacer = compileReplacer(mode.from, mode.to, caseInsensitive);
    if (!replacer.ok) return replacer;
    renaming = { mode: "simple", replace: replacer.value };
  } else {
    const template = parseTemplate(mode.target);
    if (!template.ok) return template;
    renaming = { mode: "template", template: template.value, index: options.index };
  }

  const dir = ensureDir(options.dir);
  if (!dir.ok) return dir;
  const snapshot = snapshotDirectory(dir.value);

  const plan = buildPlan(snapshot.entries, match.value, renaming, options.transform);
  if (!plan.ok) return plan;
  const valid = validatePlan(plan.value, snapshot, { sourcesVacate: !options.copy });
  if (!valid.ok) return valid;

  return ok(applyPlan(dir.value, valid.value, { test: options.test, copy: options.copy, output }));
}

export function runRename(options: RenameOptions, output: Output = outputFor(options.quiet)): number {
  const result = planAndApply(options, output);
  if (!result.ok) {
    output.error(result.error.message);
    return EXIT_FAILURE;
  }
  const report = result.value;
  for (const failure of report.failures) output.error(failure.message);
  if (!options.test) output.info(formatSummary(report, options.copy));
  return report.failures.length > 0 ? EXIT_FAILURE : EXIT_OK;
}
