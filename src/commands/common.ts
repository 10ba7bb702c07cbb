/**
 * Shared utilities for the rename and selftest commands.
 */

import { sep } from "node:path";
import type { RenameMode } from "../flags.js";
import type { Output } from "../output.js";
import type { ExecutionReport } from "../renamer.js";

/** Warn about path separators: only the given directory is ever scanned. */
export function warnOnSeparators(
  mode: RenameMode,
  except: string | undefined,
  output: Output,
): void {
  const values: Array<[string, string | undefined]> =
    mode.kind === "regex"
      ? [
          ["regex", mode.regex],
          ["target", mode.target],
        ]
      : [
          ["regex", mode.regex],
          ["from", mode.from],
          ["to", mode.to],
        ];
  values.push(["except", except]);
  for (const [name, value] of values) {
    if (value?.includes(sep)) {
      output.warn(`${sep} found in <${name}> but this tool doesn't support directory traversal.`);
    }
  }
}

export function formatSummary(report: ExecutionReport, copy: boolean): string {
  const verb = copy ? "Copied" : "Renamed";
  const files = report.done.length === 1 ? "file" : "files";
  let line = `${verb} ${report.done.length} ${files}`;
  if (report.failures.length > 0) line += `, ${report.failures.length} failed`;
  return `${line}.`;
}
