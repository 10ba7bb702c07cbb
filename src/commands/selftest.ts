/**
 * Self-test: runs built-in scenarios end to end against scratch directories.
 */

import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { EXIT_FAILURE, EXIT_OK, errorMessage } from "../errors.js";
import type { RenameMode, RenameOptions } from "../flags.js";
import { silentOutput } from "../output.js";
import { DEFAULT_INDEX } from "../renamer.js";
import { runRename } from "./rename.js";

export type FilesystemKind = "case-sensitive" | "case-preserving";

const PREFIXES = ["CaSe", "case"];
const SUFFIXES = "qwertyuiop";

interface Scenario {
  desc: string;
  mode: RenameMode;
  options?: Partial<Omit<RenameOptions, "dir" | "mode">>;
  /** Expected exit code per filesystem kind; 0 when absent. */
  result?: Partial<Record<FilesystemKind, number>>;
  /** Expected listing after a successful run, from the initial listing. */
  expect: (initial: string[]) => string[];
}

const regex = (pattern: string, target: string): RenameMode => ({
  kind: "regex",
  regex: pattern,
  target,
});
const simple = (from: string, to: string, pattern: string): RenameMode => ({
  kind: "simple",
  from,
  to,
  regex: pattern,
});
const each = (fn: (name: string) => string) => (initial: string[]) => initial.map(fn);
const indexed = (first: number, step: number, width: number, pad: string) => (initial: string[]) =>
  initial.map((_, i) => `C${String(first + i * step).padStart(width, pad)}`);

const notEndingInE = /^CaSe\d[^e]$/;

export const SCENARIOS: readonly Scenario[] = [
  {
    desc: "CaSe -> BrandNew",
    mode: regex("CaSe(\\d[qwertyuiop])", "BrandNew\\1"),
    expect: each((n) => (n.startsWith("CaSe") ? `BrandNew${n.slice(4)}` : n)),
  },
  {
    desc: "CaSe -> case",
    mode: regex("CaSe(\\d[qwertyuiop])", "case\\1"),
    result: { "case-sensitive": EXIT_FAILURE },
    expect: each((n) => `case${n.slice(4)}`),
  },
  {
    desc: "CaSe (i) -> case",
    mode: regex("CaSe(\\d[qwertyuiop])", "case\\1"),
    options: { caseInsensitive: true },
    result: { "case-sensitive": EXIT_FAILURE },
    expect: each((n) => `case${n.slice(4)}`),
  },
  {
    desc: "[Cc][Aa][Ss][Ee] (i) -> caSE",
    mode: regex("[Cc][Aa][Ss][Ee](\\d[qwertyuiop])", "caSE\\(1)"),
    options: { caseInsensitive: true },
    result: { "case-sensitive": EXIT_FAILURE },
    expect: each((n) => `caSE${n.slice(4)}`),
  },
  {
    desc: "CaSe -> SeCa (except e$)",
    mode: regex("CaSe(\\d[qwertyuiop])", "SeCa\\1"),
    options: { except: "e$" },
    expect: each((n) => (notEndingInE.test(n) ? `SeCa${n.slice(4)}` : n)),
  },
  {
    desc: "CaSe -> SeCa (U)",
    mode: regex("CaSe(\\d[qwertyuiop])", "SeCa\\1"),
    options: { except: "e$", transform: "upper" },
    expect: each((n) => (notEndingInE.test(n) ? `SECA${n.slice(4).toUpperCase()}` : n)),
  },
  {
    desc: "CaSe (i) -> SeCa (U)",
    mode: regex("CaSe(\\d[qwertyuiop])", "SeCa\\1"),
    options: { except: "e$", transform: "upper", caseInsensitive: true },
    result: { "case-sensitive": EXIT_FAILURE },
    expect: each((n) => (notEndingInE.test(n) ? `SECA${n.slice(4).toUpperCase()}` : n)),
  },
  {
    desc: "CaSe (i) -> index (auto)",
    mode: regex("CaSe(\\d[qwertyuiop])", "C\\(index)"),
    options: { caseInsensitive: true },
    expect: indexed(1, 1, 2, "0"),
  },
  {
    desc: "CaSe (i) -> index (100, +2, _, auto)",
    mode: regex("CaSe(\\d[qwertyuiop])", "C\\(index)"),
    options: {
      caseInsensitive: true,
      index: { first: 100, step: 2, digits: "auto", padWith: "_" },
    },
    expect: indexed(100, 2, 3, "_"),
  },
  {
    desc: "CaSe (i) -> index (100, +2, _, 5), copy",
    mode: regex("CaSe(\\d[qwertyuiop])", "C\\(index)"),
    options: {
      caseInsensitive: true,
      copy: true,
      index: { first: 100, step: 2, digits: 5, padWith: "_" },
    },
    expect: (initial) => [...initial, ...indexed(100, 2, 5, "_")(initial)],
  },
  {
    desc: "CaSe -> replace `e` with `ee`",
    mode: simple("e", "ee", "CaSe(\\d[qwertyuiop])"),
    expect: each((n) => (n.startsWith("CaSe") ? n.replace(/e/g, "ee") : n)),
  },
  {
    desc: "CaSe (i) -> replace `e` with `ee`",
    mode: simple("e", "ee", "CaSe(\\d[qwertyuiop])"),
    options: { caseInsensitive: true },
    expect: each((n) => n.replace(/e/gi, "ee")),
  },
  {
    desc: "CaSe (i) -> (U) replace `e` with `ee`",
    mode: simple("e", "ee", "CaSe(\\d[qwertyuiop])"),
    options: { caseInsensitive: true, transform: "upper" },
    result: { "case-sensitive": EXIT_FAILURE },
    expect: each((n) => n.replace(/e/gi, "ee").toUpperCase()),
  },
  {
    desc: "CaSe (i) -> replace `e` with `ee` (except e$)",
    mode: simple("e", "ee", "CaSe(\\d[qwertyuiop])"),
    options: { caseInsensitive: true, except: "e$" },
    expect: each((n) => (/e$/i.test(n) ? n : n.replace(/e/gi, "ee"))),
  },
];

function populate(dir: string): void {
  for (const prefix of PREFIXES) {
    for (let index = 1; index <= 3; index++) {
      for (const suffix of SUFFIXES) {
        const path = join(dir, `${prefix}${index}${suffix}`);
        writeFileSync(path, `${path}\r\n`);
      }
    }
  }
}

function listing(dir: string): string[] {
  return readdirSync(dir).sort();
}

function sameListing(actual: string[], expected: string[]): boolean {
  const sorted = [...expected].sort();
  return actual.length === sorted.length && actual.every((name, i) => name === sorted[i]);
}

function withScratchDir<T>(base: string, fn: (dir: string) => T): T {
  const dir = mkdtempSync(join(base, "rxren_"));
  try {
    populate(dir);
    return fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function detectFilesystem(base: string): FilesystemKind {
  return withScratchDir(base, (dir) => {
    const files = readdirSync(dir);
    if (files.length === 60) return "case-sensitive";
    if (files.length === 30 && files.every((f) => f.startsWith("CaSe"))) return "case-preserving";
    throw new Error(`Unsupported filesystem: expected 60 or 30 case-preserved files, got ${files.length}.`);
  });
}

/** Returns a failure description, or undefined when the scenario passes. */
function runScenario(scenario: Scenario, kind: FilesystemKind, base: string): string | undefined {
  const expected = scenario.result?.[kind] ?? EXIT_OK;
  return withScratchDir(base, (dir) => {
    const initial = listing(dir);
    const options: RenameOptions = {
      dir,
      mode: scenario.mode,
      except: undefined,
      caseInsensitive: false,
      transform: "none",
      test: true,
      quiet: true,
      copy: false,
      index: DEFAULT_INDEX,
      ...scenario.options,
    };

    const dryRun = runRename(options, silentOutput);
    if (dryRun !== EXIT_OK && dryRun !== expected) return `test mode exited with ${dryRun}`;
    if (!sameListing(listing(dir), initial)) return "test mode changed the directory";

    const live = runRename({ ...options, test: false }, silentOutput);
    if (live !== expected) return `exited with ${live}, expected ${expected}`;
    const want = expected === EXIT_OK ? scenario.expect(initial) : initial;
    const after = listing(dir);
    if (!sameListing(after, want)) {
      const missing = want.filter((n) => !after.includes(n));
      const extra = after.filter((n) => !want.includes(n));
      return `unexpected files (missing: ${missing.join(", ") || "none"}; extra: ${extra.join(", ") || "none"})`;
    }
    return undefined;
  });
}

export function runSelftest(baseDir?: string): number {
  const base = baseDir ?? tmpdir();
  p.intro(pc.bold(pc.cyan("rxren self-test")));
  p.log.info(`Using ${base} as the temporary directory base.`);

  let kind: FilesystemKind;
  try {
    kind = detectFilesystem(base);
  } catch (err: unknown) {
    p.log.error(errorMessage(err));
    p.outro(pc.red("Self-test aborted."));
    return EXIT_FAILURE;
  }
  p.log.info(`Testing on a ${kind} filesystem.`);

  let failures = 0;
  SCENARIOS.forEach((scenario, i) => {
    const problem = runScenario(scenario, kind, base);
    if (problem === undefined) {
      p.log.success(`Test ${i + 1} OK.`);
    } else {
      failures += 1;
      p.log.error(`Test ${i + 1} (${scenario.desc}) failed: ${problem}.`);
    }
  });

  if (failures > 0) {
    p.outro(pc.red(`${failures} of ${SCENARIOS.length} tests failed.`));
    return EXIT_FAILURE;
  }
  p.outro(pc.green(`All ${SCENARIOS.length} tests passed.`));
  return EXIT_OK;
}
