/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";
import type { UserDefaults } from "./config.js";
import { ConfigError, fail, ok } from "./errors.js";
import type { Result } from "./errors.js";
import type { CaseTransform, IndexConfig } from "./renamer.js";

export const VERSION = "1.0.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  selftest: boolean;
  simple: boolean;
  copy: boolean;
  caseInsensitive: boolean;
  lower: boolean;
  upper: boolean;
  quiet: boolean;
  test: boolean;
  except: string | undefined;
  dir: string | undefined;
  indexFirst: string | undefined;
  indexStep: string | undefined;
  indexDigits: string | undefined;
  indexPadWith: string | undefined;
  positionals: string[];
  /** Value options given without a value. */
  missingValues: string[];
}

const ARGS_CONFIG = {
  boolean: [
    "help",
    "version",
    "selftest",
    "simple",
    "copy",
    "case-insensitive",
    "lower",
    "upper",
    "quiet",
    "test",
  ] as const,
  alias: {
    h: "help",
    s: "simple",
    c: "copy",
    i: "case-insensitive",
    I: "case-insensitive",
    l: "lower",
    U: "upper",
    q: "quiet",
    t: "test",
  } as const,
};

const VALUE_OPTIONS = ["except", "dir", "index-first", "index-step", "index-digits", "index-pad-with"] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

const VALUE_ALIASES: Record<string, ValueOption> = { v: "except", d: "dir" };

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some((option) => option === name);
}

interface SplitArgs {
  flags: string[];
  values: Map<ValueOption, string>;
  positionals: string[];
  missingValues: string[];
}

/**
 * Patterns, templates and option values are kept as typed: the parser only
 * sees boolean flags, so it never turns "05" into 5. A value option takes
 * the next argument whatever it looks like, so `--index-step -1` works.
 */
function splitArgs(argv: string[]): SplitArgs {
  const out: SplitArgs = { flags: [], values: new Map(), positionals: [], missingValues: [] };
  const takeNext = (name: ValueOption, i: number): number => {
    const value = argv[i + 1];
    if (value === undefined) out.missingValues.push(name);
    else out.values.set(name, value);
    return i + 1;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--") {
      out.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const name = arg.slice(2, eq === -1 ? undefined : eq);
      if (!isValueOption(name)) out.flags.push(arg);
      else if (eq !== -1) out.values.set(name, arg.slice(eq + 1));
      else i = takeNext(name, i);
      continue;
    }
    if (arg.startsWith("-") && arg.length > 1) {
      const letters = arg.slice(1);
      for (let j = 0; j < letters.length; j++) {
        const letter = letters.charAt(j);
        const name = VALUE_ALIASES[letter];
        if (name === undefined) {
          out.flags.push(`-${letter}`);
          continue;
        }
        const attached = letters.slice(j + 1);
        if (attached !== "") out.values.set(name, attached);
        else i = takeNext(name, i);
        break;
      }
      continue;
    }
    out.positionals.push(arg);
  }
  return out;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const { flags, values, positionals, missingValues } = splitArgs(argv);
  const raw = parse(flags, ARGS_CONFIG);
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    selftest: Boolean(raw.selftest),
    simple: Boolean(raw.simple),
    copy: Boolean(raw.copy),
    caseInsensitive: Boolean(raw["case-insensitive"]),
    lower: Boolean(raw.lower),
    upper: Boolean(raw.upper),
    quiet: Boolean(raw.quiet),
    test: Boolean(raw.test),
    except: values.get("except"),
    dir: values.get("dir"),
    indexFirst: values.get("index-first"),
    indexStep: values.get("index-step"),
    indexDigits: values.get("index-digits"),
    indexPadWith: values.get("index-pad-with"),
    positionals,
    missingValues,
  };
}

export type RenameMode =
  | { kind: "regex"; regex: string; target: string }
  | { kind: "simple"; from: string; to: string; regex: string };

export interface RenameOptions {
  dir: string;
  mode: RenameMode;
  except: string | undefined;
  caseInsensitive: boolean;
  transform: CaseTransform;
  test: boolean;
  quiet: boolean;
  copy: boolean;
  index: IndexConfig;
}

export type Invocation =
  | { command: "help" }
  | { command: "version" }
  | { command: "selftest"; dir: string | undefined }
  | { command: "rename"; options: RenameOptions };

function parseInteger(flag: string, value: string | undefined, fallback: number): Result<number> {
  if (value === undefined) return ok(fallback);
  if (!/^[+-]?\d+$/.test(value)) {
    return fail(new ConfigError(`--${flag} expects an integer, got "${value}"`));
  }
  return ok(Number.parseInt(value, 10));
}

function parseDigits(value: string | undefined, fallback: number | "auto"): Result<number | "auto"> {
  if (value === undefined) return ok(fallback);
  if (value === "auto") return ok(value);
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) === 0) {
    return fail(new ConfigError(`--index-digits expects a positive integer or "auto", got "${value}"`));
  }
  return ok(Number.parseInt(value, 10));
}

/**
 * Turn parsed flags into what to run, with user defaults under the flags.
 */
export function resolveInvocation(args: ParsedArgs, defaults: UserDefaults): Result<Invocation> {
  if (args.help) return ok({ command: "help" });
  if (args.version) return ok({ command: "version" });
  const [missing] = args.missingValues;
  if (missing !== undefined) {
    return fail(new ConfigError(`--${missing} needs a value.`));
  }

  const { positionals } = args;
  if (args.selftest) {
    if (positionals.length > 1) {
      return fail(new ConfigError("--selftest takes at most one directory."));
    }
    return ok({ command: "selftest", dir: positionals[0] });
  }

  if (args.lower && args.upper) {
    return fail(new ConfigError("--lower and --upper cannot be used together."));
  }

  let mode: RenameMode;
  if (args.simple) {
    const [from, to, regex] = positionals;
    if (positionals.length !== 3 || from === undefined || to === undefined || regex === undefined) {
      return fail(new ConfigError("Simple mode expects <from> <to> <regex>. See rxren --help."));
    }
    mode = { kind: "simple", from, to, regex };
  } else {
    const [regex, target] = positionals;
    if (positionals.length !== 2 || regex === undefined || target === undefined) {
      return fail(new ConfigError("Expected <regex> <target>. See rxren --help."));
    }
    mode = { kind: "regex", regex, target };
  }

  const first = parseInteger("index-first", args.indexFirst, defaults.indexFirst);
  if (!first.ok) return first;
  const step = parseInteger("index-step", args.indexStep, defaults.indexStep);
  if (!step.ok) return step;
  const digits = parseDigits(args.indexDigits, defaults.indexDigits);
  if (!digits.ok) return digits;
  const padWith = args.indexPadWith ?? defaults.indexPadWith;
  if (padWith.length !== 1) {
    return fail(new ConfigError(`--index-pad-with expects a single character, got "${padWith}"`));
  }

  return ok({
    command: "rename",
    options: {
      dir: args.dir ?? ".",
      mode,
      except: args.except === "" ? undefined : args.except,
      caseInsensitive: args.caseInsensitive || defaults.caseInsensitive,
      transform: args.lower ? "lower" : args.upper ? "upper" : "none",
      test: args.test,
      quiet: args.quiet || defaults.quiet,
      copy: args.copy,
      index: { first: first.value, step: step.value, digits: digits.value, padWith },
    },
  });
}

export function printHelp(): void {
  const usage = `rxren – rename files in a directory using regular expression matching

Usage:
  rxren [options] <regex> <target>           Classic mode
  rxren -s [options] <from> <to> <regex>     Simple mode (substring replace)
  rxren --selftest [directory]               Run the built-in self-test
  rxren --help                               Show this help
  rxren --version                            Show version

The regex must match the whole filename. In <target>, \\1 or \\(1) is the
text of the first capture group and \\(index) a running number.

Options:
  -d, --dir <path>         Directory to work in (default: current directory)
  -c, --copy               Copy files instead of renaming
  -i, -I, --case-insensitive
                           Treat the regular expression as case-insensitive
  -l, --lower              Translate all letters to lower-case
  -U, --upper              Translate all letters to upper-case
  -v, --except <regex>     Exclude files matching this regular expression anywhere
  -t, --test               Test only, don't actually rename anything
  -q, --quiet              Don't print anything, just return status codes
  -s, --simple             Simple mode: replace every <from> with <to> in files matching <regex>

Index options (for \\(index)):
  --index-first <n>        First value (default: 1)
  --index-step <n>         Added with each file; negative allowed, e.g. --index-step -1 (default: 1)
  --index-digits <n|auto>  Width of each value; auto pads all values to the same width (default: auto)
  --index-pad-with <c>     Padding character (default: "0")

Defaults can be set in ~/.rxren/config.json (or the file named by $RXREN_CONFIG).

Examples:
  rxren -t 'IMG(\\d+)\\.JPG' 'Photo \\(index).jpg'
  rxren -s _ ' ' '.*\\.txt'
  rxren -l '(.*)\\.JPG' '\\1.jpg'`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
