/**
 * Pattern compiler: filename matcher, simple-mode replacer and target templates.
 */

import { CompileError, ConfigError, TemplateError, errorMessage, fail, ok } from "./errors.js";
import type { Result } from "./errors.js";

export interface MatchSpec {
  /** Anchored at both ends: a filename matches only as a whole. */
  readonly pattern: RegExp;
  readonly caseInsensitive: boolean;
  /** Unanchored: excludes a name if it matches anywhere within it. */
  readonly exclude: RegExp | undefined;
}

export type TemplateToken =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "group"; readonly index: number }
  | { readonly kind: "index" };

export interface TemplateSpec {
  readonly source: string;
  readonly tokens: readonly TemplateToken[];
  readonly usesIndex: boolean;
}

export type Replacer = (name: string) => string;

/** Escape special regex characters so the string can be used as a literal in a regex. */
export function escapeRegexLiteral(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compile(pattern: string, flags: string): Result<RegExp> {
  try {
    return ok(new RegExp(pattern, flags));
  } catch (err: unknown) {
    return fail(new CompileError(pattern, errorMessage(err)));
  }
}

export function compileMatchSpec(
  pattern: string,
  options: { caseInsensitive: boolean; except?: string | undefined },
): Result<MatchSpec> {
  const flags = options.caseInsensitive ? "i" : "";
  // Checked on its own first so the error names what the user typed.
  const raw = compile(pattern, flags);
  if (!raw.ok) return raw;
  const anchored = compile(`^(?:${pattern})$`, flags);
  if (!anchored.ok) return anchored;

  let exclude: RegExp | undefined;
  if (options.except) {
    const compiled = compile(options.except, flags);
    if (!compiled.ok) return compiled;
    exclude = compiled.value;
  }
  return ok({ pattern: anchored.value, caseInsensitive: options.caseInsensitive, exclude });
}

/** Number of capture groups the anchored pattern defines. */
export function groupCount(spec: MatchSpec): number {
  const probe = new RegExp(`${spec.pattern.source}|`, spec.pattern.flags).exec("");
  return probe === null ? 0 : probe.length - 1;
}

/**
 * Simple mode: every occurrence of `from` becomes `to`, both taken literally.
 */
export function compileReplacer(
  from: string,
  to: string,
  caseInsensitive: boolean,
): Result<Replacer> {
  if (from === "") {
    return fail(new ConfigError("The substring to replace cannot be empty."));
  }
  const regex = new RegExp(escapeRegexLiteral(from), caseInsensitive ? "gi" : "g");
  return ok((name: string) => name.replace(regex, () => to));
}

const REFERENCE = /\\(?:(\d+)|\(([^)]+)\))/g;

/**
 * Parse a target template. `\1` and `\(1)` refer to capture groups,
 * `\(index)` to the running index.
 */
export function parseTemplate(template: string): Result<TemplateSpec> {
  const tokens: TemplateToken[] = [];
  let usesIndex = false;
  let last = 0;

  for (const match of template.matchAll(REFERENCE)) {
    const start = match.index ?? 0;
    if (start > last) tokens.push({ kind: "literal", text: template.slice(last, start) });
    last = start + match[0].length;

    const [, bare, bracketed] = match;
    const ref = bare ?? bracketed ?? "";
    if (/^\d+$/.test(ref)) {
      const index = Number.parseInt(ref, 10);
      if (index === 0) {
        return fail(new TemplateError(`Group references start at 1: \`${match[0]}\``));
      }
      tokens.push({ kind: "group", index });
    } else if (ref.toLowerCase() === "index") {
      tokens.push({ kind: "index" });
      usesIndex = true;
    } else {
      return fail(new TemplateError(`Unknown special reference: \`${ref}\``));
    }
  }
  if (last < template.length) tokens.push({ kind: "literal", text: template.slice(last) });

  return ok({ source: template, tokens, usesIndex });
}

/** Highest group index the template refers to, or 0. */
export function maxGroupReference(template: TemplateSpec): number {
  let max = 0;
  for (const token of template.tokens) {
    if (token.kind === "group" && token.index > max) max = token.index;
  }
  return max;
}

export function renderTemplate(
  template: TemplateSpec,
  groups: readonly string[],
  index: string,
): string {
  return template.tokens
    .map((token) => {
      switch (token.kind) {
        case "literal":
          return token.text;
        case "group":
          return groups[token.index - 1] ?? "";
        case "index":
          return index;
      }
    })
    .join("");
}
