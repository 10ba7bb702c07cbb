/**
 * User defaults from ~/.rxren/config.json (or $RXREN_CONFIG). Flags override them.
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError, errorMessage, fail, isMissingFile, ok } from "./errors.js";
import type { Result } from "./errors.js";

export interface UserDefaults {
  caseInsensitive: boolean;
  quiet: boolean;
  indexFirst: number;
  indexStep: number;
  indexDigits: number | "auto";
  indexPadWith: string;
}

export const BUILT_IN_DEFAULTS: UserDefaults = {
  caseInsensitive: false,
  quiet: false,
  indexFirst: 1,
  indexStep: 1,
  indexDigits: "auto",
  indexPadWith: "0",
};

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.RXREN_CONFIG ?? join(homedir(), ".rxren", "config.json");
}

function isRecord(obj: unknown): obj is Record<string, unknown> {
  return obj !== null && typeof obj === "object" && !Array.isArray(obj);
}

/** Validate parsed JSON against UserDefaults; unknown keys are rejected. */
export function parseDefaults(data: unknown, source: string): Result<UserDefaults> {
  if (!isRecord(data)) {
    return fail(new ConfigError(`${source}: expected a JSON object`));
  }
  const out: UserDefaults = { ...BUILT_IN_DEFAULTS };
  for (const [key, value] of Object.entries(data)) {
    const bad = () => fail<UserDefaults>(new ConfigError(`${source}: invalid value for "${key}"`));
    switch (key) {
      case "caseInsensitive":
      case "quiet":
        if (typeof value !== "boolean") return bad();
        out[key] = value;
        break;
      case "indexFirst":
      case "indexStep":
        if (typeof value !== "number" || !Number.isInteger(value)) return bad();
        out[key] = value;
        break;
      case "indexDigits":
        if (value === "auto") out.indexDigits = value;
        else if (typeof value === "number" && Number.isInteger(value) && value > 0) {
          out.indexDigits = value;
        } else return bad();
        break;
      case "indexPadWith":
        if (typeof value !== "string" || value.length !== 1) return bad();
        out.indexPadWith = value;
        break;
      default:
        return fail(new ConfigError(`${source}: unknown setting "${key}"`));
    }
  }
  return ok(out);
}

/**
 * Load user defaults. A missing file yields the built-in defaults.
 */
export function loadDefaults(path: string = configPath()): Result<UserDefaults> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    if (isMissingFile(err)) return ok({ ...BUILT_IN_DEFAULTS });
    return fail(new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`));
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err: unknown) {
    return fail(new ConfigError(`${path}: ${errorMessage(err)}`));
  }
  return parseDefaults(data, path);
}
