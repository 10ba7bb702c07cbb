/**
 * Error kinds raised by each stage, and the Result type the stages return.
 */

export type ErrorKind =
  | "CompileError"
  | "ConfigError"
  | "TemplateError"
  | "PlanError"
  | "ExecutionError";

export abstract class RenameError extends Error {
  abstract readonly kind: ErrorKind;
}

export class CompileError extends RenameError {
  readonly kind = "CompileError";

  constructor(
    readonly pattern: string,
    detail: string,
  ) {
    super(`Invalid regular expression \`${pattern}\`: ${detail}`);
    this.name = "CompileError";
  }
}

export class ConfigError extends RenameError {
  readonly kind = "ConfigError";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TemplateError extends RenameError {
  readonly kind = "TemplateError";

  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

/** Every conflict found in a plan, reported together. */
export class PlanError extends RenameError {
  readonly kind = "PlanError";

  constructor(readonly conflicts: readonly string[]) {
    super(conflicts.join("\n"));
    this.name = "PlanError";
  }
}

export class ExecutionError extends RenameError {
  readonly kind = "ExecutionError";

  constructor(
    readonly source: string,
    readonly target: string,
    cause: unknown,
    verb: "move" | "copy" = "move",
  ) {
    super(`Could not ${verb} ${source} to ${target}: ${errorMessage(cause)}`, { cause });
    this.name = "ExecutionError";
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: RenameError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: RenameError): Result<T> {
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_UNEXPECTED = 2;
