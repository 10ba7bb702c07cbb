import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Result } from "../errors.js";
import type { Output } from "../output.js";
import type { RenameEntry } from "../renamer.js";

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function entry(source: string, target: string): RenameEntry {
  return { source, target, groups: [] };
}

export interface RecordingOutput extends Output {
  readonly lines: { info: string[]; note: string[]; warn: string[]; error: string[] };
}

export function recordingOutput(): RecordingOutput {
  const lines = { info: [] as string[], note: [] as string[], warn: [] as string[], error: [] as string[] };
  return {
    lines,
    info: (m) => lines.info.push(m),
    note: (m) => lines.note.push(m),
    warn: (m) => lines.warn.push(m),
    error: (m) => lines.error.push(m),
  };
}

export function scratchDir(files: Record<string, string> = {}): string {
  const dir = mkdtempSync(join(tmpdir(), "rxren-test-"));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content);
  }
  return dir;
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function listing(dir: string): string[] {
  return readdirSync(dir).sort();
}
