/**
 * Console output for commands. Quiet mode swaps in a silent implementation;
 * the exit code still carries the outcome.
 */

import pc from "picocolors";

export interface Output {
  /** Regular progress lines (stdout). */
  info(message: string): void;
  /** Notes and warnings that do not change the outcome (stderr). */
  note(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleOutput: Output = {
  info: (message) => console.log(message),
  note: (message) => console.error(pc.dim(`note: ${message}`)),
  warn: (message) => console.error(pc.yellow(`warning: ${message}`)),
  error: (message) => console.error(pc.red(`Error: ${message}`)),
};

export const silentOutput: Output = {
  info: () => {},
  note: () => {},
  warn: () => {},
  error: () => {},
};

export function outputFor(quiet: boolean): Output {
  return quiet ? silentOutput : consoleOutput;
}
