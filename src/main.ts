/**
 * Dispatch: parse flags, load defaults, run a command and return its exit code.
 */

import { runRename } from "./commands/rename.js";
import { runSelftest } from "./commands/selftest.js";
import { configPath, loadDefaults } from "./config.js";
import { EXIT_FAILURE, EXIT_OK, EXIT_UNEXPECTED, errorMessage } from "./errors.js";
import { parseArgs, printHelp, printVersion, resolveInvocation } from "./flags.js";
import { outputFor } from "./output.js";

export function run(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  const args = parseArgs(argv);
  const output = outputFor(args.quiet);
  try {
    const defaults = loadDefaults(configPath(env));
    if (!defaults.ok) {
      output.error(defaults.error.message);
      return EXIT_FAILURE;
    }
    const invocation = resolveInvocation(args, defaults.value);
    if (!invocation.ok) {
      outputFor(args.quiet || defaults.value.quiet).error(invocation.error.message);
      return EXIT_FAILURE;
    }

    const target = invocation.value;
    switch (target.command) {
      case "help":
        printHelp();
        return EXIT_OK;
      case "version":
        printVersion();
        return EXIT_OK;
      case "selftest":
        return runSelftest(target.dir);
      case "rename":
        return runRename(target.options);
    }
  } catch (err: unknown) {
    output.error(errorMessage(err));
    return EXIT_UNEXPECTED;
  }
}
