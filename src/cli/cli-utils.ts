import type { RuntimeEnv } from "../runtime.js";
import { formatErrorMessage } from "../utils/errors.js";

/**
 * Run a command action, turning a thrown error into `Error: <message>` on
 * stderr and exit code 1. Per-object failures never get this far; only
 * fatal ones (bad options, listing failures, credentials) do.
 */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    runtime.error(`Error: ${formatErrorMessage(err)}`);
    runtime.exit(1);
  }
}

/**
 * Print a block of lines through the runtime.
 */
export function printLines(runtime: RuntimeEnv, lines: readonly string[]): void {
  for (const line of lines) runtime.log(line);
}
