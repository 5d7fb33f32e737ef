import type { Command } from "commander";

import { DEFAULT_THREADS, parseOptions, restoreStatusOptionsSchema } from "../../config/config.js";
import type { CommandDeps } from "../../commands/deps.js";
import { restoreStatusCommand } from "../../commands/restore-status.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

export function registerRestoreStatusCommand(program: Command, deps: CommandDeps = {}) {
  const runtime = deps.runtime ?? defaultRuntime;

  program
    .command("restore-status")
    .description("Check S3 Glacier restore status for objects by prefix")
    .requiredOption("--bucket <name>", "S3 bucket name")
    .requiredOption("--prefix <prefix>", "S3 prefix (folder)")
    .option("--log-file <path>", "Log file name", "glacier_restore_status.log")
    .option("--threads <n>", "Number of parallel status checks", String(DEFAULT_THREADS))
    .option("--region <region>", "AWS region (default: AWS_REGION or us-east-1)")
    .action(async (opts: Record<string, unknown>) => {
      await runCommandWithRuntime(runtime, async () => {
        await restoreStatusCommand(parseOptions(restoreStatusOptionsSchema, opts), deps);
      });
    });
}
