import { Option, type Command } from "commander";

import { DEFAULT_THREADS, parseOptions, restoreOptionsSchema } from "../../config/config.js";
import type { CommandDeps } from "../../commands/deps.js";
import { restoreCommand } from "../../commands/restore.js";
import { defaultRuntime } from "../../runtime.js";
import { RESTORE_TIERS } from "../../s3/types.js";
import { runCommandWithRuntime } from "../cli-utils.js";

export function registerRestoreCommand(program: Command, deps: CommandDeps = {}) {
  const runtime = deps.runtime ?? defaultRuntime;

  program
    .command("restore")
    .description("Restore S3 Glacier objects by prefix and show detailed status")
    .requiredOption("--bucket <name>", "S3 bucket name")
    .requiredOption("--prefix <prefix>", "S3 prefix (folder)")
    .option("--log-file <path>", "Log file name", "glacier_restore.log")
    .option("--days <n>", "Number of days to keep restored objects", "2")
    .addOption(new Option("--tier <tier>", "Restore tier").choices(RESTORE_TIERS).default("Expedited"))
    .option("--threads <n>", "Number of parallel restore requests", String(DEFAULT_THREADS))
    .option("--region <region>", "AWS region (default: AWS_REGION or us-east-1)")
    .action(async (opts: Record<string, unknown>) => {
      await runCommandWithRuntime(runtime, async () => {
        await restoreCommand(parseOptions(restoreOptionsSchema, opts), deps);
      });
    });
}
