import type { RestoreOptions } from "../config/config.js";
import { printLines } from "../cli/cli-utils.js";
import { formatRestoreOutcome, formatRestoreSummary, runRestore } from "../glacier/restore.js";
import { createCliLogger } from "../logging/logger.js";
import { defaultRuntime } from "../runtime.js";
import { createS3Manager } from "../s3/manager.js";
import type { CommandDeps } from "./deps.js";

export async function restoreCommand(options: RestoreOptions, deps: CommandDeps = {}): Promise<void> {
  const runtime = deps.runtime ?? defaultRuntime;
  const manager = deps.manager ?? createS3Manager({ region: options.region });
  const logger = deps.logger ?? createCliLogger({ subsystem: "glacier/restore", logFile: options.logFile });

  try {
    const summary = await runRestore(
      manager,
      {
        bucketName: options.bucket,
        prefix: options.prefix,
        days: options.days,
        tier: options.tier,
        concurrency: options.threads,
        region: options.region,
        onOutcome: (outcome) => runtime.log(formatRestoreOutcome(outcome)),
      },
      logger,
    );
    printLines(runtime, formatRestoreSummary(summary, options.logFile));
  } finally {
    await logger.close();
  }
}
