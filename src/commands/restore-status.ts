import type { RestoreStatusOptions } from "../config/config.js";
import { printLines } from "../cli/cli-utils.js";
import { formatStatusSummary, scanRestoreStatus } from "../glacier/status.js";
import { createCliLogger } from "../logging/logger.js";
import { defaultRuntime } from "../runtime.js";
import { createS3Manager } from "../s3/manager.js";
import type { CommandDeps } from "./deps.js";

export async function restoreStatusCommand(
  options: RestoreStatusOptions,
  deps: CommandDeps = {},
): Promise<void> {
  const runtime = deps.runtime ?? defaultRuntime;
  const manager = deps.manager ?? createS3Manager({ region: options.region });
  const logger =
    deps.logger ?? createCliLogger({ subsystem: "glacier/restore-status", logFile: options.logFile });

  try {
    const summary = await scanRestoreStatus(
      manager,
      {
        bucketName: options.bucket,
        prefix: options.prefix,
        concurrency: options.threads,
        region: options.region,
      },
      logger,
    );
    printLines(runtime, formatStatusSummary(summary, options.logFile));
  } finally {
    await logger.close();
  }
}
