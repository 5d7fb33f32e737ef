import { loadUploaderConfig } from "../config/config.js";
import { runDummyUpload } from "../glacier/upload.js";
import { createCliLogger } from "../logging/logger.js";
import { createS3Manager } from "../s3/manager.js";
import type { CommandDeps } from "./deps.js";

/**
 * Seed a bucket with archived dummy objects. Takes no flags; the defaults
 * can be overridden through GLACIER_UPLOAD_* environment variables.
 */
export async function uploadDummyCommand(deps: CommandDeps = {}): Promise<void> {
  const config = loadUploaderConfig(deps.env ?? process.env);
  const manager = deps.manager ?? createS3Manager({ region: config.region });
  const logger = deps.logger ?? createCliLogger({ subsystem: "glacier/upload-dummy" });

  try {
    await runDummyUpload(manager, config, logger);
  } finally {
    await logger.close();
  }
}
