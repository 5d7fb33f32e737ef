/**
 * Dummy File Uploader
 *
 * Fills a local directory with random text files, uploads them straight
 * into an archival storage class and removes the directory again. Used to
 * seed a bucket for exercising the restore commands.
 */

import { randomInt } from "node:crypto";
import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";

import type { UploaderConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import type { S3Manager } from "../s3/manager.js";
import { formatBytes } from "../utils/format.js";
import { processPooled } from "../utils/pool.js";

const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export function randomAlphanumeric(length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)];
  }
  return out;
}

/** `dummy_file_0007.txt` */
export function dummyFileName(index: number): string {
  return `dummy_file_${String(index).padStart(4, "0")}.txt`;
}

/**
 * Write `fileCount` files of `fileSizeBytes` random letters and digits.
 */
export async function generateDummyFiles(
  config: Pick<UploaderConfig, "localDir" | "fileCount" | "fileSizeBytes">,
): Promise<string[]> {
  await mkdir(config.localDir, { recursive: true });

  const paths: string[] = [];
  for (let i = 1; i <= config.fileCount; i++) {
    const filePath = join(config.localDir, dummyFileName(i));
    await writeFile(filePath, randomAlphanumeric(config.fileSizeBytes));
    paths.push(filePath);
  }
  return paths;
}

/**
 * Upload every file in the local directory. Failures are logged and the
 * rest of the batch carries on.
 */
export async function uploadDummyFiles(
  manager: S3Manager,
  config: UploaderConfig,
  logger: Logger,
): Promise<void> {
  const entries = await readdir(config.localDir);
  const filePaths = entries.map((entry) => join(config.localDir, entry));

  await processPooled(
    filePaths,
    async (filePath) => {
      const key = `${config.prefix}${basename(filePath)}`;
      const result = await manager.uploadFile({
        bucketName: config.bucketName,
        key,
        filePath,
        storageClass: config.storageClass,
        region: config.region,
      });
      if (result.success) {
        logger.info(`Uploaded: ${key}`);
      } else {
        logger.error(`Failed: ${key} – ${result.error ?? result.message}`);
      }
    },
    { concurrency: config.concurrency },
  );
}

export async function cleanupDummyFiles(localDir: string): Promise<void> {
  await rm(localDir, { recursive: true, force: true });
}

/**
 * Generate, upload, clean up. The local directory is removed even when
 * generation or upload throws.
 */
export async function runDummyUpload(
  manager: S3Manager,
  config: UploaderConfig,
  logger: Logger,
): Promise<void> {
  try {
    await generateDummyFiles(config);
    logger.info(
      `Generated ${config.fileCount} dummy files (${formatBytes(config.fileSizeBytes)} each) in ${config.localDir}`,
    );

    await uploadDummyFiles(manager, config, logger);
    logger.info(
      `All files uploaded to s3://${config.bucketName}/${config.prefix} with ${config.storageClass} storage class.`,
    );
  } finally {
    await cleanupDummyFiles(config.localDir);
    logger.info("Cleaned up local dummy files.");
  }
}
