/**
 * Restore Status Scanner
 *
 * Looks up the restore header of every archived object under a prefix
 * and summarizes how far the restore has come.
 */

import type { Logger } from "../logging/logger.js";
import type { S3Manager } from "../s3/manager.js";
import { formatErrorMessage } from "../utils/errors.js";
import { formatGiB, percentOf } from "../utils/format.js";
import { processPooled } from "../utils/pool.js";
import { listArchiveCandidates, sumSizes } from "./listing.js";
import {
  RESTORE_STATE_LABELS,
  type RestoreProgress,
  type RestoreStatusSummary,
  type StatusCheckResult,
} from "./types.js";

const ONGOING_FALSE = 'ongoing-request="false"';
const ONGOING_TRUE = 'ongoing-request="true"';

/**
 * Read the `x-amz-restore` header. A header that matches neither
 * ongoing-request form counts as not started.
 */
export function parseRestoreHeader(restore: string | undefined): RestoreProgress {
  if (!restore) return "not-started";
  if (restore.includes(ONGOING_FALSE)) return "completed";
  if (restore.includes(ONGOING_TRUE)) return "in-progress";
  return "not-started";
}

/**
 * Classify one object. A failed lookup becomes an `error` result worth
 * zero bytes instead of an exception.
 */
export async function checkRestoreStatus(
  manager: S3Manager,
  bucketName: string,
  key: string,
  logger: Logger,
  region?: string,
): Promise<StatusCheckResult> {
  try {
    const metadata = await manager.getObjectMetadata(bucketName, key, region);
    return { key, state: parseRestoreHeader(metadata.restore), size: metadata.size };
  } catch (err) {
    logger.error(`Error checking ${key}: ${formatErrorMessage(err)}`);
    return { key, state: "error", size: 0 };
  }
}

export type ScanRestoreStatusOptions = {
  bucketName: string;
  prefix: string;
  concurrency: number;
  region?: string;
};

/**
 * Fold per-object results into the run summary. `total` and `totalSize`
 * come from the listing, not from the lookups.
 */
export function summarizeStatusResults(
  results: readonly StatusCheckResult[],
  totals: { total: number; totalSize: number },
): RestoreStatusSummary {
  const summary: RestoreStatusSummary = {
    total: totals.total,
    completed: 0,
    inProgress: 0,
    notStarted: 0,
    error: 0,
    totalSize: totals.totalSize,
    restoredSize: 0,
    percentComplete: 0,
  };

  for (const result of results) {
    switch (result.state) {
      case "completed":
        summary.completed += 1;
        summary.restoredSize += result.size;
        break;
      case "in-progress":
        summary.inProgress += 1;
        break;
      case "not-started":
        summary.notStarted += 1;
        break;
      case "error":
        summary.error += 1;
        break;
    }
  }

  summary.percentComplete = percentOf(summary.completed, summary.total);
  return summary;
}

/**
 * List the prefix, look up every candidate through the worker pool and
 * summarize.
 */
export async function scanRestoreStatus(
  manager: S3Manager,
  options: ScanRestoreStatusOptions,
  logger: Logger,
): Promise<RestoreStatusSummary> {
  const objects = await listArchiveCandidates(manager, {
    bucketName: options.bucketName,
    prefix: options.prefix,
    region: options.region,
  });

  const results = await processPooled(
    objects,
    (object) => checkRestoreStatus(manager, options.bucketName, object.key, logger, options.region),
    {
      concurrency: options.concurrency,
      onResult: (result) => logger.info(`${result.key}: ${RESTORE_STATE_LABELS[result.state]}`),
    },
  );

  return summarizeStatusResults(results, {
    total: objects.length,
    totalSize: sumSizes(objects),
  });
}

/**
 * Human-readable summary block, one string per line.
 */
export function formatStatusSummary(summary: RestoreStatusSummary, logFile?: string): string[] {
  const row = (label: string, value: string | number) => `${label.padEnd(25)}${value}`;

  const lines = [
    "",
    "===== Glacier Restore Status Summary =====",
    row("Total objects scanned:", summary.total),
    row("Restore Completed:", summary.completed),
    row("Restore In Progress:", summary.inProgress),
    row("Restore Not Started:", summary.notStarted),
    row("Errors:", summary.error),
    row("Percent Completed:", `${summary.percentComplete.toFixed(2)}%`),
    row("Total Data Size:", `${formatGiB(summary.totalSize)} GiB`),
    row("Total Restored Size:", `${formatGiB(summary.restoredSize)} GiB`),
  ];

  if (logFile) {
    lines.push("", `Details logged to ${logFile}`);
  }
  return lines;
}
