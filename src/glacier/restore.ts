/**
 * Restore Requester
 *
 * Requests a restore for every archived object under a prefix, falling
 * back to the Standard tier once when the requested tier is refused, and
 * tallies what happened to each object.
 */

import type { Logger } from "../logging/logger.js";
import type { S3Manager } from "../s3/manager.js";
import { isArchivalStorageClass, RESTORE_TIERS, type RestoreTier } from "../s3/types.js";
import { formatErrorMessage } from "../utils/errors.js";
import { formatGiB } from "../utils/format.js";
import { processPooled } from "../utils/pool.js";
import { listArchiveCandidates, sumSizes } from "./listing.js";
import { classifyRestoreError } from "./restore-errors.js";
import { parseRestoreHeader } from "./status.js";
import {
  RESTORE_STATE_LABELS,
  type RestoreOutcome,
  type RestoreOutcomeState,
  type RestoreRunSummary,
} from "./types.js";

export type RestoreRequest = {
  bucketName: string;
  key: string;
  days: number;
  tier: RestoreTier;
  region?: string;
};

const FALLBACK_TIER: RestoreTier = "Standard";

/**
 * Decide and act on one object:
 * not archival → not eligible; restore header present → report it;
 * otherwise request a restore.
 *
 * A failed metadata lookup is only a warning; the restore request is
 * still attempted and its own error decides the outcome.
 */
export async function requestRestore(
  manager: S3Manager,
  request: RestoreRequest,
  logger: Logger,
): Promise<RestoreOutcome> {
  const { key } = request;

  try {
    const metadata = await manager.getObjectMetadata(request.bucketName, key, request.region);
    if (!isArchivalStorageClass(metadata.storageClass)) {
      logger.info(`${key}: Not eligible for restore (StorageClass: ${metadata.storageClass ?? "STANDARD"})`);
      return { key, state: "not-eligible" };
    }

    const progress = parseRestoreHeader(metadata.restore);
    if (progress === "in-progress") {
      logger.info(`${key}: Restore already in progress.`);
      return { key, state: "in-progress" };
    }
    if (progress === "completed") {
      logger.info(`${key}: Restore already completed.`);
      return { key, state: "completed" };
    }
  } catch (err) {
    logger.warn(`Metadata lookup failed for ${key}: ${formatErrorMessage(err)}`);
  }

  try {
    await manager.restoreObject(request);
    logger.info(`${key}: Restore requested (${request.tier}).`);
    return { key, state: "requested", tier: request.tier };
  } catch (err) {
    switch (classifyRestoreError(err)) {
      case "tier-unavailable":
        return fallBackToStandard(manager, request, logger);
      case "already-in-progress":
        logger.info(`${key}: Restore already in progress (detected from exception).`);
        return { key, state: "in-progress" };
      case "not-restorable":
        logger.warn(`${key}: Object restore is not allowed (perhaps not in Glacier).`);
        return { key, state: "not-eligible" };
      case "unclassified":
        logger.error(`${key}: Restore failed: ${formatErrorMessage(err)}`);
        return { key, state: "failed" };
    }
  }
}

async function fallBackToStandard(
  manager: S3Manager,
  request: RestoreRequest,
  logger: Logger,
): Promise<RestoreOutcome> {
  const { key } = request;
  try {
    await manager.restoreObject({ ...request, tier: FALLBACK_TIER });
    logger.warn(`${key}: ${request.tier} not available, switched to ${FALLBACK_TIER}.`);
    return { key, state: "requested", tier: FALLBACK_TIER };
  } catch (err) {
    logger.error(`${key}: Failed to restore with ${FALLBACK_TIER} tier: ${formatErrorMessage(err)}`);
    return { key, state: "failed", tier: FALLBACK_TIER };
  }
}

// =============================================================================
// Batch
// =============================================================================

export type RunRestoreOptions = {
  bucketName: string;
  prefix: string;
  days: number;
  tier: RestoreTier;
  concurrency: number;
  region?: string;
  /** Called as each object is decided, in completion order. */
  onOutcome?: (outcome: RestoreOutcome) => void;
};

const SUMMARY_STATES: readonly RestoreOutcomeState[] = [
  "completed",
  "in-progress",
  "requested",
  "not-eligible",
  "failed",
];

export function tallyRestoreOutcomes(
  outcomes: readonly RestoreOutcome[],
  totals: { total: number; totalSize: number },
): RestoreRunSummary {
  const counts: Record<RestoreOutcomeState, number> = {
    completed: 0,
    "in-progress": 0,
    requested: 0,
    "not-eligible": 0,
    failed: 0,
  };
  const tierUsage: Partial<Record<RestoreTier, number>> = {};

  for (const outcome of outcomes) {
    counts[outcome.state] += 1;
    if (outcome.tier) {
      tierUsage[outcome.tier] = (tierUsage[outcome.tier] ?? 0) + 1;
    }
  }

  return { total: totals.total, totalSize: totals.totalSize, counts, tierUsage };
}

/**
 * List the archival objects under the prefix and request their restore
 * through the worker pool.
 */
export async function runRestore(
  manager: S3Manager,
  options: RunRestoreOptions,
  logger: Logger,
): Promise<RestoreRunSummary> {
  const objects = await listArchiveCandidates(manager, {
    bucketName: options.bucketName,
    prefix: options.prefix,
    region: options.region,
    archivalOnly: true,
  });
  logger.info(`Scanning ${objects.length} objects under ${options.prefix} ...`);

  const outcomes = await processPooled(
    objects,
    (object) =>
      requestRestore(
        manager,
        {
          bucketName: options.bucketName,
          key: object.key,
          days: options.days,
          tier: options.tier,
          region: options.region,
        },
        logger,
      ),
    { concurrency: options.concurrency, onResult: options.onOutcome },
  );

  return tallyRestoreOutcomes(outcomes, {
    total: objects.length,
    totalSize: sumSizes(objects),
  });
}

// =============================================================================
// Output
// =============================================================================

export function formatRestoreOutcome(outcome: RestoreOutcome): string {
  const tier = outcome.tier ? ` (Tier: ${outcome.tier})` : "";
  return `${outcome.key}: ${RESTORE_STATE_LABELS[outcome.state]}${tier}`;
}

export function formatRestoreSummary(summary: RestoreRunSummary, logFile?: string): string[] {
  const row = (label: string, value: string | number) => `${label.padEnd(30)}${value}`;

  const lines = [
    "",
    "===== Glacier Restore Status Summary =====",
    row("Total objects scanned:", summary.total),
    row("Total data size (GiB):", formatGiB(summary.totalSize)),
    ...SUMMARY_STATES.map((state) => row(`${RESTORE_STATE_LABELS[state]}:`, summary.counts[state])),
    "Tier usage (for restore requests):",
  ];

  for (const tier of RESTORE_TIERS) {
    const used = summary.tierUsage[tier];
    if (used) lines.push(`  ${tier}: ${used}`);
  }

  if (logFile) {
    lines.push("", `Details logged to ${logFile}`);
  }
  return lines;
}
