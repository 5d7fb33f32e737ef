/**
 * Restore-state types shared by the status scanner and the restore requester.
 */

import type { RestoreTier } from "../s3/types.js";

export type RestoreState =
  | "not-started"
  | "in-progress"
  | "completed"
  | "not-eligible"
  | "requested"
  | "failed"
  | "error";

export const RESTORE_STATE_LABELS: Record<RestoreState, string> = {
  "not-started": "Not Started",
  "in-progress": "In Progress",
  completed: "Completed",
  "not-eligible": "Not Eligible",
  requested: "Requested",
  failed: "Failed",
  error: "Error",
};

/** What the `x-amz-restore` header says about an object. */
export type RestoreProgress = "not-started" | "in-progress" | "completed";

// =============================================================================
// Status Scanner
// =============================================================================

export type StatusScanState = Extract<RestoreState, "not-started" | "in-progress" | "completed" | "error">;

export type StatusCheckResult = {
  key: string;
  state: StatusScanState;
  /** Bytes reported by the metadata lookup; 0 when the lookup failed. */
  size: number;
};

export type RestoreStatusSummary = {
  total: number;
  completed: number;
  inProgress: number;
  notStarted: number;
  error: number;
  totalSize: number;
  restoredSize: number;
  percentComplete: number;
};

// =============================================================================
// Restore Requester
// =============================================================================

export type RestoreOutcomeState = Extract<
  RestoreState,
  "completed" | "in-progress" | "requested" | "not-eligible" | "failed"
>;

export type RestoreOutcome = {
  key: string;
  state: RestoreOutcomeState;
  /** Tier of the restore request this outcome came from, when one counts. */
  tier?: RestoreTier;
};

export type RestoreRunSummary = {
  total: number;
  totalSize: number;
  counts: Record<RestoreOutcomeState, number>;
  tierUsage: Partial<Record<RestoreTier, number>>;
};
