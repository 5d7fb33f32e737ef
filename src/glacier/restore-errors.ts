/**
 * Restore Error Classification
 *
 * S3 reports restore rejections through error codes and free-text
 * messages that are not a stable contract. All of the substring matching
 * lives here.
 */

import { describeError } from "../utils/errors.js";

export type RestoreErrorKind =
  /** Object cannot be restored at all (wrong storage class). */
  | "not-restorable"
  /** A restore of this object is already running. */
  | "already-in-progress"
  /** The requested tier was refused; Standard may still work. */
  | "tier-unavailable"
  | "unclassified";

const NOT_RESTORABLE_SIGNATURES = ["Object restore is not allowed", "InvalidObjectState"];

const ALREADY_IN_PROGRESS_SIGNATURES = ["already in progress", "RestoreAlreadyInProgress"];

const TIER_UNAVAILABLE_SIGNATURES = [
  "rate of expedited retrievals",
  "is not allowed",
  "cannot be expedited",
  "GlacierExpeditedRetrievalNotAvailable",
];

function matchesAny(text: string, signatures: readonly string[]): boolean {
  return signatures.some((signature) => text.includes(signature));
}

/**
 * Classify a failed restore request.
 *
 * Ineligibility is checked first: its message ("Object restore is not
 * allowed ...") also contains the generic "is not allowed" tier signature.
 */
export function classifyRestoreError(err: unknown): RestoreErrorKind {
  const text = describeError(err);

  if (matchesAny(text, NOT_RESTORABLE_SIGNATURES)) return "not-restorable";
  if (matchesAny(text, ALREADY_IN_PROGRESS_SIGNATURES)) return "already-in-progress";
  if (matchesAny(text, TIER_UNAVAILABLE_SIGNATURES)) return "tier-unavailable";
  return "unclassified";
}
