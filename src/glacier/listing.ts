/**
 * Candidate listing for the status scanner and the restore requester.
 */

import type { S3Manager } from "../s3/manager.js";
import type { S3Object } from "../s3/types.js";
import { isArchivalStorageClass } from "../s3/types.js";

export type ListCandidatesOptions = {
  bucketName: string;
  prefix: string;
  region?: string;
  /** Keep only GLACIER, DEEP_ARCHIVE and GLACIER_IR objects. */
  archivalOnly?: boolean;
};

/**
 * True for listing entries worth a metadata lookup: not the prefix marker
 * itself, not empty, and annotated with a storage class.
 */
export function isCandidateObject(object: S3Object, prefix: string): boolean {
  if (object.key === prefix) return false;
  if (object.size === 0) return false;
  return object.storageClass !== undefined;
}

/**
 * Page through everything under `prefix` and keep the candidates.
 */
export async function listArchiveCandidates(
  manager: S3Manager,
  options: ListCandidatesOptions,
): Promise<S3Object[]> {
  const objects = await manager.listAllObjects({
    bucketName: options.bucketName,
    prefix: options.prefix,
    region: options.region,
  });

  return objects.filter(
    (object) =>
      isCandidateObject(object, options.prefix) &&
      (!options.archivalOnly || isArchivalStorageClass(object.storageClass)),
  );
}

export function sumSizes(objects: readonly S3Object[]): number {
  return objects.reduce((total, object) => total + object.size, 0);
}
