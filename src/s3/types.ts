/**
 * S3 Types
 * Type definitions for the archival-tier object operations
 */

import type { AwsCredentialIdentity } from '@smithy/types';

// ============================================================================
// Core S3 Types
// ============================================================================

export interface S3ClientConfig {
  region?: string;
  credentials?: AwsCredentialIdentity;
}

export interface S3OperationResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: string;
}

export type S3StorageClass =
  | 'STANDARD'
  | 'REDUCED_REDUNDANCY'
  | 'STANDARD_IA'
  | 'ONEZONE_IA'
  | 'INTELLIGENT_TIERING'
  | 'GLACIER'
  | 'DEEP_ARCHIVE'
  | 'OUTPOSTS'
  | 'GLACIER_IR'
  | 'SNOW'
  | 'EXPRESS_ONEZONE';

/** Storage classes whose content needs an explicit restore before it can be read. */
export const ARCHIVAL_STORAGE_CLASSES = ['GLACIER', 'DEEP_ARCHIVE', 'GLACIER_IR'] as const;

export type ArchivalStorageClass = (typeof ARCHIVAL_STORAGE_CLASSES)[number];

export function isArchivalStorageClass(value: string | undefined): value is ArchivalStorageClass {
  return ARCHIVAL_STORAGE_CLASSES.some((storageClass) => storageClass === value);
}

// ============================================================================
// S3 Object Types
// ============================================================================

export interface S3Object {
  key: string;
  lastModified?: Date;
  eTag?: string;
  size: number;
  /**
   * Storage class exactly as S3 reported it. Classes newer than
   * `S3StorageClass` pass through unchanged.
   */
  storageClass?: S3StorageClass | (string & {});
}

export interface S3ObjectDetails extends S3Object {
  contentType?: string;
  /**
   * Raw `x-amz-restore` header, e.g.
   * `ongoing-request="false", expiry-date="Fri, 21 Dec 2012 00:00:00 GMT"`.
   */
  restore?: string;
  versionId?: string;
}

export interface S3ListObjectsOptions {
  bucketName: string;
  prefix?: string;
  continuationToken?: string;
  region?: string;
}

export interface S3ListObjectsResult {
  objects: S3Object[];
  isTruncated?: boolean;
  nextContinuationToken?: string;
  keyCount?: number;
}

export interface S3UploadFileOptions {
  bucketName: string;
  key: string;
  filePath: string;
  storageClass?: S3StorageClass;
  contentType?: string;
  region?: string;
}

// ============================================================================
// Restore Types
// ============================================================================

export const RESTORE_TIERS = ['Expedited', 'Standard', 'Bulk'] as const;

export type RestoreTier = (typeof RESTORE_TIERS)[number];

export interface S3RestoreObjectOptions {
  bucketName: string;
  key: string;
  /** Days the restored copy stays readable. */
  days: number;
  tier: RestoreTier;
  region?: string;
}
