/**
 * glacier-toolkit library entry point
 */

// S3
export { S3Manager, createS3Manager } from "./s3/manager.js";
export {
  ARCHIVAL_STORAGE_CLASSES,
  RESTORE_TIERS,
  isArchivalStorageClass,
  type ArchivalStorageClass,
  type RestoreTier,
  type S3ClientConfig,
  type S3Object,
  type S3ObjectDetails,
  type S3OperationResult,
  type S3StorageClass,
} from "./s3/types.js";

// Glacier pipelines
export { listArchiveCandidates, isCandidateObject } from "./glacier/listing.js";
export {
  checkRestoreStatus,
  formatStatusSummary,
  parseRestoreHeader,
  scanRestoreStatus,
  summarizeStatusResults,
} from "./glacier/status.js";
export {
  formatRestoreOutcome,
  formatRestoreSummary,
  requestRestore,
  runRestore,
  tallyRestoreOutcomes,
  type RestoreRequest,
  type RunRestoreOptions,
} from "./glacier/restore.js";
export { classifyRestoreError, type RestoreErrorKind } from "./glacier/restore-errors.js";
export {
  cleanupDummyFiles,
  generateDummyFiles,
  runDummyUpload,
  uploadDummyFiles,
} from "./glacier/upload.js";
export type {
  RestoreOutcome,
  RestoreRunSummary,
  RestoreState,
  RestoreStatusSummary,
  StatusCheckResult,
} from "./glacier/types.js";

// IAM
export {
  auditAdminRoles,
  findAdminPolicies,
  formatAdminRoleTable,
  listRoleNames,
  type AdminRoleFinding,
} from "./iam/admin-roles.js";

// Config, logging, CLI
export * from "./config/config.js";
export { createCliLogger, type Logger, type LogLevel } from "./logging/logger.js";
export { buildProgram } from "./cli/program.js";
export { processPooled } from "./utils/pool.js";
