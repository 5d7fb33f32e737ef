/**
 * Command Configuration
 *
 * Zod schemas for every subcommand's options. Commander hands over raw
 * strings; the schemas coerce them, apply defaults and reject bad values
 * before any remote call is made.
 */

import { z } from "zod";

import { ARCHIVAL_STORAGE_CLASSES, RESTORE_TIERS } from "../s3/types.js";

// =============================================================================
// Shared fields
// =============================================================================

const positiveInt = z.coerce.number().int().positive();

const regionField = z.string().min(1).optional();

export const DEFAULT_THREADS = 10;

// =============================================================================
// restore-status
// =============================================================================

export const restoreStatusOptionsSchema = z.object({
  bucket: z.string().min(1),
  prefix: z.string().min(1),
  logFile: z.string().min(1).default("glacier_restore_status.log"),
  threads: positiveInt.default(DEFAULT_THREADS),
  region: regionField,
});

export type RestoreStatusOptions = z.infer<typeof restoreStatusOptionsSchema>;

// =============================================================================
// restore
// =============================================================================

export const restoreOptionsSchema = z.object({
  bucket: z.string().min(1),
  prefix: z.string().min(1),
  logFile: z.string().min(1).default("glacier_restore.log"),
  threads: positiveInt.default(DEFAULT_THREADS),
  days: positiveInt.default(2),
  tier: z.enum(RESTORE_TIERS).default("Expedited"),
  region: regionField,
});

export type RestoreOptions = z.infer<typeof restoreOptionsSchema>;

// =============================================================================
// iam-admin-roles
// =============================================================================

export const iamAuditOptionsSchema = z.object({
  threads: positiveInt.default(DEFAULT_THREADS),
  region: regionField,
});

export type IamAuditOptions = z.infer<typeof iamAuditOptionsSchema>;

// =============================================================================
// upload-dummy
// =============================================================================

export const uploaderConfigSchema = z.object({
  bucketName: z.string().min(1).default("glacier-dummy-bucket"),
  prefix: z.string().default("images/"),
  fileCount: positiveInt.default(10_000),
  fileSizeBytes: positiveInt.default(1024),
  localDir: z.string().min(1).default("./dummy_files"),
  storageClass: z.enum(ARCHIVAL_STORAGE_CLASSES).default("GLACIER"),
  concurrency: positiveInt.default(20),
  region: regionField,
});

export type UploaderConfig = z.infer<typeof uploaderConfigSchema>;

/** Environment variables that override the uploader defaults. */
export const UPLOADER_ENV_VARS = {
  bucketName: "GLACIER_UPLOAD_BUCKET",
  prefix: "GLACIER_UPLOAD_PREFIX",
  fileCount: "GLACIER_UPLOAD_FILE_COUNT",
  fileSizeBytes: "GLACIER_UPLOAD_FILE_SIZE",
  localDir: "GLACIER_UPLOAD_DIR",
  storageClass: "GLACIER_UPLOAD_STORAGE_CLASS",
  concurrency: "GLACIER_UPLOAD_CONCURRENCY",
  region: "AWS_REGION",
} as const satisfies Record<keyof UploaderConfig, string>;

/**
 * Resolve the uploader configuration from its defaults and the environment.
 */
export function loadUploaderConfig(env: NodeJS.ProcessEnv = process.env): UploaderConfig {
  const raw: Record<string, string> = {};
  for (const [field, envVar] of Object.entries(UPLOADER_ENV_VARS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") raw[field] = value;
  }
  return parseOptions(uploaderConfigSchema, raw);
}

// =============================================================================
// Validation
// =============================================================================

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

/**
 * Parse raw options against a schema, throwing a single readable error that
 * lists every issue as `path: message`.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "options";
        return `${path}: ${issue.message}`;
      }),
    );
  }
  return result.data;
}
