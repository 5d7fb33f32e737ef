/**
 * Utilities Module
 *
 * Shared helpers used across the commands:
 * - Error formatting
 * - Size / percentage formatting
 * - Pooled concurrency
 */

export { extractErrorCode, formatErrorMessage, describeError } from "./errors.js";
export { formatBytes, formatGiB, percentOf } from "./format.js";
export { processPooled, type PoolOptions } from "./pool.js";
