/**
 * Error helpers shared by the S3 and IAM pipelines.
 */

/**
 * Extract an error code from an error object.
 *
 * AWS SDK v3 exceptions carry the service error code in `name`
 * (e.g. `RestoreAlreadyInProgress`); node errors carry it in `code`.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  if (err instanceof Error && err.name && err.name !== "Error") return err.name;
  return undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/**
 * Code and message in one string, the shape the vendor error signatures
 * are matched against: `RestoreAlreadyInProgress: Object restore is already in progress`.
 */
export function describeError(err: unknown): string {
  const code = extractErrorCode(err);
  const message = formatErrorMessage(err);
  if (!code || message === code) return message;
  return `${code}: ${message}`;
}
