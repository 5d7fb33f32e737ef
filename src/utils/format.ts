/**
 * Size and percentage formatting for the command summaries.
 */

const GIB = 1024 ** 3;

/**
 * Format byte count into a human-readable string.
 * @example formatBytes(1_048_576) → "1.0 MiB"
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KiB", "MiB", "GiB", "TiB", "PiB"];
  const i = Math.floor(Math.log2(Math.abs(bytes)) / 10);
  const idx = Math.min(i, units.length - 1);
  const value = bytes / 2 ** (idx * 10);
  return `${value.toFixed(idx === 0 ? 0 : 1)} ${units[idx]}`;
}

/**
 * Bytes as gibibytes with two decimals.
 * @example formatGiB(1_610_612_736) → "1.50"
 */
export function formatGiB(bytes: number): string {
  return (bytes / GIB).toFixed(2);
}

/**
 * `part / total` as a percentage; 0 when there is nothing to divide by.
 */
export function percentOf(part: number, total: number): number {
  if (total <= 0) return 0;
  return (part / total) * 100;
}
