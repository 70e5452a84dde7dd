/**
 * Human-readable byte sizes shared by every analyzer and the MCP tools
 */

const SIZE_SUFFIXES = ["B", "KB", "MB", "GB", "TB"] as const;

/** One mebibyte; thresholds are written as multiples of it */
export const MB = 1024 * 1024;

/**
 * Format a byte count with two decimals in base-1024 units
 *
 * @example
 * formatBytes(0);          // "0.00 B"
 * formatBytes(1073741824); // "1.00 GB"
 */
export function formatBytes(bytes: number): string {
  let size = Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
  let suffixIndex = 0;

  while (size >= 1024 && suffixIndex < SIZE_SUFFIXES.length - 1) {
    size /= 1024;
    suffixIndex++;
  }

  return `${size.toFixed(2)} ${SIZE_SUFFIXES[suffixIndex]}`;
}
