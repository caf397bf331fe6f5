/**
 * Size parsing and formatting utilities
 *
 * Sizes are binary (multiples of 1024) and rendered without a separator,
 * e.g. "34MB", so progress lines stay compact.
 */

/**
 * Size units mapping to bytes
 */
export const SIZE_UNITS = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
  TB: 1024 * 1024 * 1024 * 1024,
  PB: 1024 * 1024 * 1024 * 1024 * 1024,
} as const;

export type SizeUnit = keyof typeof SIZE_UNITS;

const FORMAT_UNITS: readonly SizeUnit[] = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

export const isSizeUnit = (value: string): value is SizeUnit => value in SIZE_UNITS;

/**
 * Parse size string (e.g., "1.5GB", "500MB", "8 MB") to bytes
 */
export function parseSize(sizeStr: string): number {
  const match = sizeStr.trim().match(/^(\d+(?:\.\d+)?)\s*([KMGTP]?B)$/i);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid size format: ${sizeStr}. Expected format: "1.5GB", "500MB", etc.`);
  }

  const value = parseFloat(match[1]);
  const unit = match[2].toUpperCase();

  if (!isSizeUnit(unit)) {
    throw new Error(`Unknown size unit: ${unit}`);
  }

  return Math.floor(value * SIZE_UNITS[unit]);
}

/**
 * Format bytes to human-readable string (e.g., "34MB", "5GB")
 */
export function formatSize(bytes: number, precision: number = 0): string {
  if (bytes < 0) throw new Error('Size cannot be negative');

  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < FORMAT_UNITS.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(precision)}${FORMAT_UNITS[unitIndex] ?? 'B'}`;
}

/**
 * Integer percentage of `part` in `total`, 0 when total is 0
 */
export function percentOf(part: number, total: number): number {
  if (total <= 0) return 0;
  return Math.floor((part / total) * 100);
}

