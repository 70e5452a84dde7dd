/**
 * Extraction of reclaimable space from `system df` summary output
 *
 * The container CLI prints a table such as
 *
 *   TYPE            TOTAL     ACTIVE    SIZE      RECLAIMABLE
 *   Images          12        3         4.2GB     3.1GB (73%)
 *   Containers      5         1         120MB     80MB (66%)
 *   Local Volumes   4         2         1.5GB     600MB (40%)
 *   Build Cache     20        0         900MB     900MB
 *
 * Rows that are missing or shaped differently are simply absent from the
 * parsed result.
 */

export interface DfSection {
  /** Reclaimable size as printed, e.g. "3.1GB" */
  reclaimableText: string;
  reclaimableBytes: number;
  /** Reclaimable percentage, when printed */
  percent?: number;
}

export interface SystemDfSummary {
  images?: DfSection;
  containers?: DfSection;
  volumes?: DfSection;
}

const SIZE_TOKEN = "([\\d.]+\\s?[kKMGTP]?B)";

function rowPattern(label: string): RegExp {
  return new RegExp(
    `${label}\\s+\\d+\\s+\\d+\\s+${SIZE_TOKEN}\\s+${SIZE_TOKEN}(?:\\s+\\((\\d+)%\\))?`
  );
}

const UNIT_MULTIPLIERS: Record<string, number> = {
  "": 1,
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
};

/**
 * Convert a size such as "1.5GB", "512 kB" or "10B" to bytes (base 1024).
 * Returns 0 for anything that cannot be read.
 */
export function parseSizeString(text: string): number {
  const match = /^\s*([\d.]+)\s*([KMGT]?)B?\s*$/i.exec(text);
  if (!match) {
    return 0;
  }

  const value = Number.parseFloat(match[1]);
  if (!Number.isFinite(value)) {
    return 0;
  }

  const multiplier = UNIT_MULTIPLIERS[match[2].toUpperCase()] ?? 1;
  return Math.floor(value * multiplier);
}

function parseSection(output: string, label: string): DfSection | undefined {
  const match = rowPattern(label).exec(output);
  if (!match) {
    return undefined;
  }

  const section: DfSection = {
    reclaimableText: match[2],
    reclaimableBytes: parseSizeString(match[2]),
  };
  if (match[3] !== undefined) {
    section.percent = Number.parseInt(match[3], 10);
  }
  return section;
}

export function parseSystemDf(output: string): SystemDfSummary {
  return {
    images: parseSection(output, "Images"),
    containers: parseSection(output, "Containers"),
    volumes: parseSection(output, "Local Volumes"),
  };
}

/**
 * Number of image ids in quiet-mode listing output
 */
export function countListedIds(output: string): number {
  return output.split(/\r?\n/).filter((line) => line.trim().length > 0).length;
}
