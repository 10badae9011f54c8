/**
 * Canonical output naming
 * calib_<ordinal:6 digits>.<ext>
 */

import type { OutputFormat } from "../types/config";

export const OUTPUT_PREFIX = "calib_";
export const ORDINAL_WIDTH = 6;
export const PARTIAL_SUFFIX = ".partial";

const EXTENSIONS: Record<OutputFormat, string> = {
  jpeg: "jpg",
  png: "png",
  webp: "webp",
};

/**
 * File extension (without dot) written for an output format
 */
export function extensionFor(format: OutputFormat): string {
  return EXTENSIONS[format];
}

/**
 * Build the canonical filename for an ordinal
 *
 * @example
 * outputFilename(7, "jpeg") // "calib_000007.jpg"
 */
export function outputFilename(ordinal: number, format: OutputFormat): string {
  const padded = String(ordinal).padStart(ORDINAL_WIDTH, "0");
  return `${OUTPUT_PREFIX}${padded}.${extensionFor(format)}`;
}

/**
 * Matches canonical names for one format, or for every supported format
 */
export function canonicalNamePattern(format?: OutputFormat): RegExp {
  const extensions = format
    ? [extensionFor(format)]
    : Object.values(EXTENSIONS);
  return new RegExp(
    `^${OUTPUT_PREFIX}\\d{${ORDINAL_WIDTH}}\\.(?:${extensions.join("|")})$`,
  );
}

/**
 * True for canonical names of any supported format
 * and for temporary files left behind by an interrupted write
 */
export function isStaleOutputName(filename: string): boolean {
  const base = filename.endsWith(PARTIAL_SUFFIX)
    ? filename.slice(0, -PARTIAL_SUFFIX.length)
    : filename;
  return canonicalNamePattern().test(base);
}
