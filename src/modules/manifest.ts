/**
 * Manifest Module
 * Lists the canonical images that actually exist in the output directory
 */

import glob from "fast-glob";
import path from "node:path";
import {
  canonicalNamePattern,
  comparePaths,
  OUTPUT_PREFIX,
  writeFileAtomic,
} from "../utils";
import {
  EmptyManifestError,
  IOError,
  type BuildContext,
  type ManifestResult,
  type OutputFormat,
} from "../types";

/**
 * Absolute paths of canonical images in `outputDir`, sorted by filename
 * Zero-padded ordinals make filename order equal ordinal order
 */
export async function listCanonicalImages(
  outputDir: string,
  format: OutputFormat,
): Promise<string[]> {
  const directory = path.resolve(outputDir);
  const pattern = canonicalNamePattern(format);

  const names = await glob(`${OUTPUT_PREFIX}*`, {
    cwd: directory,
    onlyFiles: true,
    deep: 1,
  });

  return names
    .filter((name) => pattern.test(name))
    .sort(comparePaths)
    .map((name) => path.join(directory, name));
}

/**
 * Scan the directory and write one absolute path per line
 * The directory, not the writer's tally, decides what is listed
 */
export async function generateManifest(
  outputDir: string,
  format: OutputFormat,
  manifestName: string,
): Promise<ManifestResult> {
  const entries = await listCanonicalImages(outputDir, format);

  if (entries.length === 0) {
    throw new EmptyManifestError(path.resolve(outputDir));
  }

  const manifestPath = path.resolve(outputDir, manifestName);
  const content = entries.map((entry) => `${entry}\n`).join("");

  try {
    await writeFileAtomic(manifestPath, content);
  } catch (error) {
    throw new IOError("Failed to write image list file", manifestPath, error);
  }

  return { path: manifestPath, entries };
}

/**
 * Populates ctx.manifest
 */
export async function manifest(ctx: BuildContext): Promise<void> {
  const { config, logger, tracker } = ctx;

  const result = await generateManifest(
    config.output.directory,
    config.output.format,
    config.output.manifest,
  );

  tracker.setManifestEntries(result.entries.length);
  logger.info(
    `Generated image list with ${result.entries.length} entries: ${result.path}`,
  );

  ctx.manifest = result;
}
