/**
 * Collector Module
 * Discovers candidate images under the source root and builds the Corpus
 */

import glob from "fast-glob";
import type { Stats } from "node:fs";
import { stat } from "fs/promises";
import path from "node:path";
import { comparePaths, OUTPUT_PREFIX } from "../utils";
import {
  EmptyCorpusError,
  IOError,
  NotADirectoryError,
  NotFoundError,
} from "../types";
import type { BuildContext } from "../types";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Normalize an extension to lower case with a leading dot
 */
export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Glob patterns that keep previous outputs out of the Corpus
 * when the output directory sits inside the source tree
 */
function outputIgnorePatterns(root: string, outputDir?: string): string[] {
  if (!outputDir) return [];

  const relative = path.relative(root, path.resolve(outputDir));
  if (relative === "") {
    return [`${OUTPUT_PREFIX}*`];
  }
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return [];
  }

  return [`${glob.escapePath(relative.split(path.sep).join("/"))}/**`];
}

/**
 * Recursively enumerate image files under `root`
 *
 * Extension matching is case-insensitive and the result is de-duplicated
 * by absolute path and sorted by path string.
 */
export async function collectImagePaths(
  root: string,
  extensions: readonly string[],
  outputDir?: string,
): Promise<string[]> {
  const sourceDir = path.resolve(root);

  let stats: Stats;
  try {
    stats = await stat(sourceDir);
  } catch (error) {
    if (
      isErrnoException(error) &&
      (error.code === "ENOENT" || error.code === "ENOTDIR")
    ) {
      throw new NotFoundError(sourceDir);
    }
    throw new IOError("Failed to read source directory", sourceDir, error);
  }
  if (!stats.isDirectory()) {
    throw new NotADirectoryError(sourceDir);
  }

  const normalized = [...new Set(extensions.map(normalizeExtension))];

  const matches = await glob(
    normalized.map((ext) => `**/*${glob.escapePath(ext)}`),
    {
      cwd: sourceDir,
      absolute: true,
      onlyFiles: true,
      dot: true,
      caseSensitiveMatch: false,
      ignore: outputIgnorePatterns(sourceDir, outputDir),
    },
  );

  // One entry per file, whichever pattern matched it
  const unique = [...new Set(matches.map((match) => path.resolve(match)))];
  unique.sort(comparePaths);

  if (unique.length === 0) {
    throw new EmptyCorpusError(sourceDir, normalized);
  }

  return unique;
}

/**
 * Populates ctx.corpus
 */
export async function collect(ctx: BuildContext): Promise<void> {
  const { config, logger, tracker } = ctx;

  const corpus = await collectImagePaths(
    ctx.sourceDir,
    config.input.extensions,
    config.output.directory,
  );

  tracker.setCollected(corpus.length);
  logger.info(`Found ${corpus.length} images in ${path.resolve(ctx.sourceDir)}`);

  ctx.corpus = corpus;
}
