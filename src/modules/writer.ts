/**
 * Writer Module
 * Normalizes each sample and writes it under its canonical name
 */

import { mkdir, readdir, rm } from "fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import sharp from "sharp";
import { normalizeImage } from "./normalizer";
import {
  IOError,
  type BuildContext,
  type ItemOutcome,
  type NormalizedImage,
  type OutputFormat,
  type WriteSummary,
} from "../types";
import {
  isStaleOutputName,
  mapEncodeError,
  outputFilename,
  writeFileAtomic,
  type Logger,
  type Tracker,
} from "../utils";

// ============================================================================
// Output directory
// ============================================================================

/**
 * Create the output directory and remove canonical files from earlier runs
 *
 * Creation failure is fatal. A file that cannot be removed is logged,
 * tracked and skipped. Non-canonical files are never touched.
 *
 * @returns Number of stale files removed
 */
export async function prepareOutputDirectory(
  outputDir: string,
  logger: Logger,
  tracker: Tracker,
): Promise<number> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new IOError("Failed to create output directory", outputDir, error);
  }

  let entries: string[];
  try {
    entries = await readdir(outputDir);
  } catch (error) {
    throw new IOError("Failed to read output directory", outputDir, error);
  }

  let removed = 0;
  for (const entry of entries.filter(isStaleOutputName).sort()) {
    const stalePath = path.join(outputDir, entry);
    try {
      await rm(stalePath);
      removed++;
      tracker.incrementStaleRemoved();
    } catch (error) {
      logger.warn(`Failed to remove old file ${stalePath}: ${String(error)}`);
      tracker.trackCleanupError(stalePath, error);
    }
  }

  if (removed > 0) {
    logger.info(`Removed ${removed} stale calibration files from ${outputDir}`);
  }

  return removed;
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode a raster in the configured output format
 */
export async function encodeImage(
  image: NormalizedImage,
  format: OutputFormat,
  quality: number,
): Promise<Buffer> {
  const pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 3 },
  });

  switch (format) {
    case "jpeg":
      return pipeline.jpeg({ quality }).toBuffer();
    case "webp":
      return pipeline.webp({ quality }).toBuffer();
    case "png":
      return pipeline.png().toBuffer();
  }
}

// ============================================================================
// Main Writer Function
// ============================================================================

/**
 * Writes one file per successfully normalized sample
 *
 * Reads from context:
 * - sampleSet (already sorted; index = ordinal)
 *
 * Writes to context:
 * - writeSummary: per-ordinal outcomes and tallies
 */
export async function write(ctx: BuildContext): Promise<void> {
  if (!ctx.sampleSet) {
    throw new Error("Sampler must run before writer");
  }

  const { config, logger, tracker, sampleSet, signal } = ctx;
  const outputDir = path.resolve(config.output.directory);
  const { width, height, quality } = config.image;
  const { format } = config.output;

  const staleRemoved = await prepareOutputDirectory(outputDir, logger, tracker);

  logger.info(`Processing ${sampleSet.length} images...`);

  async function processItem(
    source: string,
    ordinal: number,
  ): Promise<ItemOutcome> {
    if (signal?.aborted) {
      return { status: "skipped", source };
    }

    const normalized = await normalizeImage(source, { width, height });
    if (!normalized.ok) {
      logger.warn(`Failed to decode image: ${source} (${normalized.failure.details})`);
      return { status: "decode-failed", source, failure: normalized.failure };
    }

    const record = {
      ordinal,
      path: path.join(outputDir, outputFilename(ordinal, format)),
    };

    try {
      const encoded = await encodeImage(normalized.image, format, quality);
      await writeFileAtomic(record.path, encoded);
    } catch (error) {
      const { reason, details } = mapEncodeError(error);
      logger.warn(`Failed to save ${record.path} (${details})`);
      return { status: "encode-failed", source, record, reason, details };
    }

    logger.debug(`Saved ${record.path}`);
    return { status: "written", source, record };
  }

  // Ordinals come from the sorted index, never from completion order
  const limit = pLimit(config.concurrency);
  const outcomes = await Promise.all(
    sampleSet.map((source, ordinal) =>
      limit(() => processItem(source, ordinal)),
    ),
  );

  // Single owner tallies once every item has settled
  let written = 0;
  let failed = 0;
  let skipped = 0;
  for (const outcome of outcomes) {
    tracker.record(outcome);
    if (outcome.status === "written") written++;
    else if (outcome.status === "skipped") skipped++;
    else failed++;
  }

  logger.info(`Successfully processed ${written}/${sampleSet.length} images`);

  ctx.writeSummary = { outcomes, written, failed, skipped, staleRemoved };
}
