/**
 * Sampler Module
 * Draws a reproducible, bounded subset of the Corpus
 */

import { comparePaths, MAX_SEED, mulberry32 } from "../utils";
import type { BuildContext } from "../types";

export interface SampleResult {
  sampleSet: string[];
  usedAll: boolean;
}

/**
 * Seeded draw without replacement
 *
 * When the Corpus holds no more than `count` images it is returned as is.
 * Otherwise a partial Fisher-Yates shuffle picks `count` images, which are
 * then sorted back into path order so ordinals never depend on draw order.
 */
export function sampleImages(
  corpus: readonly string[],
  count: number,
  seed: number,
): SampleResult {
  if (!Number.isInteger(count) || count <= 0) {
    throw new RangeError(`Sample count must be a positive integer, got ${count}`);
  }
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Seed must be an integer in 0..${MAX_SEED}, got ${seed}`);
  }

  if (corpus.length <= count) {
    return { sampleSet: [...corpus], usedAll: true };
  }

  const random = mulberry32(seed);
  const pool = [...corpus];

  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  const sampleSet = pool.slice(0, count).sort(comparePaths);
  return { sampleSet, usedAll: false };
}

/**
 * Reads ctx.corpus, populates ctx.sampleSet
 */
export async function sample(ctx: BuildContext): Promise<void> {
  if (!ctx.corpus) {
    throw new Error("Collector must run before sampler");
  }

  const { config, logger, tracker, corpus } = ctx;
  const { count, seed } = config.sampling;
  const { sampleSet, usedAll } = sampleImages(corpus, count, seed);

  if (usedAll) {
    logger.info(
      `Requested ${count} images, but only ${corpus.length} available. Using all.`,
    );
  } else {
    logger.info(
      `Sampled ${sampleSet.length} images from ${corpus.length} total (seed ${seed})`,
    );
  }

  tracker.setSampled(sampleSet.length, usedAll);
  ctx.sampleSet = sampleSet;
}
