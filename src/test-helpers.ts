/**
 * Shared helpers for filesystem tests
 */

import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import sharp from "sharp";
import { Logger, mergeConfig, type LogSink } from "./utils";
import type { CalibrationConfig, PartialCalibrationConfig } from "./types";

const TEST_CONFIG: CalibrationConfig = {
  input: { extensions: [".jpg", ".jpeg", ".png"] },
  output: {
    directory: "./calibration_images",
    format: "jpeg",
    manifest: "calibration_list.txt",
  },
  sampling: { count: 300, seed: 42 },
  image: { width: 644, height: 392, quality: 95 },
  concurrency: 1,
  logging: { level: "info" },
};

/**
 * Full configuration with test overrides applied
 */
export function testConfig(
  override: PartialCalibrationConfig = {},
): CalibrationConfig {
  return mergeConfig(TEST_CONFIG, override);
}

export async function makeTempDir(prefix = "calib-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write a solid-colour image, creating parent directories
 */
export async function writeImage(
  path: string,
  width: number,
  height: number,
  options: { format?: "jpeg" | "png"; channels?: 3 | 4; shade?: number } = {},
): Promise<void> {
  const { format = "jpeg", channels = 3, shade = 128 } = options;
  const background =
    channels === 4
      ? { r: shade, g: 255 - shade, b: 64, alpha: 0.5 }
      : { r: shade, g: 255 - shade, b: 64 };

  const image = sharp({ create: { width, height, channels, background } });
  const data =
    format === "png" ? await image.png().toBuffer() : await image.jpeg().toBuffer();

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
}

/**
 * Write bytes that no decoder accepts
 */
export async function writeCorruptImage(path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, "this is not an image");
}

/**
 * Logger that keeps every line in memory
 */
export function captureLogger(level: "debug" | "info" | "warn" | "error" = "debug"): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  const sink: LogSink = {
    log: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => lines.push(line),
  };
  return { logger: new Logger(level, sink), lines };
}
