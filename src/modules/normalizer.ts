/**
 * Normalizer Module
 * Decodes one image and brings it to the target resolution
 */

import sharp from "sharp";
import type { NormalizeResult, NormalizedImage } from "../types";

export interface TargetSize {
  width: number;
  height: number;
}

/**
 * Decode to a three-channel raster (alpha dropped, grey expanded to sRGB)
 * EXIF orientation is applied first, so width and height are as displayed
 */
async function decode(imagePath: string): Promise<NormalizedImage> {
  const { data, info } = await sharp(imagePath, { failOn: "error" })
    .rotate()
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 3) {
    throw new Error(`Expected 3 channels after decode, got ${info.channels}`);
  }

  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
    resized: false,
  };
}

/**
 * Direct, non-uniform resize with a linear filter; aspect ratio is not kept
 */
async function resize(
  image: NormalizedImage,
  target: TargetSize,
): Promise<NormalizedImage> {
  const { data, info } = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 3 },
  })
    .resize(target.width, target.height, { fit: "fill", kernel: "linear" })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
    resized: true,
  };
}

/**
 * Load one image and resize it only when its size differs from the target
 *
 * Unreadable input (missing, empty, corrupt, unsupported) is reported as a
 * `decode-failed` result rather than thrown.
 */
export async function normalizeImage(
  imagePath: string,
  target: TargetSize,
): Promise<NormalizeResult> {
  try {
    const image = await decode(imagePath);

    if (image.width === target.width && image.height === target.height) {
      return { ok: true, image };
    }

    return { ok: true, image: await resize(image, target) };
  } catch (error) {
    return {
      ok: false,
      failure: {
        reason: "decode-failed",
        path: imagePath,
        details: error instanceof Error ? error.message : String(error),
      },
    };
  }
}
