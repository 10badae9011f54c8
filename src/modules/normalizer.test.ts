import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "node:path";
import sharp from "sharp";
import { normalizeImage } from "./normalizer";
import {
  makeTempDir,
  removeDir,
  writeCorruptImage,
  writeImage,
} from "../test-helpers";

describe("normalizeImage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("resizes to the exact target without keeping aspect ratio", async () => {
    const source = join(dir, "wide.jpg");
    await writeImage(source, 100, 20);

    const result = await normalizeImage(source, { width: 64, height: 48 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.image.width).toBe(64);
    expect(result.image.height).toBe(48);
    expect(result.image.channels).toBe(3);
    expect(result.image.resized).toBe(true);
    expect(result.image.data.length).toBe(64 * 48 * 3);
  });

  it("passes an image of the target size through unchanged", async () => {
    const source = join(dir, "exact.png");
    await writeImage(source, 32, 24, { format: "png" });
    const decoded = await sharp(source).raw().toBuffer();

    const result = await normalizeImage(source, { width: 32, height: 24 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.image.resized).toBe(false);
    expect(result.image.data.equals(decoded)).toBe(true);
  });

  it("applies EXIF orientation before comparing sizes", async () => {
    // Stored 40x20, displayed 20x40 (rotated 90 degrees clockwise)
    const source = join(dir, "portrait.jpg");
    const stored = await sharp({
      create: { width: 40, height: 20, channels: 3, background: { r: 10, g: 20, b: 30 } },
    })
      .jpeg()
      .withMetadata({ orientation: 6 })
      .toBuffer();
    await writeFile(source, stored);

    const upright = await normalizeImage(source, { width: 20, height: 40 });
    expect(upright.ok).toBe(true);
    if (!upright.ok) return;
    expect(upright.image.resized).toBe(false);
    expect(upright.image.width).toBe(20);
    expect(upright.image.height).toBe(40);

    const sideways = await normalizeImage(source, { width: 40, height: 20 });
    expect(sideways.ok).toBe(true);
    if (!sideways.ok) return;
    expect(sideways.image.resized).toBe(true);
  });

  it("drops the alpha channel", async () => {
    const source = join(dir, "alpha.png");
    await writeImage(source, 16, 16, { format: "png", channels: 4 });

    const result = await normalizeImage(source, { width: 8, height: 8 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.image.channels).toBe(3);
    expect(result.image.data.length).toBe(8 * 8 * 3);
  });

  it("reports a corrupt file as a decode failure", async () => {
    const source = join(dir, "broken.jpg");
    await writeCorruptImage(source);

    const result = await normalizeImage(source, { width: 8, height: 8 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.reason).toBe("decode-failed");
    expect(result.failure.path).toBe(source);
    expect(result.failure.details.length).toBeGreaterThan(0);
  });

  it("reports a zero-byte file as a decode failure", async () => {
    const source = join(dir, "empty.jpg");
    await writeFile(source, "");

    const result = await normalizeImage(source, { width: 8, height: 8 });

    expect(result.ok).toBe(false);
  });

  it("reports a missing file as a decode failure", async () => {
    const result = await normalizeImage(join(dir, "gone.jpg"), {
      width: 8,
      height: 8,
    });

    expect(result.ok).toBe(false);
  });
});
