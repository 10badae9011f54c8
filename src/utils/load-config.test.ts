import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "node:path";
import { ZodError } from "zod";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";
import { makeTempDir, removeDir } from "../test-helpers";

describe("loadDefaultConfig", () => {
  it("ships the documented defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config).toEqual({
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
    });
  });
});

describe("mergeConfig", () => {
  it("overrides nested values one key at a time", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      sampling: { seed: 7 },
      image: { width: 320 },
      concurrency: 4,
    });

    expect(merged.sampling).toEqual({ count: 300, seed: 7 });
    expect(merged.image).toEqual({ width: 320, height: 392, quality: 95 });
    expect(merged.concurrency).toBe(4);
    expect(merged.output).toEqual(base.output);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("applies a custom config file", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(
      custom,
      JSON.stringify({ sampling: { count: 50 }, output: { format: "png" } }),
    );

    const { config, errors } = await loadConfig(custom);

    expect(errors.filter((e) => e.path === custom)).toEqual([]);
    expect(config.sampling.count).toBe(50);
    expect(config.output.format).toBe("png");
    expect(config.output.manifest).toBe("calibration_list.txt");
  });

  it("reports an invalid custom config instead of merging it", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ image: { quality: 500 } }));

    const { config, errors } = await loadConfig(custom);

    const customErrors = errors.filter((e) => e.path === custom);
    expect(customErrors).toHaveLength(1);
    expect(customErrors[0].error).toBeInstanceOf(ZodError);
    expect(config.image.quality).not.toBe(500);
  });

  it("reports malformed JSON", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, "{ not json");

    const { errors } = await loadConfig(custom);

    const customErrors = errors.filter((e) => e.path === custom);
    expect(customErrors).toHaveLength(1);
    expect(customErrors[0].error).toBeInstanceOf(SyntaxError);
  });
});
