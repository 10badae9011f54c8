import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, readFile, readdir, rm, writeFile } from "fs/promises";
import { join } from "node:path";
import { generateManifest, listCanonicalImages } from "./manifest";
import { EmptyManifestError, IOError } from "../types";
import { makeTempDir, removeDir } from "../test-helpers";

const MANIFEST = "calibration_list.txt";

describe("generateManifest", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      await writeFile(join(dir, name), "");
    }
  }

  it("lists canonical files of the current format in ordinal order", async () => {
    await touch(
      "calib_000010.jpg",
      "calib_000000.jpg",
      "calib_000002.jpg",
      "calib_000001.png",
      "calib_extra.jpg",
      "notes.txt",
    );

    const result = await generateManifest(dir, "jpeg", MANIFEST);

    const expected = [
      join(dir, "calib_000000.jpg"),
      join(dir, "calib_000002.jpg"),
      join(dir, "calib_000010.jpg"),
    ];
    expect(result.entries).toEqual(expected);
    expect(result.path).toBe(join(dir, MANIFEST));
    expect(await readFile(result.path, "utf-8")).toBe(
      `${expected.join("\n")}\n`,
    );
  });

  it("produces byte-identical output on a second run", async () => {
    await touch("calib_000000.jpg", "calib_000001.jpg");

    await generateManifest(dir, "jpeg", MANIFEST);
    const first = await readFile(join(dir, MANIFEST));
    await generateManifest(dir, "jpeg", MANIFEST);
    const second = await readFile(join(dir, MANIFEST));

    expect(second.equals(first)).toBe(true);
  });

  it("reflects files removed since the last run", async () => {
    await touch("calib_000000.jpg", "calib_000001.jpg", "calib_000002.jpg");
    await generateManifest(dir, "jpeg", MANIFEST);

    await rm(join(dir, "calib_000001.jpg"));
    const result = await generateManifest(dir, "jpeg", MANIFEST);

    expect(result.entries).toEqual([
      join(dir, "calib_000000.jpg"),
      join(dir, "calib_000002.jpg"),
    ]);
  });

  it("leaves no temporary file behind", async () => {
    await touch("calib_000000.jpg");

    await generateManifest(dir, "jpeg", MANIFEST);

    expect((await readdir(dir)).sort()).toEqual([
      "calib_000000.jpg",
      MANIFEST,
    ]);
  });

  it("throws IOError when the list file cannot be written", async () => {
    await touch("calib_000000.jpg");
    const manifestPath = join(dir, MANIFEST);
    await mkdir(manifestPath);

    const error = await generateManifest(dir, "jpeg", MANIFEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ kind: "io", path: manifestPath });
    expect(String(error)).toContain(`Failed to write image list file ${manifestPath}`);
    expect((await readdir(dir)).sort()).toEqual(["calib_000000.jpg", MANIFEST]);
  });

  it("throws EmptyManifestError when no canonical file exists", async () => {
    await touch("notes.txt");

    await expect(generateManifest(dir, "jpeg", MANIFEST)).rejects.toBeInstanceOf(
      EmptyManifestError,
    );
  });

  it("throws EmptyManifestError for a missing directory", async () => {
    await expect(
      generateManifest(join(dir, "missing"), "jpeg", MANIFEST),
    ).rejects.toBeInstanceOf(EmptyManifestError);
  });
});

describe("listCanonicalImages", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("ignores the manifest and partial files", async () => {
    await writeFile(join(dir, "calib_000000.webp"), "");
    await writeFile(join(dir, "calib_000001.webp.partial"), "");
    await writeFile(join(dir, MANIFEST), "");

    expect(await listCanonicalImages(dir, "webp")).toEqual([
      join(dir, "calib_000000.webp"),
    ]);
  });
});
