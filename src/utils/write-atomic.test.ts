import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, readFile, readdir } from "fs/promises";
import { join } from "node:path";
import { writeFileAtomic } from "./write-atomic";
import { makeTempDir, removeDir } from "../test-helpers";

describe("writeFileAtomic", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("writes the final file and leaves no partial behind", async () => {
    const target = join(dir, "list.txt");

    await writeFileAtomic(target, "a\nb\n");

    expect(await readFile(target, "utf-8")).toBe("a\nb\n");
    expect(await readdir(dir)).toEqual(["list.txt"]);
  });

  it("replaces an existing file", async () => {
    const target = join(dir, "list.txt");
    await writeFileAtomic(target, "old\n");

    await writeFileAtomic(target, "new\n");

    expect(await readFile(target, "utf-8")).toBe("new\n");
  });

  it("removes the partial file when the rename fails", async () => {
    const target = join(dir, "calib_000000.jpg");
    await mkdir(target);

    await expect(writeFileAtomic(target, "data")).rejects.toMatchObject({
      code: "EISDIR",
    });
    expect(await readdir(dir)).toEqual(["calib_000000.jpg"]);
  });
});
