import { rename, rm, writeFile } from "fs/promises";
import { PARTIAL_SUFFIX } from "./output-names";

/**
 * Write to `<path>.partial` and rename into place
 * A reader never sees a half-written file under the final name
 */
export async function writeFileAtomic(
  filepath: string,
  data: Buffer | string,
): Promise<void> {
  const tempPath = `${filepath}${PARTIAL_SUFFIX}`;
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filepath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
