import { stat } from "node:fs/promises";

export type PathKind = "file" | "directory";

/**
 * Check that a path exists, optionally of a given kind
 */
export async function pathExists(path: string, kind?: PathKind): Promise<boolean> {
  try {
    const info = await stat(path);
    if (kind === "file") return info.isFile();
    if (kind === "directory") return info.isDirectory();
    return true;
  } catch {
    return false;
  }
}
