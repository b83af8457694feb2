import { promises as fs } from "fs";
import path from "path";
import { toCompactUtcStamp } from "./convert";

let tempCounter = 0;

// fs errors raised inside a Jest sandbox are not instances of its Error
export const isMissingFileError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === "ENOENT";

export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Writes beside the target and renames over it, so readers of `filePath`
 * see either the old contents or the new ones.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  tempCounter += 1;
  const tempPath = `${filePath}.tmp-${process.pid}-${tempCounter}`;
  try {
    await fs.writeFile(tempPath, contents, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** Copies `filePath` to `<filePath>.<stamp>.backup`; null when there is nothing to copy. */
export async function backupFile(filePath: string, now: Date): Promise<string | null> {
  const backupPath = `${filePath}.${toCompactUtcStamp(now)}.backup`;
  try {
    await fs.copyFile(filePath, backupPath);
    return backupPath;
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}
