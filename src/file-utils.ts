/**
 * Shared file utilities
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Check if a file exists
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 *
 * @param dirPath - Path to check
 * @returns true if path is a directory, false otherwise
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Get the size of a file in bytes
 *
 * @returns Size in bytes, or null when the file does not exist
 */
export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.size;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Turn a path under a tree root into a relative path key
 *
 * Separators are normalized to "/" and no leading separator is kept, so the
 * same logical file gets the same key in both trees.
 *
 * @example
 * toRelativeKey('/data/src', '/data/src/docs/a.txt') // 'docs/a.txt'
 * toRelativeKey('C:\\src', 'C:\\src\\docs\\a.txt')   // 'docs/a.txt' (on Windows)
 */
export function toRelativeKey(rootPath: string, filePath: string): string {
  const relative = path.relative(rootPath, filePath);
  return relative.split(path.sep).join("/").replace(/^\/+/, "");
}
