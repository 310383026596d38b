/**
 * Size-based log rotation
 *
 * An oversize log is renamed aside to `<base>-<N><ext>`, where N is the
 * lowest integer >= 1 not already taken in the log directory. The active log
 * path is then free, so the next append starts a fresh file.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { debugRotator } from "./debug.js";
import { RotationError } from "./errors.js";
import { fileExists, getFileSize } from "./file-utils.js";

/**
 * Build the archive path for a given rotation number
 *
 * @example
 * archivePathFor('/logs/hash_verification_log.txt', 2)
 * // '/logs/hash_verification_log-2.txt'
 */
export function archivePathFor(logPath: string, n: number): string {
  const { dir, name, ext } = path.parse(logPath);
  return path.join(dir, `${name}-${n}${ext}`);
}

/**
 * Probe archive names starting at 1 and return the first one not on disk
 */
export async function findAvailableArchivePath(logPath: string): Promise<string> {
  let n = 1;
  while (await fileExists(archivePathFor(logPath, n))) {
    n++;
  }
  return archivePathFor(logPath, n);
}

/**
 * Rotate the log if it has reached the size threshold
 *
 * @returns The archive path the log was moved to, or null if no rotation happened
 * @throws RotationError when the rename fails; the log is left in place
 */
export async function rotateIfNeeded(
  logPath: string,
  maxSizeBytes: number
): Promise<string | null> {
  const size = await getFileSize(logPath);
  if (size === null || size < maxSizeBytes) {
    return null;
  }

  const archivePath = await findAvailableArchivePath(logPath);
  try {
    await fs.rename(logPath, archivePath);
  } catch (err) {
    throw new RotationError(logPath, archivePath, err);
  }

  debugRotator("Rotated %s (%d bytes) to %s", logPath, size, archivePath);
  return archivePath;
}

/**
 * An existing rotation archive
 */
export interface LogArchive {
  path: string;
  number: number;
  size: number;
}

/**
 * List the archives that exist for a log, ordered by rotation number
 */
export async function listArchives(logPath: string): Promise<LogArchive[]> {
  const { dir, name, ext } = path.parse(logPath);
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw err;
  }

  const prefix = `${name}-`;
  const archives: LogArchive[] = [];

  for (const entry of entries) {
    if (!entry.startsWith(prefix) || !entry.endsWith(ext)) continue;
    const middle = entry.slice(prefix.length, entry.length - ext.length);
    if (!/^[1-9]\d*$/.test(middle)) continue;

    const archivePath = path.join(dir, entry);
    const size = await getFileSize(archivePath);
    if (size === null) continue;
    archives.push({ path: archivePath, number: parseInt(middle, 10), size });
  }

  return archives.sort((a, b) => a.number - b.number);
}
