/**
 * Checkpoint store for resumable verification
 *
 * Plain text, one relative path key per line, append-only. Duplicate lines
 * left by an interrupted run collapse when the file is loaded.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { debugCheckpoint } from "./debug.js";

/** Default checkpoint file name inside the log directory */
export const CHECKPOINT_FILE = "hash_checkpoint.txt";

/**
 * Parse checkpoint file content into a set of keys
 */
export function parseCheckpoint(content: string): Set<string> {
  const entries = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed) entries.add(trimmed);
  }
  return entries;
}

/**
 * Load the checkpoint set
 * A missing file is an empty checkpoint
 */
export async function loadCheckpoint(checkpointPath: string): Promise<Set<string>> {
  try {
    const content = await fs.readFile(checkpointPath, "utf-8");
    const entries = parseCheckpoint(content);
    debugCheckpoint("Loaded %d entries from %s", entries.size, checkpointPath);
    return entries;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      debugCheckpoint("No checkpoint at %s, starting empty", checkpointPath);
      return new Set();
    }
    throw err;
  }
}

/**
 * Append one confirmed key to the checkpoint file
 */
export async function addToCheckpoint(checkpointPath: string, key: string): Promise<void> {
  await fs.mkdir(path.dirname(checkpointPath), { recursive: true });
  await fs.appendFile(checkpointPath, key + "\n", "utf-8");
}
