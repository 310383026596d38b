/**
 * Directory tree hashing
 *
 * Walks every regular file under a root and maps its relative path key to a
 * content digest. A file that fails to hash, or a directory that cannot be
 * listed, is reported on its own and does not stop the walk.
 */
import { createHash, getHashes } from "node:crypto";
import { createReadStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { glob } from "glob";

import { debugIndexer } from "./debug.js";
import { DirectoryReadError, FileHashError } from "./errors.js";
import { isDirectory, toRelativeKey } from "./file-utils.js";
import type {
  DirectoryReadFailure,
  FileHasher,
  FileHashFailure,
  HashIndex,
  PathHashMap,
} from "./types.js";

export const DEFAULT_HASH_ALGORITHM = "sha256";

/**
 * Check whether the runtime can compute a digest by this name
 */
export function isSupportedAlgorithm(algorithm: string): boolean {
  return getHashes().includes(algorithm.toLowerCase());
}

/**
 * Stream a file through a digest and return it as lowercase hex
 */
export async function hashFile(filePath: string, algorithm: string): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export interface BuildHashMapOptions {
  /** Digest algorithm (default: sha256) */
  algorithm?: string;
  /** Keys to leave unhashed */
  exclude?: ReadonlySet<string>;
  hashFile?: FileHasher;
}

/**
 * An entry the walk found but could not resolve or list
 */
export interface UnreadableEntry {
  /** Absolute path */
  path: string;
  kind: "file" | "directory";
  cause: unknown;
}

export interface TreeListing {
  /** Absolute paths of regular files, including symlinks to regular files */
  files: string[];
  unreadable: UnreadableEntry[];
}

/**
 * Walk a tree for its regular files
 *
 * Pipes, sockets, devices and symlinked directories are left out. Directories
 * that cannot be listed, and symlinks that cannot be resolved, are returned
 * in `unreadable`. A missing root lists nothing.
 */
export async function walkTree(rootPath: string): Promise<TreeListing> {
  const root = path.resolve(rootPath);
  if (!(await isDirectory(root))) {
    debugIndexer.warn("Root %s is not a directory, treating as empty", root);
    return { files: [], unreadable: [] };
  }

  const entries = await glob("**/*", { cwd: root, dot: true, withFileTypes: true });

  const candidates: string[] = [];
  const directories = [root];
  const unreadable: UnreadableEntry[] = [];

  for (const entry of entries) {
    const fullPath = entry.fullpath();
    if (entry.isFile()) {
      candidates.push(fullPath);
    } else if (entry.isDirectory()) {
      directories.push(fullPath);
    } else if (entry.isSymbolicLink() || entry.isUnknown()) {
      try {
        const stats = await fs.stat(fullPath);
        if (stats.isFile()) {
          candidates.push(fullPath);
        } else if (stats.isDirectory() && !entry.isSymbolicLink()) {
          directories.push(fullPath);
        }
      } catch (err) {
        unreadable.push({ path: fullPath, kind: "file", cause: err });
      }
    } else {
      debugIndexer("Skipping special file %s", fullPath);
    }
  }

  // glob drops a directory it cannot read without reporting it
  for (const dir of directories) {
    try {
      const handle = await fs.opendir(dir);
      await handle.close();
    } catch (err) {
      unreadable.push({ path: dir, kind: "directory", cause: err });
    }
  }

  const blocked = unreadable
    .filter((entry) => entry.kind === "directory")
    .map((entry) => entry.path + path.sep);
  const isBlocked = (p: string) => blocked.some((prefix) => p.startsWith(prefix));

  return {
    files: candidates.filter((file) => !isBlocked(file)),
    unreadable: unreadable.filter((entry) => !isBlocked(entry.path)),
  };
}

/**
 * Build the relative path -> digest map for a tree
 */
export async function buildHashMap(
  rootPath: string,
  options: BuildHashMapOptions = {}
): Promise<HashIndex> {
  const algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
  const hasher = options.hashFile ?? hashFile;
  const root = path.resolve(rootPath);

  const hashes: PathHashMap = new Map();
  const failures: FileHashFailure[] = [];
  const unreadableDirs: DirectoryReadFailure[] = [];
  let skipped = 0;

  const listing = await walkTree(root);
  debugIndexer("Found %d files under %s", listing.files.length, root);

  for (const entry of listing.unreadable) {
    const key = toRelativeKey(root, entry.path);
    debugIndexer.error(`Cannot read ${key || "."}`, entry.cause);
    if (entry.kind === "directory") {
      unreadableDirs.push({ path: key, error: new DirectoryReadError(key || ".", entry.cause) });
    } else if (!options.exclude?.has(key)) {
      failures.push({ path: key, error: new FileHashError(key, entry.cause) });
    }
  }

  for (const filePath of listing.files) {
    const key = toRelativeKey(root, filePath);
    if (options.exclude?.has(key)) {
      skipped++;
      continue;
    }

    try {
      hashes.set(key, await hasher(filePath, algorithm));
    } catch (err) {
      debugIndexer.error(`Failed to hash ${key}`, err);
      failures.push({ path: key, error: new FileHashError(key, err) });
    }
  }

  debugIndexer(
    "Indexed %s: %d hashed, %d skipped, %d failed, %d unreadable directories",
    root,
    hashes.size,
    skipped,
    failures.length,
    unreadableDirs.length
  );
  return { hashes, failures, unreadableDirs, skipped };
}
