/**
 * Hash verification log writer
 *
 * One line per verification event, appended to a size-bounded log file.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { debugRotator } from "./debug.js";
import { RotationError } from "./errors.js";
import { rotateIfNeeded } from "./log-rotator.js";
import type { VerificationOutcome } from "./types.js";

/** Default hash log file name inside the log directory */
export const HASH_LOG_FILE = "hash_verification_log.txt";

export const SUCCESS_BANNER = "All files verified successfully.";

/**
 * Format the log line for a single outcome
 */
export function formatOutcomeLine(outcome: VerificationOutcome, key: string): string {
  switch (outcome) {
    case "verified":
      return `Verified: ${key}`;
    case "mismatch":
      return `Hash mismatch: ${key}`;
    case "missing":
      return `Missing in destination: ${key}`;
  }
}

/**
 * Format the banner that opens a failure summary
 */
export function formatFailureBanner(errorCount: number): string {
  return `Verification failed with ${errorCount} error(s):`;
}

/**
 * Append-only writer for the hash log
 *
 * Every append is followed by a rotation check. A rotation that fails is
 * recorded and writing continues on the oversize file.
 */
export class HashLog {
  readonly logPath: string;
  readonly maxSizeBytes: number;
  private readonly rotationFailures: RotationError[] = [];
  private readonly archives: string[] = [];

  constructor(logPath: string, maxSizeBytes: number) {
    this.logPath = logPath;
    this.maxSizeBytes = maxSizeBytes;
  }

  /**
   * Rotate the log if it is already at or above the threshold
   */
  async rotate(): Promise<void> {
    try {
      const archive = await rotateIfNeeded(this.logPath, this.maxSizeBytes);
      if (archive) this.archives.push(archive);
    } catch (err) {
      if (!(err instanceof RotationError)) throw err;
      debugRotator.warn(err.message);
      this.rotationFailures.push(err);
    }
  }

  /**
   * Append one line, then rotate if the log is now oversize
   */
  async append(line: string): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    await fs.appendFile(this.logPath, line + "\n", "utf-8");
    await this.rotate();
  }

  async appendOutcome(outcome: VerificationOutcome, key: string): Promise<void> {
    await this.append(formatOutcomeLine(outcome, key));
  }

  /**
   * Write the closing summary: a success line, or a failure banner followed
   * by every error message
   */
  async appendSummary(errors: readonly string[]): Promise<void> {
    if (errors.length === 0) {
      await this.append(SUCCESS_BANNER);
      return;
    }
    await this.append(formatFailureBanner(errors.length));
    for (const error of errors) {
      await this.append(error);
    }
  }

  /** Rotation failures seen so far */
  getRotationFailures(): readonly RotationError[] {
    return this.rotationFailures;
  }

  /** Archive paths created by this writer */
  getArchives(): readonly string[] {
    return this.archives;
  }
}
