/**
 * Type definitions shared by the mirror and verification phases
 */
import type { DirectoryReadError, FileHashError } from "./errors.js";

// ============================================================================
// Hash Index
// ============================================================================

/**
 * Relative path key -> lowercase hex digest
 * Keys use "/" separators and carry no leading separator
 */
export type PathHashMap = Map<string, string>;

/**
 * Computes the hex digest of one file
 */
export type FileHasher = (filePath: string, algorithm: string) => Promise<string>;

/**
 * A file that could not be hashed during a walk
 */
export interface FileHashFailure {
  /** Relative path key of the file */
  path: string;
  error: FileHashError;
}

/**
 * A directory whose entries could not be listed; nothing under it is indexed
 */
export interface DirectoryReadFailure {
  /** Relative path key of the directory ("" for the root) */
  path: string;
  error: DirectoryReadError;
}

/**
 * Result of indexing one directory tree
 */
export interface HashIndex {
  hashes: PathHashMap;
  failures: FileHashFailure[];
  unreadableDirs: DirectoryReadFailure[];
  /** Files left unhashed because their key was excluded */
  skipped: number;
}

// ============================================================================
// Verification
// ============================================================================

export type VerificationOutcome = "verified" | "mismatch" | "missing";

export interface VerifyOptions {
  sourceRoot: string;
  destRoot: string;
  checkpointPath: string;
  logPath: string;
  maxLogSizeBytes: number;
  /** Digest algorithm (default: sha256) */
  algorithm?: string;
  /** Override the per-file digest function */
  hashFile?: FileHasher;
  /** Called after each outcome is logged */
  onOutcome?: (outcome: VerificationOutcome, key: string) => void;
}

/**
 * Outcome counts and error messages of one verification run
 */
export interface VerificationReport {
  verified: number;
  mismatched: number;
  missing: number;
  /** Source files skipped because the checkpoint already confirmed them */
  skipped: number;
  /** Files that could not be hashed (source or destination side) */
  hashFailures: number;
  /** Itemized error messages, in the order they were logged */
  errors: string[];
  /** Messages of rotations that failed during the run */
  rotationFailures: string[];
  /** Archives created during the run */
  archives: string[];
  success: boolean;
}

// ============================================================================
// Mirror
// ============================================================================

export type MirrorStatus = "success" | "success-with-warnings" | "failure";

export interface MirrorOptions {
  sourceRoot: string;
  destRoot: string;
  /** Log file the copy tool appends to */
  logPath: string;
  /** Executable to run (default: robocopy) */
  command?: string;
  /** Retries per failed copy */
  retries: number;
  /** Seconds between retries */
  retryWaitSeconds: number;
  /** Inter-packet gap in milliseconds, 0 disables it */
  interPacketGapMs: number;
}

export interface MirrorResult {
  status: MirrorStatus;
  /** Exit code, or null when the tool did not start or was killed */
  exitCode: number | null;
  command: string;
  args: string[];
  error?: string;
}
