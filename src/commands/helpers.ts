/**
 * Shared helpers for CLI command handlers
 */

import type { RunSettings } from "../config.js";
import type { MirrorResult, VerificationReport } from "../types.js";

/**
 * Process exit codes
 * Verification failure and mirror failure are distinct so callers can branch
 */
export const EXIT_CODES = {
  OK: 0,
  FATAL: 1,
  VERIFICATION_FAILED: 2,
  MIRROR_FAILED: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Options every command that touches the log directory takes
 */
interface LogDirCommandOptions {
  logDir: string;
  json: boolean;
}

export interface VerifyCommandOptions extends LogDirCommandOptions {
  algorithm?: string;
  /** Rotation threshold in bytes */
  maxLogSize?: number;
  verbose: boolean;
}

export interface MirrorCommandOptions extends LogDirCommandOptions {
  retries?: number;
  retryWait?: number;
  ipg?: number;
  mirrorCommand?: string;
}

export type SyncCommandOptions = VerifyCommandOptions & MirrorCommandOptions;

/**
 * Map CLI flags onto settings overrides; flags left unset fall through to
 * the environment and defaults
 */
export function toSettingsOverrides(options: Partial<SyncCommandOptions>): Partial<RunSettings> {
  return {
    algorithm: options.algorithm,
    maxLogSizeBytes: options.maxLogSize,
    retries: options.retries,
    retryWaitSeconds: options.retryWait,
    interPacketGapMs: options.ipg,
    mirrorCommand: options.mirrorCommand,
  };
}
/**
 * Combine phase results into the process exit code
 * A verification failure outranks a mirror failure
 */
export function exitCodeFor(mirror: MirrorResult | null, report: VerificationReport | null): ExitCode {
  if (report && !report.success) {
    return EXIT_CODES.VERIFICATION_FAILED;
  }
  if (mirror && mirror.status === "failure") {
    return EXIT_CODES.MIRROR_FAILED;
  }
  return EXIT_CODES.OK;
}
