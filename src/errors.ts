/**
 * Error types for mirror and verification failures
 *
 * Only SourceMissingError and ConfigError are fatal. The others describe a
 * failure local to one entry, one rotation or the mirror step, and are
 * reported without aborting the run.
 */

export type MirrorVerifyErrorCode =
  | "SOURCE_MISSING"
  | "MIRROR_FAILED"
  | "HASH_FAILED"
  | "READ_FAILED"
  | "ROTATION_FAILED"
  | "INVALID_CONFIG";

/**
 * Base class for all errors raised by mirror-verify
 */
export class MirrorVerifyError extends Error {
  readonly code: MirrorVerifyErrorCode;

  constructor(code: MirrorVerifyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MirrorVerifyError";
    this.code = code;
  }
}

export class SourceMissingError extends MirrorVerifyError {
  readonly sourceRoot: string;

  constructor(sourceRoot: string, cause?: unknown) {
    super("SOURCE_MISSING", `Source directory not found or not readable: ${sourceRoot}`, { cause });
    this.name = "SourceMissingError";
    this.sourceRoot = sourceRoot;
  }
}

export class MirrorInvocationError extends MirrorVerifyError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, cause?: unknown) {
    super("MIRROR_FAILED", message, { cause });
    this.name = "MirrorInvocationError";
    this.exitCode = exitCode;
  }
}

export class FileHashError extends MirrorVerifyError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super("HASH_FAILED", `Failed to hash ${filePath}: ${describeError(cause)}`, { cause });
    this.name = "FileHashError";
    this.filePath = filePath;
  }
}

export class DirectoryReadError extends MirrorVerifyError {
  readonly dirPath: string;

  constructor(dirPath: string, cause: unknown) {
    super("READ_FAILED", `Failed to list ${dirPath}: ${describeError(cause)}`, { cause });
    this.name = "DirectoryReadError";
    this.dirPath = dirPath;
  }
}

export class RotationError extends MirrorVerifyError {
  readonly logPath: string;
  readonly archivePath: string;

  constructor(logPath: string, archivePath: string, cause: unknown) {
    super(
      "ROTATION_FAILED",
      `Failed to rotate ${logPath} to ${archivePath}: ${describeError(cause)}`,
      { cause }
    );
    this.name = "RotationError";
    this.logPath = logPath;
    this.archivePath = archivePath;
  }
}

export class ConfigError extends MirrorVerifyError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
  }
}

/**
 * Extract a one-line message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = (error as NodeJS.ErrnoException).code;
    return code && !error.message.startsWith(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}
