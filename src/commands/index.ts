/**
 * CLI Commands module
 * Re-exports all command handlers for the CLI
 */

export { runSync } from "./sync.js";
export { runMirrorCommand } from "./mirror.js";
export { runVerify } from "./verify.js";
export { runStatus } from "./status.js";

export { EXIT_CODES } from "./helpers.js";
export type {
  ExitCode,
  MirrorCommandOptions,
  SyncCommandOptions,
  VerifyCommandOptions,
} from "./helpers.js";
