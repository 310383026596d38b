/**
 * Mirror phase: invoke the external copy tool
 *
 * The copy itself (retries, backoff, network resilience) belongs to the tool.
 * This module only builds its argument list and classifies its exit status.
 */
import { spawn, type ChildProcess } from "node:child_process";

import { debugMirror } from "./debug.js";
import { describeError, MirrorInvocationError } from "./errors.js";
import type { MirrorOptions, MirrorResult, MirrorStatus } from "./types.js";

export const DEFAULT_MIRROR_COMMAND = "robocopy";

/** Default mirror log file name inside the log directory */
export const MIRROR_LOG_FILE = "mirror_log.txt";

/** Nothing to copy, or files copied without incident */
export const MIRROR_CLEAN_MAX_EXIT_CODE = 1;

/** Exit codes above this value mean the copy did not complete */
export const MIRROR_SUCCESS_MAX_EXIT_CODE = 3;

/**
 * Build the copy tool's argument list
 *
 * @example
 * buildMirrorArgs({ sourceRoot: 'D:\\src', destRoot: 'E:\\dst', logPath: 'E:\\logs\\mirror_log.txt',
 *   retries: 5, retryWaitSeconds: 5, interPacketGapMs: 0 })
 * // ['D:\\src', 'E:\\dst', '/E', '/COPY:DAT', '/DCOPY:T', '/R:5', '/W:5', '/XO', '/NDL', '/TEE', '/LOG+:E:\\logs\\mirror_log.txt']
 */
export function buildMirrorArgs(options: MirrorOptions): string[] {
  const args = [
    options.sourceRoot,
    options.destRoot,
    "/E",
    "/COPY:DAT",
    "/DCOPY:T",
    `/R:${options.retries}`,
    `/W:${options.retryWaitSeconds}`,
  ];

  if (options.interPacketGapMs > 0) {
    args.push(`/IPG:${options.interPacketGapMs}`);
  }

  args.push("/XO", "/NDL", "/TEE", `/LOG+:${options.logPath}`);
  return args;
}

/**
 * Classify the copy tool's exit code
 *
 * 0-1 success, 2-3 success with warnings (extra entries in the destination),
 * 4 and above (mismatches, copy failures) or no code at all failure
 */
export function classifyExitCode(code: number | null): MirrorStatus {
  if (code === null || !Number.isInteger(code) || code < 0) {
    return "failure";
  }
  if (code <= MIRROR_CLEAN_MAX_EXIT_CODE) {
    return "success";
  }
  if (code <= MIRROR_SUCCESS_MAX_EXIT_CODE) {
    return "success-with-warnings";
  }
  return "failure";
}

/**
 * Run the copy tool to completion
 * Never rejects: a tool that cannot start resolves as a failure
 */
export async function runMirror(options: MirrorOptions): Promise<MirrorResult> {
  const command = options.command ?? DEFAULT_MIRROR_COMMAND;
  const args = buildMirrorArgs(options);

  debugMirror("Running %s %s", command, args.join(" "));

  let child: ChildProcess;
  try {
    child = spawn(command, args, { stdio: "inherit" });
  } catch (err) {
    return { status: "failure", exitCode: null, command, args, error: describeError(err) };
  }

  return new Promise<MirrorResult>((resolve) => {
    let settled = false;

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      debugMirror.error(`Failed to start ${command}`, err);
      resolve({ status: "failure", exitCode: null, command, args, error: describeError(err) });
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      const status = classifyExitCode(code);
      debugMirror("%s exited with code %s (%s)", command, String(code), status);

      const result: MirrorResult = { status, exitCode: code, command, args };
      if (status === "failure") {
        result.error = signal
          ? `${command} was terminated by ${signal}`
          : `${command} exited with code ${code}`;
      }
      resolve(result);
    });
  });
}

/**
 * Convert a failed mirror result into an error for reporting
 *
 * @returns null when the mirror succeeded (with or without warnings)
 */
export function toMirrorError(result: MirrorResult): MirrorInvocationError | null {
  if (result.status !== "failure") {
    return null;
  }
  return new MirrorInvocationError(
    `Mirror failed: ${result.error ?? `${result.command} exited with code ${result.exitCode}`}`,
    result.exitCode
  );
}
