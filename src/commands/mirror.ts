/**
 * Mirror command - Copy the source tree with the external copy tool
 */

import chalk from "chalk";

import { loadSettings, resolvePaths, type RunPaths, type RunSettings } from "../config.js";
import { runMirror, toMirrorError } from "../mirror.js";
import type { MirrorResult } from "../types.js";
import { formatMirrorResult } from "../verification-report.js";
import { assertSourceReadable } from "../verifier.js";
import { exitCodeFor, toSettingsOverrides, type ExitCode, type MirrorCommandOptions } from "./helpers.js";

/**
 * Run the mirror phase and report its outcome
 * Shared by the mirror and sync commands
 */
export async function runMirrorPhase(
  sourceRoot: string,
  destRoot: string,
  settings: RunSettings,
  paths: RunPaths,
  json: boolean
): Promise<MirrorResult> {
  if (!json) {
    console.log(chalk.bold.blue(`📦 Mirroring ${sourceRoot} → ${destRoot}`));
    console.log(chalk.gray(`   Tool: ${settings.mirrorCommand} | Log: ${paths.mirrorLogPath}`));
  }

  const result = await runMirror({
    sourceRoot,
    destRoot,
    logPath: paths.mirrorLogPath,
    command: settings.mirrorCommand,
    retries: settings.retries,
    retryWaitSeconds: settings.retryWaitSeconds,
    interPacketGapMs: settings.interPacketGapMs,
  });

  if (!json) {
    const error = toMirrorError(result);
    if (error) {
      console.log(chalk.red(`✗ ${error.message}`));
    } else if (result.status === "success-with-warnings") {
      console.log(chalk.yellow(`⚠ ${formatMirrorResult(result)}`));
    } else {
      console.log(chalk.green(`✓ ${formatMirrorResult(result)}`));
    }
  }

  return result;
}

/**
 * Run the mirror command
 */
export async function runMirrorCommand(
  sourceRoot: string,
  destRoot: string,
  options: MirrorCommandOptions
): Promise<ExitCode> {
  const settings = loadSettings(toSettingsOverrides(options));
  const paths = resolvePaths(options.logDir);

  await assertSourceReadable(sourceRoot);

  const result = await runMirrorPhase(sourceRoot, destRoot, settings, paths, options.json);

  if (options.json) {
    console.log(JSON.stringify({ mirror: result }, null, 2));
  }

  return exitCodeFor(result, null);
}
