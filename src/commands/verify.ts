/**
 * Verify command - Compare source and destination by content hash
 */

import chalk from "chalk";

import { loadSettings, resolvePaths, type RunPaths, type RunSettings } from "../config.js";
import { formatOutcomeLine } from "../hash-log.js";
import { createSpinner } from "../progress.js";
import type { VerificationReport } from "../types.js";
import { printReport } from "../verification-report.js";
import { verify } from "../verifier.js";
import { exitCodeFor, toSettingsOverrides, type ExitCode, type VerifyCommandOptions } from "./helpers.js";

/**
 * Run the verification phase with console feedback
 * Shared by the verify and sync commands
 */
export async function runVerificationPhase(
  sourceRoot: string,
  destRoot: string,
  settings: RunSettings,
  paths: RunPaths,
  options: Pick<VerifyCommandOptions, "json" | "verbose">
): Promise<VerificationReport> {
  const spinner = options.json ? null : createSpinner("Hashing source and destination");
  spinner?.start();

  let checked = 0;
  try {
    const report = await verify({
      sourceRoot,
      destRoot,
      checkpointPath: paths.checkpointPath,
      logPath: paths.hashLogPath,
      maxLogSizeBytes: settings.maxLogSizeBytes,
      algorithm: settings.algorithm,
      onOutcome: (outcome, key) => {
        checked++;
        spinner?.update(`Comparing files (${checked} checked)`);
        if (options.verbose && !options.json) {
          const line = formatOutcomeLine(outcome, key);
          console.log(outcome === "verified" ? chalk.gray(`   ${line}`) : chalk.red(`   ${line}`));
        }
      },
    });

    if (report.success) {
      spinner?.succeed(`Compared ${checked} file(s)`);
    } else {
      spinner?.fail(`Compared ${checked} file(s) with ${report.errors.length} error(s)`);
    }
    return report;
  } catch (err) {
    spinner?.stop();
    throw err;
  }
}

/**
 * Run the verify command
 */
export async function runVerify(
  sourceRoot: string,
  destRoot: string,
  options: VerifyCommandOptions
): Promise<ExitCode> {
  const settings = loadSettings(toSettingsOverrides(options));
  const paths = resolvePaths(options.logDir);

  if (!options.json) {
    console.log(chalk.bold.blue(`🔍 Verifying ${destRoot} against ${sourceRoot}`));
    console.log(chalk.gray(`   Algorithm: ${settings.algorithm} | Log: ${paths.hashLogPath}`));
  }

  const report = await runVerificationPhase(sourceRoot, destRoot, settings, paths, options);

  if (options.json) {
    console.log(JSON.stringify({ verification: report }, null, 2));
  } else {
    printReport(report);
  }

  return exitCodeFor(null, report);
}
