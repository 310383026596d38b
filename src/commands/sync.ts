/**
 * Sync command - Mirror the source tree, then verify the copy
 *
 * A failed mirror does not stop verification: the destination is checked in
 * whatever state the copy tool left it.
 */

import chalk from "chalk";

import { loadSettings, resolvePaths } from "../config.js";
import { printReport } from "../verification-report.js";
import { assertSourceReadable } from "../verifier.js";
import { exitCodeFor, toSettingsOverrides, type ExitCode, type SyncCommandOptions } from "./helpers.js";
import { runMirrorPhase } from "./mirror.js";
import { runVerificationPhase } from "./verify.js";

export async function runSync(
  sourceRoot: string,
  destRoot: string,
  options: SyncCommandOptions
): Promise<ExitCode> {
  const settings = loadSettings(toSettingsOverrides(options));
  const paths = resolvePaths(options.logDir);

  await assertSourceReadable(sourceRoot);

  const mirror = await runMirrorPhase(sourceRoot, destRoot, settings, paths, options.json);

  if (!options.json) {
    if (mirror.status === "failure") {
      console.log(chalk.yellow("   Continuing with verification of the current destination state"));
    }
    console.log("");
    console.log(chalk.bold.blue(`🔍 Verifying ${destRoot} against ${sourceRoot}`));
  }

  const report = await runVerificationPhase(sourceRoot, destRoot, settings, paths, options);

  if (options.json) {
    console.log(JSON.stringify({ mirror, verification: report }, null, 2));
  } else {
    printReport(report);
  }

  return exitCodeFor(mirror, report);
}
