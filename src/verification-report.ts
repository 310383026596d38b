/**
 * Console rendering of verification and mirror results
 */

import chalk from "chalk";

import { SUCCESS_BANNER, formatFailureBanner } from "./hash-log.js";
import type { MirrorResult, VerificationReport } from "./types.js";

/**
 * One-line count summary, e.g. "3 verified, 1 mismatched, 0 missing, 12 skipped"
 */
export function formatCounts(report: VerificationReport): string {
  const parts = [
    `${report.verified} verified`,
    `${report.mismatched} mismatched`,
    `${report.missing} missing`,
    `${report.skipped} skipped`,
  ];
  if (report.hashFailures > 0) {
    parts.push(`${report.hashFailures} unreadable`);
  }
  return parts.join(", ");
}

/**
 * Print the banner, counts and itemized errors of a verification run
 */
export function printReport(report: VerificationReport): void {
  console.log("");
  if (report.success) {
    console.log(chalk.bold.green(`✓ ${SUCCESS_BANNER}`));
  } else {
    console.log(chalk.bold.red(`✗ ${formatFailureBanner(report.errors.length)}`));
    for (const error of report.errors) {
      console.log(chalk.red(`   • ${error}`));
    }
  }
  console.log(chalk.gray(`   ${formatCounts(report)}`));

  for (const archive of report.archives) {
    console.log(chalk.gray(`   Log rotated to ${archive}`));
  }
  for (const failure of report.rotationFailures) {
    console.log(chalk.yellow(`   ⚠ ${failure}`));
  }
}

/**
 * Describe a mirror result in one line
 */
export function formatMirrorResult(result: MirrorResult): string {
  switch (result.status) {
    case "success":
      return `Mirror completed (exit code ${result.exitCode})`;
    case "success-with-warnings":
      return `Mirror completed with warnings (exit code ${result.exitCode})`;
    case "failure":
      return `Mirror failed: ${result.error ?? `exit code ${result.exitCode}`}`;
  }
}
