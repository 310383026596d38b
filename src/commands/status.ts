/**
 * Status command - Show checkpoint and log state for a log directory
 */

import chalk from "chalk";

import { loadCheckpoint } from "../checkpoint-store.js";
import { formatBytes, loadSettings, resolvePaths } from "../config.js";
import { getFileSize } from "../file-utils.js";
import { listArchives, type LogArchive } from "../log-rotator.js";
import { EXIT_CODES, type ExitCode } from "./helpers.js";

export interface LogDirStatus {
  logDir: string;
  checkpointPath: string;
  checkpointEntries: number;
  hashLogPath: string;
  /** null when no active log exists */
  hashLogSize: number | null;
  maxLogSizeBytes: number;
  archives: LogArchive[];
}

/**
 * Collect the state of a log directory
 */
export async function getLogDirStatus(logDir: string, maxLogSizeBytes: number): Promise<LogDirStatus> {
  const paths = resolvePaths(logDir);
  const checkpoint = await loadCheckpoint(paths.checkpointPath);

  return {
    logDir: paths.logDir,
    checkpointPath: paths.checkpointPath,
    checkpointEntries: checkpoint.size,
    hashLogPath: paths.hashLogPath,
    hashLogSize: await getFileSize(paths.hashLogPath),
    maxLogSizeBytes,
    archives: await listArchives(paths.hashLogPath),
  };
}

/**
 * Run the status command
 */
export async function runStatus(
  logDir: string,
  json: boolean,
  maxLogSize?: number
): Promise<ExitCode> {
  const settings = loadSettings({ maxLogSizeBytes: maxLogSize });
  const status = await getLogDirStatus(logDir, settings.maxLogSizeBytes);

  if (json) {
    console.log(JSON.stringify(status, null, 2));
    return EXIT_CODES.OK;
  }

  console.log(chalk.bold(`📁 Log directory: ${chalk.cyan(status.logDir)}`));
  console.log(chalk.white(`   Checkpoint: ${status.checkpointEntries} confirmed file(s)`));

  if (status.hashLogSize === null) {
    console.log(chalk.gray("   Hash log: not created yet"));
  } else {
    console.log(
      chalk.white(
        `   Hash log: ${formatBytes(status.hashLogSize)} of ${formatBytes(status.maxLogSizeBytes)}`
      )
    );
  }

  if (status.archives.length > 0) {
    console.log(chalk.white(`   Archives (${status.archives.length}):`));
    for (const archive of status.archives) {
      console.log(chalk.gray(`     ${archive.path} (${formatBytes(archive.size)})`));
    }
  }

  return EXIT_CODES.OK;
}
