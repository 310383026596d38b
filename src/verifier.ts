/**
 * Verification engine
 *
 * Compares the source tree against the destination by content digest,
 * skipping keys the checkpoint already confirmed. Every source key outside
 * the checkpoint gets exactly one outcome; destination-only files are not
 * examined.
 */
import * as fs from "node:fs/promises";

import { addToCheckpoint, loadCheckpoint } from "./checkpoint-store.js";
import { debugVerifier } from "./debug.js";
import { describeError, SourceMissingError } from "./errors.js";
import { DEFAULT_HASH_ALGORITHM, buildHashMap } from "./hash-indexer.js";
import { HashLog, formatOutcomeLine } from "./hash-log.js";
import type { VerificationOutcome, VerificationReport, VerifyOptions } from "./types.js";

/**
 * Fail fast when the source root cannot be listed
 */
export async function assertSourceReadable(sourceRoot: string): Promise<void> {
  try {
    await fs.readdir(sourceRoot);
  } catch (err) {
    throw new SourceMissingError(sourceRoot, err);
  }
}

/**
 * Run one verification pass
 *
 * @throws SourceMissingError before any work when the source is unreadable
 */
export async function verify(options: VerifyOptions): Promise<VerificationReport> {
  const {
    sourceRoot,
    destRoot,
    checkpointPath,
    logPath,
    maxLogSizeBytes,
    algorithm = DEFAULT_HASH_ALGORITHM,
    hashFile,
    onOutcome,
  } = options;

  await assertSourceReadable(sourceRoot);

  const log = new HashLog(logPath, maxLogSizeBytes);
  await log.rotate();

  const checkpoint = await loadCheckpoint(checkpointPath);

  const [source, dest] = await Promise.all([
    buildHashMap(sourceRoot, { algorithm, exclude: checkpoint, hashFile }),
    buildHashMap(destRoot, { algorithm, exclude: checkpoint, hashFile }),
  ]);

  const report: VerificationReport = {
    verified: 0,
    mismatched: 0,
    missing: 0,
    skipped: source.skipped,
    hashFailures: source.failures.length + source.unreadableDirs.length,
    errors: [],
    rotationFailures: [],
    archives: [],
    success: false,
  };

  const destFailures = new Map(dest.failures.map((f) => [f.path, f.error]));

  // Files under a destination directory that could not be listed were never seen
  const destFailureFor = (key: string) =>
    destFailures.get(key) ??
    dest.unreadableDirs.find((d) => d.path === "" || key.startsWith(`${d.path}/`))?.error;

  const record = async (outcome: VerificationOutcome, key: string, error?: string) => {
    await log.appendOutcome(outcome, key);
    if (error !== undefined) report.errors.push(error);
    onOutcome?.(outcome, key);
  };

  // Checkpointed keys were excluded from both indexes, so every key here is new work
  for (const key of [...source.hashes.keys()].sort()) {
    const sourceHash = source.hashes.get(key);
    const destHash = dest.hashes.get(key);
    const destFailure = destFailureFor(key);

    if (destHash === undefined && destFailure === undefined) {
      report.missing++;
      await record("missing", key, formatOutcomeLine("missing", key));
    } else if (destFailure !== undefined) {
      report.mismatched++;
      report.hashFailures++;
      await record(
        "mismatch",
        key,
        `${formatOutcomeLine("mismatch", key)} (destination: ${describeError(destFailure.cause)})`
      );
    } else if (sourceHash !== destHash) {
      report.mismatched++;
      await record("mismatch", key, formatOutcomeLine("mismatch", key));
    } else {
      report.verified++;
      await addToCheckpoint(checkpointPath, key);
      await record("verified", key);
    }
  }

  for (const failure of source.failures) {
    const message = `Hash failure: ${failure.path} (${describeError(failure.error.cause)})`;
    report.errors.push(message);
    await log.append(message);
  }

  for (const failure of source.unreadableDirs) {
    const message = `Unreadable directory: ${failure.path || "."} (${describeError(failure.error.cause)})`;
    report.errors.push(message);
    await log.append(message);
  }

  await log.appendSummary(report.errors);

  report.rotationFailures = log.getRotationFailures().map((e) => e.message);
  report.archives = [...log.getArchives()];
  report.success = report.errors.length === 0;

  debugVerifier(
    "Verified %d, mismatched %d, missing %d, skipped %d, hash failures %d",
    report.verified,
    report.mismatched,
    report.missing,
    report.skipped,
    report.hashFailures
  );
  return report;
}
