/**
 * Tests for hash-log.ts - verification log writer
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import {
  HashLog,
  SUCCESS_BANNER,
  formatFailureBanner,
  formatOutcomeLine,
} from "../src/hash-log.js";
import { archivePathFor } from "../src/log-rotator.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

describe("Hash Log", () => {
  let tempDir: string;
  let logPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "hash-log-test-"));
    logPath = path.join(tempDir, "hash_verification_log.txt");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("formatOutcomeLine", () => {
    it("should format each outcome", () => {
      expect(formatOutcomeLine("verified", "docs/a.txt")).toBe("Verified: docs/a.txt");
      expect(formatOutcomeLine("mismatch", "docs/a.txt")).toBe("Hash mismatch: docs/a.txt");
      expect(formatOutcomeLine("missing", "docs/a.txt")).toBe("Missing in destination: docs/a.txt");
    });
  });

  describe("formatFailureBanner", () => {
    it("should include the error count", () => {
      expect(formatFailureBanner(3)).toBe("Verification failed with 3 error(s):");
    });
  });

  describe("append", () => {
    it("should create the log directory and append lines", async () => {
      const nestedLog = path.join(tempDir, "logs", "nested", "hash.txt");
      const log = new HashLog(nestedLog, 1024);

      await log.appendOutcome("verified", "a.txt");
      await log.appendOutcome("missing", "b.txt");

      expect(await fs.readFile(nestedLog, "utf-8")).toBe(
        "Verified: a.txt\nMissing in destination: b.txt\n"
      );
    });

    it("should rotate after the write that crosses the threshold", async () => {
      // Each line is 16 bytes including the newline
      const log = new HashLog(logPath, 20);

      await log.appendOutcome("verified", "a.txt");
      await log.appendOutcome("verified", "b.txt");
      await log.appendOutcome("verified", "c.txt");

      expect(await fs.readFile(archivePathFor(logPath, 1), "utf-8")).toBe(
        "Verified: a.txt\nVerified: b.txt\n"
      );
      expect(await fs.readFile(logPath, "utf-8")).toBe("Verified: c.txt\n");
      expect(log.getArchives()).toEqual([archivePathFor(logPath, 1)]);
    });

    it("should rotate several times in one run", async () => {
      const log = new HashLog(logPath, 16);

      await log.appendOutcome("verified", "a.txt");
      await log.appendOutcome("verified", "b.txt");

      expect(log.getArchives()).toEqual([archivePathFor(logPath, 1), archivePathFor(logPath, 2)]);
      expect(await fs.readFile(archivePathFor(logPath, 2), "utf-8")).toBe("Verified: b.txt\n");
      await expect(fs.access(logPath)).rejects.toThrow();
    });

    it("should keep writing to the oversize log when rotation fails", async () => {
      vi.mocked(fs.rename).mockRejectedValueOnce(
        Object.assign(new Error("EBUSY: resource busy or locked"), { code: "EBUSY" })
      );
      const log = new HashLog(logPath, 10);

      await log.appendOutcome("verified", "a.txt");
      await log.appendOutcome("verified", "b.txt");

      const failures = log.getRotationFailures();
      expect(failures).toHaveLength(1);
      expect(failures[0].code).toBe("ROTATION_FAILED");
      expect(await fs.readFile(archivePathFor(logPath, 1), "utf-8")).toBe(
        "Verified: a.txt\nVerified: b.txt\n"
      );
    });
  });

  describe("rotate", () => {
    it("should rotate an already oversize log before any write", async () => {
      await fs.writeFile(logPath, "x".repeat(30));
      const log = new HashLog(logPath, 20);

      await log.rotate();
      await log.append(SUCCESS_BANNER);

      expect(await fs.readFile(archivePathFor(logPath, 1), "utf-8")).toBe("x".repeat(30));
      expect(await fs.readFile(logPath, "utf-8")).toBe(`${SUCCESS_BANNER}\n`);
    });
  });

  describe("appendSummary", () => {
    it("should write the success banner when there are no errors", async () => {
      const log = new HashLog(logPath, 1024);

      await log.appendSummary([]);

      expect(await fs.readFile(logPath, "utf-8")).toBe("All files verified successfully.\n");
    });

    it("should write the failure banner followed by each error", async () => {
      const log = new HashLog(logPath, 1024);

      await log.appendSummary(["Hash mismatch: a.txt", "Missing in destination: b.txt"]);

      expect(await fs.readFile(logPath, "utf-8")).toBe(
        "Verification failed with 2 error(s):\nHash mismatch: a.txt\nMissing in destination: b.txt\n"
      );
    });
  });
});
