/**
 * Tests for CLI command handlers
 * Runs the handlers against real temp directories with the copy tool mocked
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { EventEmitter } from "node:events";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { runMirrorCommand, runStatus, runSync, runVerify, EXIT_CODES } from "../src/commands/index.js";
import { exitCodeFor, toSettingsOverrides } from "../src/commands/helpers.js";
import { getLogDirStatus } from "../src/commands/status.js";
import { SourceMissingError } from "../src/errors.js";
import type { MirrorResult, VerificationReport } from "../src/types.js";

vi.mock("node:child_process", () => ({
  spawn: vi.fn(),
}));

import { spawn } from "node:child_process";

function fakeChild(code: number) {
  const child = new EventEmitter();
  setImmediate(() => child.emit("close", code, null));
  return child as unknown as ReturnType<typeof spawn>;
}

function report(overrides: Partial<VerificationReport> = {}): VerificationReport {
  return {
    verified: 0,
    mismatched: 0,
    missing: 0,
    skipped: 0,
    hashFailures: 0,
    errors: [],
    rotationFailures: [],
    archives: [],
    success: true,
    ...overrides,
  };
}

function mirror(status: MirrorResult["status"]): MirrorResult {
  return { status, exitCode: status === "failure" ? 8 : 1, command: "robocopy", args: [] };
}

describe("Commands", () => {
  describe("exitCodeFor", () => {
    it("should return OK when every phase passed", () => {
      expect(exitCodeFor(mirror("success"), report())).toBe(EXIT_CODES.OK);
      expect(exitCodeFor(mirror("success-with-warnings"), report())).toBe(EXIT_CODES.OK);
      expect(exitCodeFor(null, report())).toBe(EXIT_CODES.OK);
      expect(exitCodeFor(mirror("success"), null)).toBe(EXIT_CODES.OK);
    });

    it("should distinguish mirror failure from verification failure", () => {
      expect(exitCodeFor(mirror("failure"), report())).toBe(EXIT_CODES.MIRROR_FAILED);
      expect(exitCodeFor(mirror("success"), report({ success: false }))).toBe(
        EXIT_CODES.VERIFICATION_FAILED
      );
      expect(exitCodeFor(mirror("failure"), report({ success: false }))).toBe(
        EXIT_CODES.VERIFICATION_FAILED
      );
    });
  });

  describe("toSettingsOverrides", () => {
    it("should map verify flags", () => {
      expect(
        toSettingsOverrides({ logDir: "logs", algorithm: "md5", maxLogSize: 1024, json: false, verbose: false })
      ).toEqual({ algorithm: "md5", maxLogSizeBytes: 1024 });
    });

    it("should map mirror flags", () => {
      expect(
        toSettingsOverrides({
          logDir: "logs",
          json: false,
          verbose: false,
          retries: 1,
          retryWait: 2,
          ipg: 3,
          mirrorCommand: "copytool",
        })
      ).toEqual({
        algorithm: undefined,
        maxLogSizeBytes: undefined,
        retries: 1,
        retryWaitSeconds: 2,
        interPacketGapMs: 3,
        mirrorCommand: "copytool",
      });
    });
  });

  describe("handlers", () => {
    let tempDir: string;
    let sourceRoot: string;
    let destRoot: string;
    let logDir: string;
    let consoleLogSpy: MockInstance<typeof console.log>;

    const jsonOutput = (): Record<string, unknown> => {
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      return JSON.parse(String(consoleLogSpy.mock.calls[0][0])) as Record<string, unknown>;
    };

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "commands-test-"));
      sourceRoot = path.join(tempDir, "source");
      destRoot = path.join(tempDir, "dest");
      logDir = path.join(tempDir, "logs");
      await fs.mkdir(sourceRoot);
      await fs.mkdir(destRoot);
      await fs.writeFile(path.join(sourceRoot, "a.txt"), "hello");
      await fs.writeFile(path.join(destRoot, "a.txt"), "hello");
      consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      vi.mocked(spawn).mockReset();
    });

    afterEach(async () => {
      consoleLogSpy.mockRestore();
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("runVerify should return OK and print the report as JSON", async () => {
      const code = await runVerify(sourceRoot, destRoot, { logDir, json: true, verbose: false });

      expect(code).toBe(EXIT_CODES.OK);
      expect(jsonOutput()).toEqual({
        verification: {
          verified: 1,
          mismatched: 0,
          missing: 0,
          skipped: 0,
          hashFailures: 0,
          errors: [],
          rotationFailures: [],
          archives: [],
          success: true,
        },
      });
    });

    it("runVerify should signal verification failure", async () => {
      await fs.writeFile(path.join(sourceRoot, "b.txt"), "world");

      const code = await runVerify(sourceRoot, destRoot, { logDir, json: true, verbose: false });

      expect(code).toBe(EXIT_CODES.VERIFICATION_FAILED);
      expect(await fs.readFile(path.join(logDir, "hash_checkpoint.txt"), "utf-8")).toBe("a.txt\n");
    });

    it("runVerify should reject when the source is missing", async () => {
      await expect(
        runVerify(path.join(tempDir, "nope"), destRoot, { logDir, json: true, verbose: false })
      ).rejects.toBeInstanceOf(SourceMissingError);
    });

    it("runSync should verify even when the mirror fails", async () => {
      vi.mocked(spawn).mockReturnValue(fakeChild(16));

      const code = await runSync(sourceRoot, destRoot, { logDir, json: true, verbose: false });

      expect(code).toBe(EXIT_CODES.MIRROR_FAILED);
      const output = jsonOutput();
      expect(output.mirror).toMatchObject({ status: "failure", exitCode: 16 });
      expect(output.verification).toMatchObject({ verified: 1, success: true });
    });

    it("runSync should treat a copy tool mismatch code as a mirror failure", async () => {
      vi.mocked(spawn).mockReturnValue(fakeChild(4));

      const code = await runSync(sourceRoot, destRoot, { logDir, json: true, verbose: false });

      expect(code).toBe(EXIT_CODES.MIRROR_FAILED);
      expect(jsonOutput().mirror).toMatchObject({ status: "failure", exitCode: 4 });
    });

    it("runSync should not start the mirror when the source is missing", async () => {
      await expect(
        runSync(path.join(tempDir, "nope"), destRoot, { logDir, json: true, verbose: false })
      ).rejects.toBeInstanceOf(SourceMissingError);
      expect(spawn).not.toHaveBeenCalled();
    });

    it("runMirrorCommand should pass settings through to the copy tool", async () => {
      vi.mocked(spawn).mockReturnValue(fakeChild(0));

      const code = await runMirrorCommand(sourceRoot, destRoot, {
        logDir,
        json: true,
        retries: 2,
        retryWait: 1,
        ipg: 0,
        mirrorCommand: "copytool",
      });

      expect(code).toBe(EXIT_CODES.OK);
      const [command, args] = vi.mocked(spawn).mock.calls[0];
      expect(command).toBe("copytool");
      expect(args).toContain("/R:2");
      expect(args).toContain("/W:1");
      expect(args).toContain(`/LOG+:${path.join(logDir, "mirror_log.txt")}`);
    });

    it("getLogDirStatus should describe checkpoint, log and archives", async () => {
      await fs.mkdir(logDir);
      await fs.writeFile(path.join(logDir, "hash_checkpoint.txt"), "a.txt\nb.txt\na.txt\n");
      await fs.writeFile(path.join(logDir, "hash_verification_log.txt"), "Verified: a.txt\n");
      await fs.writeFile(path.join(logDir, "hash_verification_log-1.txt"), "old");

      const status = await getLogDirStatus(logDir, 1024);

      expect(status).toEqual({
        logDir,
        checkpointPath: path.join(logDir, "hash_checkpoint.txt"),
        checkpointEntries: 2,
        hashLogPath: path.join(logDir, "hash_verification_log.txt"),
        hashLogSize: 16,
        maxLogSizeBytes: 1024,
        archives: [{ path: path.join(logDir, "hash_verification_log-1.txt"), number: 1, size: 3 }],
      });
    });

    it("runStatus should report an empty log directory", async () => {
      const code = await runStatus(logDir, true, 2048);

      expect(code).toBe(EXIT_CODES.OK);
      expect(jsonOutput()).toMatchObject({
        checkpointEntries: 0,
        hashLogSize: null,
        maxLogSizeBytes: 2048,
        archives: [],
      });
    });
  });
});
