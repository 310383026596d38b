/**
 * Command definitions: yargs options and dispatch to src/commands/
 */
import yargs, { type Argv } from "yargs";

import { parseSize } from "./config.js";
import {
  runMirrorCommand,
  runStatus,
  runSync,
  runVerify,
} from "./commands/index.js";

function parseSizeOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const bytes = parseSize(value);
  if (bytes === null) {
    throw new Error(`Invalid size: ${value} (use bytes or a KB/MB/GB suffix)`);
  }
  return bytes;
}

function withTreeArgs<T>(yargs: Argv<T>) {
  return yargs
    .positional("source", {
      describe: "Source directory",
      type: "string",
      demandOption: true,
    })
    .positional("destination", {
      describe: "Destination directory",
      type: "string",
      demandOption: true,
    });
}

function withLogDirOptions<T>(yargs: Argv<T>) {
  return yargs
    .option("log-dir", {
      alias: "l",
      type: "string",
      demandOption: true,
      describe: "Directory for the hash log, checkpoint and mirror log",
    })
    .option("json", {
      type: "boolean",
      default: false,
      describe: "Output as JSON for scripting",
    });
}

function withVerifyOptions<T>(yargs: Argv<T>) {
  return yargs
    .option("algorithm", {
      alias: "a",
      type: "string",
      describe: "Hash algorithm (default: sha256)",
    })
    .option("max-log-size", {
      type: "string",
      describe: "Rotate the hash log at this size (e.g. 50MB)",
      coerce: parseSizeOption,
    })
    .option("verbose", {
      alias: "v",
      type: "boolean",
      default: false,
      describe: "Print every verification outcome",
    });
}

function withMirrorOptions<T>(yargs: Argv<T>) {
  return yargs
    .option("retries", {
      type: "number",
      describe: "Retries per failed copy (default: 5)",
    })
    .option("retry-wait", {
      type: "number",
      describe: "Seconds between retries (default: 5)",
    })
    .option("ipg", {
      type: "number",
      describe: "Inter-packet gap in milliseconds (default: 0)",
    })
    .option("mirror-command", {
      type: "string",
      describe: "Copy tool executable (default: robocopy)",
    });
}

/**
 * Build the command parser for an argument list
 */
export function createCli(args: string[]) {
  return yargs(args)
    .scriptName("mirror-verify")
    .usage("$0 <command> [options]")
    .command(
      "sync <source> <destination>",
      "Mirror the source tree, then verify the copy",
      (yargs) => withMirrorOptions(withVerifyOptions(withLogDirOptions(withTreeArgs(yargs)))),
      async (argv) => {
        process.exitCode = await runSync(argv.source, argv.destination, {
          logDir: argv.logDir,
          algorithm: argv.algorithm,
          maxLogSize: argv.maxLogSize,
          json: argv.json,
          verbose: argv.verbose,
          retries: argv.retries,
          retryWait: argv.retryWait,
          ipg: argv.ipg,
          mirrorCommand: argv.mirrorCommand,
        });
      }
    )
    .command(
      "mirror <source> <destination>",
      "Mirror the source tree without verifying",
      (yargs) => withMirrorOptions(withLogDirOptions(withTreeArgs(yargs))),
      async (argv) => {
        process.exitCode = await runMirrorCommand(argv.source, argv.destination, {
          logDir: argv.logDir,
          json: argv.json,
          retries: argv.retries,
          retryWait: argv.retryWait,
          ipg: argv.ipg,
          mirrorCommand: argv.mirrorCommand,
        });
      }
    )
    .command(
      "verify <source> <destination>",
      "Verify the destination against the source by content hash",
      (yargs) => withVerifyOptions(withLogDirOptions(withTreeArgs(yargs))),
      async (argv) => {
        process.exitCode = await runVerify(argv.source, argv.destination, {
          logDir: argv.logDir,
          algorithm: argv.algorithm,
          maxLogSize: argv.maxLogSize,
          json: argv.json,
          verbose: argv.verbose,
        });
      }
    )
    .command(
      "status",
      "Show checkpoint and hash log state",
      (yargs) =>
        withLogDirOptions(yargs).option("max-log-size", {
          type: "string",
          describe: "Rotation threshold to compare against (e.g. 50MB)",
          coerce: parseSizeOption,
        }),
      async (argv) => {
        process.exitCode = await runStatus(argv.logDir, argv.json, argv.maxLogSize);
      }
    )
    .demandCommand(1, "You need at least one command")
    .strict()
    .help();
}
