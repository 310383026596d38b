#!/usr/bin/env node
/**
 * mirror-verify CLI
 * Mirror a directory tree, then verify the copy by content hash
 */
import chalk from "chalk";
import { hideBin } from "yargs/helpers";

import { createCli } from "./cli.js";
import { EXIT_CODES } from "./commands/index.js";

// Run CLI
createCli(hideBin(process.argv)).parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`✗ ${message}`));
  process.exit(EXIT_CODES.FATAL);
});
