#!/usr/bin/env -S npx tsx
import process from "node:process";
import chalk from "chalk";

import { buildCli } from "./cli/commands";

const program = buildCli();

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
