#!/usr/bin/env -S npx tsx
import chalk from "chalk";

import { buildCli } from "./cli/commands";
import { CorruptStoreError, describeError } from "./errors";

const program = buildCli();

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(describeError(error)));
  if (error instanceof CorruptStoreError) {
    console.error(
      chalk.dim(`${error.partial.length} records were readable before line ${error.line}.`)
    );
  }
  process.exitCode = 1;
});
