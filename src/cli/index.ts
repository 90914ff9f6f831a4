#!/usr/bin/env node

/**
 * derived-props CLI
 * Inspects dependency manifests: evaluation order, depth levels and cycles
 */

import { Command } from "commander";
import chalk from "chalk";
import { checkCommand, levelsCommand, orderCommand, type CommandOutcome } from "./commands/index.js";
import { createLogger } from "../utils/logger.js";
import { wrapError } from "../core/errors.js";

const logger = createLogger("cli");

/**
 * Print a command outcome and record its exit code
 */
function report(outcome: CommandOutcome): void {
  if (outcome.exitCode === 0) {
    for (const line of outcome.lines) {
      console.log(line);
    }
  } else {
    for (const line of outcome.lines) {
      console.error(chalk.red(line));
    }
  }
  process.exitCode = outcome.exitCode;
}

// Create the main program
const program = new Command();

program
  .name("derived-props")
  .description("Inspect property dependency manifests")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("order")
  .description("Print the evaluation order, one property per line")
  .argument("<manifest>", "JSON manifest of properties and their requirements")
  .option("--json", "Print the order as a JSON array")
  .action((manifest: string, options: { json?: boolean }) => {
    report(orderCommand(manifest, options));
  });

program
  .command("levels")
  .description("Print properties grouped by dependency depth")
  .argument("<manifest>", "JSON manifest of properties and their requirements")
  .action((manifest: string) => {
    report(levelsCommand(manifest));
  });

program
  .command("check")
  .description("Validate a manifest and report dependency cycles")
  .argument("<manifest>", "JSON manifest of properties and their requirements")
  .action((manifest: string) => {
    report(checkCommand(manifest));
  });

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const wrapped = wrapError(error);
  logger.error({ err: wrapped }, "CLI error occurred");
  console.error(chalk.red(`\nError: ${wrapped.toString()}`));
  if (process.env.DEBUG && wrapped.stack) {
    console.error(chalk.dim(wrapped.stack));
  }
  process.exitCode = 1;
}

program.parseAsync(process.argv).catch(handleError);
