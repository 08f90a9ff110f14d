#!/usr/bin/env node

/**
 * flowgraph CLI
 *
 * Commands:
 *   flowgraph run-flow <path>   Load a YAML flow, run it, print a summary
 *
 * Example:
 *   flowgraph run-flow flows/catalog_check.yml --concurrency 2
 *
 * Logs are JSON lines on stderr (FLOWGRAPH_LOG_LEVEL); the summary goes to
 * stdout.
 */

import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { runFlowCommand } from "./run-flow.js";

function parseConcurrency(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be an integer >= 1.");
  }
  return n;
}

const program = new Command();

program
  .name("flowgraph")
  .description("Durable DAG runner for step flows")
  .version("0.1.0");

program
  .command("run-flow <path>")
  .description("Load and execute a YAML flow definition")
  .option("--json", "Print the run history as JSON")
  .option(
    "-c, --concurrency <n>",
    "Max steps in flight (default: FLOWGRAPH_CONCURRENCY or 1)",
    parseConcurrency,
  )
  .action(
    async (path: string, options: { json?: boolean; concurrency?: number }) => {
      try {
        process.exitCode = await runFlowCommand(path, options);
      } catch (error) {
        console.error(
          chalk.red("Error:"),
          error instanceof Error ? error.message : String(error),
        );
        process.exitCode = 1;
      }
    },
  );

await program.parseAsync(process.argv);
