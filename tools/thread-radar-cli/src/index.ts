#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";

import { bootstrapEnvFromDotenv } from "./env";
import { toCliError } from "./errors";
import { printCommandResult } from "./output";

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`invalid positive integer: ${value}`);
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`invalid non-negative integer: ${value}`);
  }
  return parsed;
}

function addRunOptions(command: Command): Command {
  return command
    .option("--state <path>", "state file (overrides STATE_PATH)")
    .option("--output-dir <dir>", "snapshot directory (overrides OUTPUT_DIR)")
    .option("--max-items <n>", "per-run item cap (overrides MAX_ITEMS_PER_RUN)", parsePositiveInt)
    .option("--backfill-hours <h>", "backfill horizon (overrides BACKFILL_HOURS)", parseNonNegativeInt)
    .option("--sources <file>", "sources YAML (overrides SOURCES_CONFIG)")
    .option("--rules <file>", "rules YAML (overrides RULES_CONFIG)")
    .option("--json", "JSON output");
}

// Commands load lazily so the logger sees LOG_LEVEL from .env.
async function run() {
  bootstrapEnvFromDotenv();

  const program = new Command();
  program
    .name("thread-radar")
    .description("Batch digest of new forum threads: dedupe, classify, score, rank, email")
    .version("0.1.0");

  addRunOptions(
    program
      .command("run")
      .description("Ingest sources, send the report and commit state")
      .action(async (options) => {
        const { executeRunCommand } = await import("./commands/run");
        printCommandResult(await executeRunCommand(options), Boolean(options.json));
      }),
  );

  addRunOptions(
    program
      .command("preview")
      .description("Build and print the report without sending it or touching state")
      .action(async (options) => {
        const { executePreviewCommand } = await import("./commands/run");
        printCommandResult(await executePreviewCommand(options), Boolean(options.json));
      }),
  );

  const state = program.command("state").description("Inspect or reset run state");
  state
    .command("show")
    .description("Print seen-identity count and last run time")
    .option("--state <path>", "state file (overrides STATE_PATH)")
    .option("--json", "JSON output")
    .action(async (options) => {
      const { executeStateShowCommand } = await import("./commands/state");
      printCommandResult(await executeStateShowCommand(options), Boolean(options.json));
    });
  state
    .command("reset")
    .description("Forget every reported item (requires --force)")
    .option("--state <path>", "state file (overrides STATE_PATH)")
    .option("--force", "confirm the reset")
    .option("--json", "JSON output")
    .action(async (options) => {
      const { executeStateResetCommand } = await import("./commands/state");
      printCommandResult(await executeStateResetCommand(options), Boolean(options.json));
    });

  await program.parseAsync(process.argv);
}

function printError(error: unknown): void {
  const cliError = toCliError(error);
  if (process.argv.includes("--json")) {
    process.stderr.write(`${JSON.stringify(cliError.toJSON(), null, 2)}\n`);
  } else {
    const detail = [
      cliError.phase && `Phase: ${cliError.phase}`,
      cliError.hint && `Hint: ${cliError.hint}`,
    ].filter(Boolean);
    process.stderr.write([`Error: ${cliError.message}`, ...detail, ""].join("\n"));
  }
  process.exit(cliError.code);
}

run().catch(printError);
