/**
 * Command tree for the castra CLI
 */

import { Command, CommanderError } from "commander";
import { createInterface } from "node:readline/promises";
import { logger } from "@castra/core";
import { createPartitionsCommand } from "./commands/partitions.js";
import { parseColumns, parseNonNegativeInt } from "./lib/arg.js";
import { commandContext, type GlobalOptions } from "./lib/context.js";
import { CliError, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { isStdinTTY, processIO, type CliIO } from "./lib/io.js";
import { colorize, displayKey, frameRows, printJson } from "./lib/render.js";
import { withCliStore } from "./lib/store.js";
import { withTiming } from "./lib/telemetry.js";

export interface ProgramOptions {
  io?: CliIO;
  version?: string;
}

interface QueryOptions {
  start?: string;
  stop?: string;
  columns?: string[];
  limit?: number;
  raw?: boolean;
}

interface InfoOptions {
  raw?: boolean;
}

interface DropOptions {
  force?: boolean;
}

/**
 * Build the command tree; commander errors are thrown rather than exiting
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? processIO;
  const program = new Command();

  // Configure error output with color
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("castra")
    .description("Castra - append-only, partitioned, columnar store for ordered data")
    .version(options.version ?? "0.0.0")
    .option("--root <path>", "Store directory (default: CASTRA_ROOT or the current directory)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      logger.setEnabled(program.opts<GlobalOptions>().quiet !== true);
    });

  // Info command
  program
    .command("info")
    .description("Show schema, dictionaries and key range of a store")
    .option("--raw", "Output compact JSON")
    .action(async (cmdOpts: InfoOptions) => {
      const ctx = commandContext(program, io);
      await withTiming("cli.info", ctx, async () => {
        await withCliStore(ctx.root, async (store) => {
          const last = store.partitions.last();
          const categories: Record<string, number> = {};
          for (const [column, values] of Object.entries(store.categories)) {
            categories[column] = values.length;
          }

          printJson(
            io,
            {
              path: store.path,
              columns: store.columns,
              dtypes: store.dtypes,
              indexDType: store.indexDType,
              partitions: store.partitions.size,
              minimum: displayKey(store.indexDType, store.minimum),
              maximum: displayKey(store.indexDType, last?.maxKey),
              categories,
            },
            { raw: cmdOpts.raw }
          );
        });
      });
    });

  // Query command
  program
    .command("query")
    .description("Print rows with start <= key <= stop as JSON")
    .option("--start <key>", "Inclusive lower bound")
    .option("--stop <key>", "Inclusive upper bound")
    .option("--columns <list>", "Comma-separated columns to read", parseColumns)
    .option("--limit <n>", "Maximum rows to print", (value: string) => parseNonNegativeInt(value, "--limit"))
    .option("--raw", "Output compact JSON")
    .action(async (cmdOpts: QueryOptions) => {
      const ctx = commandContext(program, io);
      await withTiming("cli.query", ctx, async () => {
        await withCliStore(ctx.root, async (store) => {
          let frame = await store.query({
            start: cmdOpts.start,
            stop: cmdOpts.stop,
            columns: cmdOpts.columns,
          });
          if (cmdOpts.limit !== undefined) {
            frame = frame.slice(0, cmdOpts.limit);
          }
          printJson(io, frameRows(frame), { raw: cmdOpts.raw });
        });
      });
    });

  // Drop command
  program
    .command("drop")
    .description("Delete the store directory")
    .option("--force", "Drop without confirmation")
    .action(async (cmdOpts: DropOptions) => {
      const ctx = commandContext(program, io);
      await withTiming("cli.drop", ctx, async () => {
        if (!cmdOpts.force) {
          if (!isStdinTTY()) {
            throw new CliError("Use --force to confirm dropping in non-interactive mode");
          }
          const rl = createInterface({ input: process.stdin, output: process.stderr });
          const answer = (await rl.question(`Drop store at ${ctx.root}? (y/N) `)).trim().toLowerCase();
          rl.close();
          if (answer !== "y") {
            throw new CliError("Aborted by user", { exitCode: 1 });
          }
        }

        await withCliStore(ctx.root, async (store) => {
          await store.drop();
        });

        if (!ctx.quiet) {
          io.stdout(`Dropped ${ctx.root}\n`);
        }
      });
    });

  program.addCommand(createPartitionsCommand(program, io));

  return program;
}

/**
 * Parse and run `argv` (including the node and script entries), returning the exit code
 */
export async function run(argv: string[], options: ProgramOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const program = createProgram({ ...options, io });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already printed usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    const opts = program.opts<GlobalOptions>();
    io.stderr(`Error: ${formatCliError(err, opts.verbose === true)}\n`);
    return mapErrorToExitCode(err);
  }
}
