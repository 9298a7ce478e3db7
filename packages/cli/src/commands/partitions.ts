/**
 * Partition inspection commands for CLI
 */

import { Command } from "commander";
import { parseColumns, parseNonNegativeInt } from "../lib/arg.js";
import { commandContext } from "../lib/context.js";
import type { CliIO } from "../lib/io.js";
import { displayKey, frameRows, printJson, printLines } from "../lib/render.js";
import { withCliStore } from "../lib/store.js";
import { withTiming } from "../lib/telemetry.js";

interface ListOptions {
  json?: boolean;
}

interface ShowOptions {
  columns?: string[];
  limit?: number;
  raw?: boolean;
  codes?: boolean;
}

/**
 * Create partitions command group
 */
export function createPartitionsCommand(program: Command, io: CliIO): Command {
  const partitions = new Command("partitions").description("Inspect stored partitions").addHelpText(
    "after",
    `
Examples:
  $ castra partitions list
  $ castra partitions list --json
  $ castra partitions divisions
  $ castra partitions show 0--9 --columns price,volume`
  );

  partitions
    .command("list")
    .description("List partitions in key order")
    .option("--json", "Print names with their min and max keys as JSON")
    .action(async (options: ListOptions) => {
      const ctx = commandContext(program, io);
      await withTiming("cli.partitions.list", ctx, async () => {
        await withCliStore(ctx.root, async (store) => {
          const entries = store.partitions.entries();
          if (options.json) {
            printJson(
              io,
              entries.map((entry) => ({
                name: entry.name,
                minKey: displayKey(store.indexDType, entry.minKey),
                maxKey: displayKey(store.indexDType, entry.maxKey),
              }))
            );
            return;
          }
          printLines(
            io,
            entries.map((entry) => entry.name)
          );
        });
      });
    });

  partitions
    .command("divisions")
    .description("Print partition boundaries: the minimum key followed by each max key")
    .action(async () => {
      const ctx = commandContext(program, io);
      await withTiming("cli.partitions.divisions", ctx, async () => {
        await withCliStore(ctx.root, async (store) => {
          printJson(
            io,
            store.divisions().map((key) => displayKey(store.indexDType, key)),
            { raw: true }
          );
        });
      });
    });

  partitions
    .command("show <name>")
    .description("Print the rows of one partition")
    .option("--columns <list>", "Comma-separated columns to read", parseColumns)
    .option("--limit <n>", "Maximum rows to print", (value: string) => parseNonNegativeInt(value, "--limit"))
    .option("--codes", "Print dictionary codes instead of values for categorical columns")
    .option("--raw", "Output compact JSON")
    .action(async (name: string, options: ShowOptions) => {
      const ctx = commandContext(program, io);
      await withTiming("cli.partitions.show", ctx, async () => {
        await withCliStore(ctx.root, async (store) => {
          let frame = await store.loadPartition(name, options.columns ?? store.columns, {
            categorize: options.codes !== true,
          });
          if (options.limit !== undefined) {
            frame = frame.slice(0, options.limit);
          }
          printJson(io, frameRows(frame), { raw: options.raw });
        });
      });
    });

  return partitions;
}
