/**
 * Basic Usage Example
 *
 * Appends two days of hourly readings and reads a window back.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { Frame, withCastra } from "@castra/core";
import { rm } from "node:fs/promises";

const HOUR = 3_600_000;
const START = Date.UTC(2024, 0, 1);
const SENSORS = ["north", "south", "east"];

/**
 * Readings for hours [from, to) after START
 */
function readings(from: number, to: number): Frame {
  const hours = Array.from({ length: to - from }, (_, i) => from + i);
  return Frame.from({
    index: { dtype: "datetime", values: BigInt64Array.from(hours, (h) => BigInt(START + h * HOUR)) },
    columns: {
      sensor: hours.map((h) => SENSORS[h % SENSORS.length]),
      celsius: Float64Array.from(hours, (h) => 10 + 5 * Math.sin((h / 24) * 2 * Math.PI)),
    },
  });
}

async function main() {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  // Create the store; the template fixes columns and dtypes
  await withCastra({ path: dataDir, template: readings(0, 0), categories: ["sensor"] }, async (store) => {
    await store.extend(readings(0, 24));
    await store.extend(readings(24, 48));
    console.log("Partitions:", store.partitions.names());
  });

  // Reopen from disk and query across the day boundary
  await withCastra({ path: dataDir }, async (store) => {
    console.log("Dictionary:", store.categories.sensor);

    const frame = await store.query({
      start: "2024-01-01T22:00:00Z",
      stop: "2024-01-02T02:00:00Z",
    });
    for (const row of frame.toRows("time")) {
      const time = typeof row.time === "bigint" ? new Date(Number(row.time)).toISOString() : row.time;
      console.log(time, row.sensor, row.celsius);
    }

    await store.drop();
  });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
