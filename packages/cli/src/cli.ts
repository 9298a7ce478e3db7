#!/usr/bin/env node

/**
 * Castra CLI entry point
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { run } from "./program.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Version from the package.json beside the compiled output
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    packageJson !== null &&
    typeof packageJson === "object" &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

async function main(): Promise<void> {
  process.exitCode = await run(process.argv, { version: readVersion() });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
