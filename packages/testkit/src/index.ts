export { createTempStoreRoot, removeDir, withTempStore } from "./fs.js";
export { rangeFrame, labelFor } from "./frames.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CapturedIO, CliResult, CliRunner } from "./cli.js";
