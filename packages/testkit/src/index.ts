export { createTempDir, removeDir, withTempDir, withTempIndex, seedIndex } from "./fs.js";
export type { SeedDocument } from "./fs.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
