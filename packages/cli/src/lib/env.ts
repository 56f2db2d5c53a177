/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Where the index lives when neither --indexdir nor TOPICSEARCH_INDEX_DIR is given
 */
export const DEFAULT_INDEX_DIR = "/tmp/topicsearch_index";

let verboseFlag = false;

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the index directory
 * Priority: CLI option > TOPICSEARCH_INDEX_DIR env var > /tmp/topicsearch_index
 */
export function resolveIndexDir(cliDir?: string, env: NodeJS.ProcessEnv = process.env): string {
  const dir = cliDir ?? (env.TOPICSEARCH_INDEX_DIR || DEFAULT_INDEX_DIR);
  return path.resolve(expandTilde(dir));
}

/**
 * Turn on verbose diagnostics for the rest of the process (--verbose)
 */
export function setVerbose(enabled: boolean): void {
  verboseFlag = enabled;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return verboseFlag || process.env.TOPICSEARCH_CLI_DEBUG === "1";
}
