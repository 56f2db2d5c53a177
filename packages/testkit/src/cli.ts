/**
 * CLI testing utilities
 */

import { dirname } from "node:path";
import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (undefined if the process was killed by a signal) */
  exitCode: number | undefined;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory (default: the entry point's directory) */
  cwd?: string;
  /** Environment variables, merged over the current ones */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 15000) */
  timeout?: number;
}

/**
 * Run a TypeScript CLI entry point under node with the tsx loader
 * Never rejects on a non-zero exit; the exit code is in the result.
 * @param cliPath - Absolute path to the entry point source
 * @param args - Command arguments
 * @param options - Execution options
 */
export async function runCli(cliPath: string, args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd = dirname(cliPath), env, input, timeout = 15000 } = options;

  // tsx is resolved from cwd, so cwd must sit inside the workspace
  const result = await execa("node", ["--import", "tsx", cliPath, ...args], {
    cwd,
    env: { ...process.env, TOPICSEARCH_DEBUG: "", TOPICSEARCH_CLI_DEBUG: "", ...env },
    input,
    reject: false,
    timeout,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
