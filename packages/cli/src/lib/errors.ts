/**
 * CLI error handling and exit code mapping
 */

import {
  IndexUnavailableError,
  InvalidArgumentError,
  InvalidDocumentError,
  StoreClosedError,
  StoreLockedError,
  StoreUnavailableError,
} from "@topicsearch/sdk";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_INDEX_UNAVAILABLE = 2;
export const EXIT_STORE = 3;
export const EXIT_PARTIAL = 4;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_USAGE;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/unknown error
 * - 2: index missing or corrupt
 * - 3: index locked, unwritable or closed
 * - 4: indexing finished but some urls failed
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof IndexUnavailableError) {
    return EXIT_INDEX_UNAVAILABLE;
  }

  if (
    error instanceof StoreLockedError ||
    error instanceof StoreUnavailableError ||
    error instanceof StoreClosedError
  ) {
    return EXIT_STORE;
  }

  if (error instanceof InvalidArgumentError || error instanceof InvalidDocumentError) {
    return EXIT_USAGE;
  }

  // Default to exit code 1 for unknown errors
  return EXIT_USAGE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
