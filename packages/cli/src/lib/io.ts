/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { CliError } from "./errors.js";

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Split a url list into urls: one per line, trimmed, blank lines and # comments skipped
 */
export function parseUrlList(content: string): string[] {
  // Strip BOM if present
  const cleaned = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const urls: string[] = [];
  for (const line of cleaned.split(/\r?\n/)) {
    const url = line.trim();
    if (url.length === 0 || url.startsWith("#")) continue;
    urls.push(url);
  }
  return urls;
}

/**
 * Read the url list from a file, or from stdin when the source is "-"
 */
export async function readUrlList(source: string): Promise<string[]> {
  if (source === "-") {
    if (isStdinTTY()) {
      throw new CliError("No input provided on stdin; pipe a url list or pass --source <file>");
    }
    return parseUrlList(await readStdin());
  }

  try {
    return parseUrlList(await fs.readFile(source, "utf8"));
  } catch (err) {
    throw new CliError(`Cannot read url list ${source}`, { cause: err });
  }
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
