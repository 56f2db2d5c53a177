/**
 * Telemetry and observability helpers
 */

import { metrics } from "@topicsearch/sdk";
import type { Operation } from "@topicsearch/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

const SDK_OPERATIONS: readonly Operation[] = ["open", "upsert", "commit", "search"];

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Emit one line per SDK operation that ran during this command
 */
export function emitSdkMetrics(): void {
  for (const op of SDK_OPERATIONS) {
    const m = metrics.getMetrics(op);
    if (!m) continue;
    emitMetric(`sdk.${op}`, {
      count: m.count,
      errors: m.errorCount,
      p95_ms: metrics.getP95Duration(op).toFixed(2),
    });
  }
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitSdkMetrics();
    emitMetric(label, {
      duration_ms: duration,
      success,
    });
  }
}
