/**
 * Prediction API configuration: command-line options over environment variables
 */

import { z } from "zod";
import { CliError } from "./errors.js";

export const DEFAULT_TOPICS_LIMIT = 5;
export const DEFAULT_TIMEOUT_MS = 30_000;

export const PredictorConfigSchema = z.object({
  apiKey: z
    .string({ required_error: "API key required (--key or TOPICSEARCH_API_KEY)" })
    .min(1, "API key required (--key or TOPICSEARCH_API_KEY)"),
  host: z
    .string({ required_error: "API host required (--host or TOPICSEARCH_API_HOST)" })
    .min(1, "API host required (--host or TOPICSEARCH_API_HOST)")
    .refine((h) => !/[/\s]/.test(h), "API host must be a bare host name, without scheme or path"),
  port: z.number().int().min(1).max(65535).optional(),
  ssl: z.boolean().default(false),
  topicsLimit: z.number().int().positive().default(DEFAULT_TOPICS_LIMIT),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type PredictorConfig = z.infer<typeof PredictorConfigSchema>;

export interface PredictorOptions {
  key?: string;
  host?: string;
  port?: number;
  ssl?: boolean;
  topics?: number;
  timeoutMs?: number;
}

/**
 * Build the prediction client configuration
 * @throws CliError (exit code 1) naming the first missing or invalid setting
 */
export function resolvePredictorConfig(
  options: PredictorOptions,
  env: NodeJS.ProcessEnv = process.env
): PredictorConfig {
  const parsed = PredictorConfigSchema.safeParse({
    apiKey: options.key ?? env.TOPICSEARCH_API_KEY,
    host: options.host ?? env.TOPICSEARCH_API_HOST,
    port: options.port,
    ssl: options.ssl,
    topicsLimit: options.topics,
    timeoutMs: options.timeoutMs,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliError(issue?.message ?? "Invalid prediction API settings", { cause: parsed.error });
  }
  return parsed.data;
}
