/**
 * Topic prediction client
 *
 * POST http(s)://host[:port]/predict with the url to classify; the reply carries
 * the extracted page title and a ranked list of topics, each with its labels.
 */

import { z } from "zod";
import type { IndexEntry } from "@topicsearch/sdk";
import type { PredictorConfig } from "./config.js";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface Prediction {
  title?: string;
  topics: string[];
}

/**
 * Thrown when a url could not be classified; the message is the reason alone
 */
export class PredictFailedError extends Error {
  readonly code = "E_PREDICT_FAILED";

  constructor(
    public readonly url: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(reason, options);
    this.name = "PredictFailedError";
  }
}

const LabelSchema = z.object({ label: z.string() });

const PredictResponseSchema = z.object({
  status: z.object({ code: z.number() }),
  body: z
    .object({
      extracted_title: z.string().nullish(),
      topics: z.array(z.object({ labels: z.array(LabelSchema).min(1) })),
    })
    .optional(),
});

export type PredictResponse = z.infer<typeof PredictResponseSchema>;

/**
 * Endpoint url for a configuration
 */
export function predictEndpoint(config: Pick<PredictorConfig, "host" | "port" | "ssl">): string {
  const scheme = config.ssl ? "https" : "http";
  const port = config.port === undefined ? "" : `:${config.port}`;
  return `${scheme}://${config.host}${port}/predict`;
}

/**
 * Request body asking for labelled topics and the extracted title, without the page content
 */
export function predictRequestBody(uri: string, topicsLimit: number) {
  return {
    parameters: {
      labels: true,
      topics_limit: topicsLimit,
      qualifiers: true,
      filters_in: ["content_extraction"],
      filters_out: ["content", "title"],
    },
    document: { uri },
  };
}

/**
 * Ask the prediction service for the topics of one url
 * @throws PredictFailedError on transport errors, HTTP errors, malformed replies or a non-200 status
 */
export async function predictTopics(
  url: string,
  config: PredictorConfig,
  fetchFn: FetchFn = fetch
): Promise<Prediction> {
  let response: Response;
  try {
    response = await fetchFn(predictEndpoint(config), {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "XPLR-Api-Key": config.apiKey,
      },
      body: JSON.stringify(predictRequestBody(url, config.topicsLimit)),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PredictFailedError(url, reason, { cause: err });
  }

  if (!response.ok) {
    // Release the connection; the body is never read
    await response.body?.cancel();
    throw new PredictFailedError(url, `HTTP ${response.status} ${response.statusText}`.trim());
  }

  let raw: unknown;
  try {
    raw = await response.json();
  } catch (err) {
    throw new PredictFailedError(url, "Wrong Encoding", { cause: err });
  }

  const parsed = PredictResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
    throw new PredictFailedError(url, `Unexpected reply (${where})`, { cause: parsed.error });
  }

  const { status, body } = parsed.data;
  if (status.code !== 200) {
    throw new PredictFailedError(url, String(status.code));
  }
  if (!body) {
    throw new PredictFailedError(url, "Unexpected reply (body: Required)");
  }

  const topics = body.topics.flatMap((topic) => topic.labels.slice(0, 1).map((l) => l.label));
  const title = body.extracted_title ?? undefined;
  return title === undefined ? { topics } : { title, topics };
}

/**
 * Predict urls one after another, yielding entries for the indexer
 * A failed prediction becomes an error entry; the sequence goes on.
 */
export async function* predictEntries(
  urls: Iterable<string>,
  config: PredictorConfig,
  options: { fetchFn?: FetchFn; onStart?: (url: string) => void } = {}
): AsyncGenerator<IndexEntry> {
  for (const url of urls) {
    options.onStart?.(url);
    try {
      const prediction = await predictTopics(url, config, options.fetchFn);
      yield { url, ...prediction };
    } catch (err) {
      if (!(err instanceof PredictFailedError)) {
        throw err;
      }
      yield { url, error: err };
    }
  }
}
