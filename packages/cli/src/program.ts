/**
 * topicsearch command-line program
 *
 * Commands are built per call so tests can run them in-process with their own
 * fetch and environment.
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  indexDocuments,
  logger,
  openIndexReader,
  openIndexStore,
  searchIndex,
  type IndexingReport,
} from "@topicsearch/sdk";
import { parseNonNegativeInt, parsePort, parsePositiveInt } from "./lib/arg.js";
import { resolvePredictorConfig } from "./lib/config.js";
import { isVerbose, resolveIndexDir, setVerbose } from "./lib/env.js";
import { CliError, EXIT_OK, EXIT_PARTIAL, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { readUrlList } from "./lib/io.js";
import { predictEntries, type FetchFn } from "./lib/predict.js";
import { colorize, formatHit, printJson, printLines } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

const PackageJsonSchema = z.object({ version: z.string() });

// Read package.json for version
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
);

export interface ProgramDeps {
  /** Transport for prediction calls (default: global fetch) */
  fetchFn?: FetchFn;
  /** Environment consulted for defaults (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

type GlobalOptions = {
  indexdir?: string;
  verbose?: boolean;
  quiet?: boolean;
};

type IndexCommandOptions = {
  source: string;
  flush?: boolean;
  key?: string;
  host?: string;
  port?: number;
  ssl?: boolean;
  topics?: number;
  commitEvery?: number;
  json?: boolean;
};

type QueryCommandOptions = {
  limit?: number;
  json?: boolean;
};

type StatsCommandOptions = {
  json?: boolean;
};

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("topicsearch")
    .description("Index urls by their predicted topics and search them by topic")
    .version(packageJson.version)
    .option("-d, --indexdir <path>", "Index directory")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      const opts = program.opts<GlobalOptions>();
      setVerbose(Boolean(opts.verbose));
      logger.setLevel(opts.verbose ? "info" : opts.quiet ? "error" : "warn");
    });

  // Index command
  program
    .command("index")
    .description("Predict topics for every url of a list and index them")
    .requiredOption("-s, --source <file>", "List of urls to index, one per line (- for stdin)")
    .option("-f, --flush", "Empty the index before indexing")
    .option("-K, --key <key>", "Prediction API key")
    .option("-H, --host <host>", "Prediction API host")
    .option("-P, --port <port>", "Prediction API port", (val) => parsePort(val, "--port"))
    .option("-S, --ssl", "Use https for prediction calls")
    .option("--topics <n>", "Topics requested per url", (val) => parsePositiveInt(val, "--topics"))
    .option("--commit-every <n>", "Commit after every N indexed urls", (val) =>
      parsePositiveInt(val, "--commit-every")
    )
    .option("--json", "Print the indexing report as JSON")
    .action(async (options: IndexCommandOptions) => {
      await withTiming("cli.index", async () => {
        const opts = program.opts<GlobalOptions>();

        // Validate everything before the index is touched: a flush is not undoable
        const config = resolvePredictorConfig(
          {
            key: options.key,
            host: options.host,
            port: options.port,
            ssl: options.ssl,
            topics: options.topics,
          },
          env
        );
        const urls = await readUrlList(options.source);
        const chatty = !opts.quiet && !options.json;

        const store = await openIndexStore(resolveIndexDir(opts.indexdir, env), {
          mode: options.flush ? "flush" : "openOrCreate",
        });

        let report: IndexingReport;
        try {
          const entries = predictEntries(urls, config, {
            fetchFn: deps.fetchFn,
            onStart: (url) => {
              if (chatty) console.log(`indexing ${url}`);
            },
          });
          report = await indexDocuments(store, entries, {
            commitEvery: options.commitEvery,
            onOutcome: (outcome) => {
              if (outcome.status === "failed" && !options.json) {
                console.log(`Prediction Failed: ${outcome.error ?? "unknown error"}`);
              }
            },
          });
        } finally {
          await store.close();
        }

        if (options.json) {
          printJson(report);
        } else if (!opts.quiet) {
          console.log(`Indexed ${report.indexed} document(s), ${report.failed} failed`);
        }

        if (report.failed > 0) {
          throw new CliError(`${report.failed} url(s) could not be indexed`, { exitCode: EXIT_PARTIAL });
        }
      });
    });

  // Query command
  program
    .command("query <text>")
    .description("Search topics; prints one 'title ( url )' line per match, best first")
    .option("--limit <n>", "Maximum number of results", (val) => parseNonNegativeInt(val, "--limit"))
    .option("--json", "Output hits as JSON")
    .action(async (text: string, options: QueryCommandOptions) => {
      await withTiming("cli.query", async () => {
        const opts = program.opts<GlobalOptions>();

        const hits = await searchIndex(resolveIndexDir(opts.indexdir, env), text, {
          maxResults: options.limit,
        });

        if (options.json) {
          printJson(hits);
        } else {
          printLines(hits.map(formatHit));
        }
      });
    });

  // Stats command
  program
    .command("stats")
    .description("Show document and term counts of the committed index")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: StatsCommandOptions) => {
      await withTiming("cli.stats", async () => {
        const opts = program.opts<GlobalOptions>();
        const reader = await openIndexReader(resolveIndexDir(opts.indexdir, env));

        try {
          const stats = reader.stats();
          if (options.json) {
            printJson({ path: reader.path, committedAt: reader.committedAt, ...stats }, { raw: true });
          } else {
            printLines([
              `Index: ${reader.path}`,
              `Documents: ${stats.documents}`,
              `Terms: ${stats.terms}`,
              `Postings: ${stats.postings}`,
              `Generation: ${stats.generation}`,
              `Committed: ${reader.committedAt}`,
            ]);
          }
        } finally {
          reader.close();
        }
      });
    });

  return program;
}

/**
 * Parse and run a command line
 * @param argv - Full argv, including the node and script entries
 * @returns Process exit code
 */
export async function run(argv: readonly string[], deps: ProgramDeps = {}): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync([...argv]);
    return EXIT_OK;
  } catch (err) {
    // Usage errors, --help and --version: commander has already written its output
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    const message = formatCliError(err, Boolean(opts.verbose) || isVerbose());
    console.error(`Error: ${message}`);

    return mapSdkErrorToExitCode(err);
  }
}
