#!/usr/bin/env node
import * as dotenv from "dotenv";
dotenv.config();

import { join, resolve } from "node:path";
import { createClassifier } from "./classify";
import { loadConfig, requireSearchCredentials, type Config } from "./config";
import { loadNameQueries, runConsolidation } from "./consolidate";
import { CONSOLIDATION_FILES } from "./constants";
import { FatalError, errorMessage } from "./errors";
import { createExclusionFilters } from "./features/exclusion-filters";
import { createRetryPolicy } from "./features/retry-policy";
import { createHttp } from "./http";
import { FileLedger } from "./ledger";
import { createLogger } from "./logger";
import { CsvResultOutputs, outputPaths } from "./outputs";
import { createAuthorResolver } from "./parse";
import { runPipeline } from "./pipeline";
import { createSearchClient, googleTransport } from "./search";
import type { NameQuery } from "./types";

const USAGE = `Usage:
  court-news consolidate [--config <path>]
  court-news match [--config <path>] [--fresh]`;

const EXIT_INTERRUPTED = 130;

function argValue(flag: string): string | undefined {
  const idx = process.argv.findIndex((a) => a === flag);
  return idx >= 0 ? process.argv[idx + 1] : undefined;
}

async function consolidate(config: Config): Promise<number> {
  const logger = createLogger({ logFile: join(config.docketFolder, CONSOLIDATION_FILES.log) });
  logger.progress(`\nMerging ${config.docketFiles.length} docket files from ${config.docketFolder} ...`);
  try {
    await runConsolidation(config, logger);
    return 0;
  } catch (e) {
    if (!(e instanceof FatalError)) throw e;
    logger.error(`CRITICAL ERROR: ${e.message}. Terminating.`);
    return 1;
  }
}

async function match(config: Config, fresh: boolean): Promise<number> {
  const paths = outputPaths(config.resultsFolder);
  const outputs = new CsvResultOutputs(paths);
  const logger = createLogger({ logFile: paths.log });

  try {
    requireSearchCredentials(config, logger);
  } catch (e) {
    if (!(e instanceof FatalError)) throw e;
    return 1;
  }

  if (fresh) {
    const removed = await outputs.clear();
    console.log(`Cleared ${removed.length} files from the previous run.`);
  }

  logger.info("Script started");
  logger.info(
    `URL filtering enabled with ${config.excludedUrlPatterns.length} patterns: ${config.excludedUrlPatterns.join(", ")}`
  );
  logger.info(`Year matching filter ${config.yearMatching ? "enabled" : "disabled"}`);

  let queries: NameQuery[];
  try {
    queries = await loadNameQueries(config.inputFile);
  } catch (e) {
    if (!(e instanceof FatalError)) throw e;
    logger.error(`Error reading input CSV: ${e.message}`);
    return 1;
  }
  logger.info(`Read ${queries.length} names from input file`);

  const ledger = await FileLedger.open(paths.processed);
  if (ledger.size) logger.info(`Loaded ${ledger.size} previously processed names`);

  const http = createHttp(config);
  const classifier = createClassifier({
    authors: createAuthorResolver(http, logger),
    filters: createExclusionFilters(config),
    logger,
    concurrency: config.authorConcurrency,
  });
  const search = createSearchClient(googleTransport(config), logger, createRetryPolicy(config.searchRetries));

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\nInterrupt received, finishing the current name ...");
    controller.abort();
  });

  const summary = await runPipeline(
    queries,
    { search, classifier, outputs, ledger, logger, searchDelayMs: config.searchDelayMs },
    controller.signal
  );

  console.log(`\nDone ✅
Results : ${paths.results}
Excluded: ${paths.excluded}
Log     : ${paths.log}\n`);
  return summary.cancelled ? EXIT_INTERRUPTED : 0;
}

async function main(): Promise<number> {
  const command = process.argv[2];
  const configPath = resolve(argValue("--config") ?? process.env.COURT_NEWS_CONFIG ?? "config.json");

  switch (command) {
    case "consolidate":
      return consolidate(loadConfig(configPath));
    case "match":
      return match(loadConfig(configPath), process.argv.includes("--fresh"));
    default:
      console.error(USAGE);
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    const prefix = e instanceof FatalError ? `${e.name}:` : "Error:";
    console.error(prefix, errorMessage(e));
    process.exitCode = 1;
  });
