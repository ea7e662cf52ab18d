import type { SearchResultClassifier } from "./classify";
import { errorMessage } from "./errors";
import { ledgerKey, type ProcessedLedger } from "./ledger";
import type { Logger } from "./logger";
import type { ResultOutputs } from "./outputs";
import { nameQuery, type SearchClient } from "./search";
import type { NameQuery } from "./types";
import { sleep } from "./utils";

export type PipelineDeps = {
  search: SearchClient;
  classifier: SearchResultClassifier;
  outputs: ResultOutputs;
  ledger: ProcessedLedger;
  logger: Logger;
  /** Pause before every query but the first. */
  searchDelayMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
};

export type PipelineSummary = {
  total: number;
  pending: number;
  /** Already in the ledger, blank, or repeated in the input. */
  skipped: number;
  withResults: number;
  noResults: number;
  failed: number;
  validHits: number;
  excludedHits: number;
  cancelled: boolean;
};

export type QueryOutcome =
  | { state: "recorded"; valid: number; excluded: number }
  | { state: "recorded-no-results" }
  | { state: "failed"; error: string };

/** First occurrence of each non-blank name that the ledger does not hold yet. */
export function pendingQueries(queries: NameQuery[], ledger: ProcessedLedger, logger: Logger): NameQuery[] {
  const seen = new Set<string>();
  const pending: NameQuery[] = [];
  for (const q of queries) {
    if (!q.name.trim()) {
      logger.warn(`Empty name found in data: ${[q.date, q.time, q.caseNumber].join(", ")}`);
      continue;
    }
    const key = ledgerKey(q.name);
    if (ledger.has(key) || seen.has(key)) continue;
    seen.add(key);
    pending.push(q);
  }
  return pending;
}

/** Searches one name and records it; the ledger entry is written last. */
export async function processQuery(query: NameQuery, deps: PipelineDeps): Promise<QueryOutcome> {
  const { search, classifier, outputs, ledger, logger } = deps;
  try {
    logger.info(`Searching for: ${query.name} (Case number: ${query.caseNumber})`);
    const response = await search.search(nameQuery(query.name));

    if (!response || response.items.length === 0) {
      logger.info(`Recording no results for ${query.name}`);
      await outputs.appendNoResult(query.name);
      await ledger.add(query.name);
      return { state: "recorded-no-results" };
    }

    const { valid, excluded } = await classifier.classify(response, query.caseNumber);
    if (valid.length) {
      const added = await outputs.appendValid(query, valid);
      logger.info(`Saved ${added} new results for ${query.name}`);
    }
    if (excluded.length) {
      const added = await outputs.appendExcluded(query, excluded);
      logger.info(`Saved ${added} new excluded results for ${query.name}`);
    }
    await ledger.add(query.name);
    return { state: "recorded", valid: valid.length, excluded: excluded.length };
  } catch (e) {
    const error = errorMessage(e);
    logger.error(`Error processing ${query.name}: ${error}`);
    return { state: "failed", error };
  }
}

export async function runPipeline(queries: NameQuery[], deps: PipelineDeps, signal?: AbortSignal): Promise<PipelineSummary> {
  const { logger, searchDelayMs } = deps;
  const wait = deps.sleep ?? sleep;

  const pending = pendingQueries(queries, deps.ledger, logger);
  const summary: PipelineSummary = {
    total: queries.length,
    pending: pending.length,
    skipped: queries.length - pending.length,
    withResults: 0,
    noResults: 0,
    failed: 0,
    validHits: 0,
    excludedHits: 0,
    cancelled: false,
  };
  logger.info(`Processing ${pending.length} remaining names out of ${queries.length} total`);

  for (const [i, query] of pending.entries()) {
    if (i > 0 && searchDelayMs > 0) await wait(searchDelayMs, signal);
    if (signal?.aborted) {
      summary.cancelled = true;
      break;
    }

    logger.progress(`[${i + 1}/${pending.length}] ${query.name}`);
    const outcome = await processQuery(query, deps);
    switch (outcome.state) {
      case "recorded":
        summary.withResults++;
        summary.validHits += outcome.valid;
        summary.excludedHits += outcome.excluded;
        break;
      case "recorded-no-results":
        summary.noResults++;
        break;
      case "failed":
        summary.failed++;
        break;
    }
  }
  // an interrupt during the last name still counts
  if (signal?.aborted) summary.cancelled = true;

  if (summary.cancelled) {
    logger.warn("Process interrupted by user! Already recorded names stay processed; rerun to resume.");
  } else {
    logger.success(`Completed all searches! ${summary.withResults} with results, ${summary.noResults} without, ${summary.failed} failed.`);
  }
  return summary;
}
