import { existsSync } from "node:fs";
import { join } from "node:path";
import _ from "lodash";
import { describeVerdict } from "./classify";
import { toConsolidatedRow } from "./consolidate";
import { EXCLUDED_RESULT_HEADERS, OUTPUT_FILES, RESULT_HEADERS } from "./constants";
import { appendLineDurable, readCsv, removeFile, saveCsv, type CsvRow } from "./save";
import type { ExcludedHit, NameQuery, SearchHit } from "./types";

export type OutputPaths = {
  results: string;
  excluded: string;
  noResults: string;
  processed: string;
  log: string;
};

export function outputPaths(resultsFolder: string): OutputPaths {
  return {
    results: join(resultsFolder, OUTPUT_FILES.results),
    excluded: join(resultsFolder, OUTPUT_FILES.excluded),
    noResults: join(resultsFolder, OUTPUT_FILES.noResults),
    processed: join(resultsFolder, OUTPUT_FILES.processed),
    log: join(resultsFolder, OUTPUT_FILES.log),
  };
}

/** Where the driver records each query. Every write is on disk when the promise resolves. */
export interface ResultOutputs {
  appendValid(query: NameQuery, hits: SearchHit[]): Promise<number>;
  appendExcluded(query: NameQuery, hits: ExcludedHit[]): Promise<number>;
  appendNoResult(name: string): Promise<void>;
}

export function toResultRow(query: NameQuery, hit: SearchHit): CsvRow {
  return {
    ...toConsolidatedRow(query),
    Title: hit.title,
    Link: hit.link,
    Year: hit.resolvedYear === null ? "" : String(hit.resolvedYear),
    Snippet: hit.snippet,
    Author: hit.resolvedAuthor,
  };
}

export function toExcludedRow(query: NameQuery, hit: ExcludedHit): CsvRow {
  return { ...toResultRow(query, hit), "Exclusion Reason": describeVerdict(hit.verdict) };
}

/** Earlier rows win when Name and Link repeat. */
export function mergeRows(existing: CsvRow[], incoming: CsvRow[]): CsvRow[] {
  return _.uniqBy([...existing, ...incoming], (r) => `${r.Name}\u0000${r.Link}`);
}

export class CsvResultOutputs implements ResultOutputs {
  constructor(readonly paths: OutputPaths) {}

  appendValid(query: NameQuery, hits: SearchHit[]): Promise<number> {
    return this.merge(this.paths.results, RESULT_HEADERS, hits.map((h) => toResultRow(query, h)));
  }

  appendExcluded(query: NameQuery, hits: ExcludedHit[]): Promise<number> {
    return this.merge(this.paths.excluded, EXCLUDED_RESULT_HEADERS, hits.map((h) => toExcludedRow(query, h)));
  }

  async appendNoResult(name: string): Promise<void> {
    await appendLineDurable(this.paths.noResults, name);
  }

  /** Deletes every output of a previous run, the run log included. */
  async clear(): Promise<string[]> {
    const removed: string[] = [];
    for (const path of Object.values(this.paths)) {
      if (await removeFile(path)) removed.push(path);
    }
    return removed;
  }

  /** Returns how many of `rows` were new. */
  private async merge(path: string, headers: string[], rows: CsvRow[]): Promise<number> {
    if (rows.length === 0) return 0;
    const existing = existsSync(path) ? (await readCsv(path)).rows : [];
    const combined = mergeRows(existing, rows);
    await saveCsv(path, headers, combined);
    return combined.length - existing.length;
  }
}
