import { existsSync } from "node:fs";
import { basename, join } from "node:path";
import _ from "lodash";
import type { Config } from "./config";
import { CONSOLIDATED_HEADERS, CONSOLIDATION_FILES, DOCKET_COLUMNS } from "./constants";
import { InputError, errorMessage } from "./errors";
import type { Logger } from "./logger";
import { readCsv, saveCsv, writeFileDurable, type CsvRow, type CsvTable } from "./save";
import type { DocketRecord, ExcludedDocketRecord, NameQuery } from "./types";

export type RawDocketTable = {
  sourceFile: string;
  rows: CsvRow[];
};

export type Consolidation = {
  records: DocketRecord[];
  excluded: ExcludedDocketRecord[];
  /** Rows dropped because a grouping field was blank. */
  skipped: number;
};

const KEY_FIELDS = ["date", "time", "name", "location", "hearingType"] as const;

const REQUIRED_COLUMNS = Object.values(DOCKET_COLUMNS);

function toRecord(row: CsvRow, sourceFile: string): DocketRecord {
  return {
    date: (row[DOCKET_COLUMNS.date] ?? "").trim(),
    time: (row[DOCKET_COLUMNS.time] ?? "").trim(),
    name: (row[DOCKET_COLUMNS.name] ?? "").replace(/\s+/g, " ").trim(),
    caseNumber: (row[DOCKET_COLUMNS.caseNumber] ?? "").trim(),
    hearingType: (row[DOCKET_COLUMNS.hearingType] ?? "").trim(),
    location: (row[DOCKET_COLUMNS.location] ?? "").trim(),
    sourceFile,
  };
}

/**
 * Drops excluded hearing types, then collapses rows that describe the same
 * hearing (date, time, name, location, hearing type) into one, joining their
 * case numbers in input order.
 */
export function consolidateDockets(tables: RawDocketTable[], excludedHearingTypes: string[]): Consolidation {
  const excludedTypes = new Set(excludedHearingTypes);
  const excluded: ExcludedDocketRecord[] = [];
  const groups = new Map<string, { record: DocketRecord; caseNumbers: string[]; sources: string[] }>();
  let skipped = 0;

  for (const table of tables) {
    for (const row of table.rows) {
      const rec = toRecord(row, table.sourceFile);

      if (excludedTypes.has(rec.hearingType)) {
        excluded.push({ name: rec.name, caseNumber: rec.caseNumber, hearingType: rec.hearingType, sourceFile: rec.sourceFile });
        continue;
      }
      if (KEY_FIELDS.some((f) => rec[f] === "")) {
        skipped++;
        continue;
      }

      const key = KEY_FIELDS.map((f) => rec[f]).join("\u0000");
      let group = groups.get(key);
      if (!group) {
        group = { record: rec, caseNumbers: [], sources: [] };
        groups.set(key, group);
      }
      if (rec.caseNumber) group.caseNumbers.push(rec.caseNumber);
      if (!group.sources.includes(rec.sourceFile)) group.sources.push(rec.sourceFile);
    }
  }

  const merged = Array.from(groups.values()).map(({ record, caseNumbers, sources }) => ({
    ...record,
    caseNumber: caseNumbers.join(", "),
    sourceFile: sources.join(", "),
  }));

  return { records: _.sortBy(merged, [...KEY_FIELDS]), excluded, skipped };
}

export function toConsolidatedRow(r: DocketRecord | NameQuery): CsvRow {
  return {
    [DOCKET_COLUMNS.date]: r.date,
    [DOCKET_COLUMNS.time]: r.time,
    [DOCKET_COLUMNS.name]: r.name,
    [DOCKET_COLUMNS.caseNumber]: r.caseNumber,
    [DOCKET_COLUMNS.hearingType]: r.hearingType,
    [DOCKET_COLUMNS.location]: r.location,
  };
}

export function formatExclusionLog(excluded: ExcludedDocketRecord[]): string {
  const lines = ["Excluded Names and Reasons:", "=".repeat(50)];
  for (const e of excluded) {
    lines.push(`Name: ${e.name}, Case Number: ${e.caseNumber}, Hearing Type: ${e.hearingType} (Excluded)`);
  }
  return lines.join("\n") + "\n";
}

/** Reads a docket table, failing on anything that would leave the consolidated output incomplete. */
export async function loadDocketTable(path: string): Promise<RawDocketTable> {
  const file = basename(path);
  if (!existsSync(path)) {
    throw new InputError(`Required file '${file}' not found (${path})`);
  }

  let table: CsvTable;
  try {
    table = await readCsv(path);
  } catch (e) {
    throw new InputError(`Failed to read '${file}': ${errorMessage(e)}`);
  }

  const missing = REQUIRED_COLUMNS.filter((c) => !table.headers.includes(c));
  if (missing.length) {
    throw new InputError(`File '${file}' is missing required columns: ${missing.join(", ")}`);
  }
  return { sourceFile: file, rows: table.rows };
}

export async function loadNameQueries(path: string): Promise<NameQuery[]> {
  const { rows } = await loadDocketTable(path);
  return rows.map((row) => {
    const { date, time, name, caseNumber, hearingType, location } = toRecord(row, basename(path));
    return { date, time, name, caseNumber, hearingType, location };
  });
}

export type ConsolidationRun = Consolidation & {
  outputFile: string;
  exclusionLogFile: string;
};

export async function runConsolidation(config: Config, logger: Logger): Promise<ConsolidationRun> {
  const tables: RawDocketTable[] = [];
  for (const file of config.docketFiles) {
    const table = await loadDocketTable(join(config.docketFolder, file));
    logger.info(`Read ${table.rows.length} rows from ${table.sourceFile}`);
    tables.push(table);
  }

  const result = consolidateDockets(tables, config.excludedHearingTypes);
  if (result.skipped) {
    logger.warn(`Skipped ${result.skipped} rows with a blank date, time, name, location or hearing type`);
  }

  const outputFile = config.inputFile;
  await saveCsv(outputFile, CONSOLIDATED_HEADERS, result.records.map(toConsolidatedRow));
  logger.success(`Merged and cleaned data saved to: ${outputFile} (${result.records.length} hearings)`);

  const exclusionLogFile = join(config.docketFolder, CONSOLIDATION_FILES.exclusionLog);
  await writeFileDurable(exclusionLogFile, formatExclusionLog(result.excluded));
  if (result.excluded.length) {
    logger.info(`Excluded ${result.excluded.length} rows by hearing type, see ${exclusionLogFile}`);
  } else {
    logger.success("No exclusions detected.");
  }

  return { ...result, outputFile, exclusionLogFile };
}
