import { existsSync } from "node:fs";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import Papa from "papaparse";

export type CsvRow = Record<string, string>;

export type CsvTable = {
  headers: string[];
  rows: CsvRow[];
};

export function parseCsv(text: string): CsvTable {
  const parsed = Papa.parse<CsvRow>(text.replace(/^\uFEFF/, ""), {
    header: true,
    delimiter: ",",
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
  });
  const fatal = parsed.errors.find((e) => e.type === "Quotes");
  if (fatal) throw new Error(`${fatal.message} (row ${fatal.row ?? "?"})`);

  const headers = parsed.meta.fields ?? [];
  // short rows come back without the trailing keys
  const rows = parsed.data.map((r) => Object.fromEntries(headers.map((h) => [h, r[h] ?? ""])));
  return { headers, rows };
}

export async function readCsv(path: string): Promise<CsvTable> {
  return parseCsv(await readFile(path, "utf-8"));
}

export function toCsv(headers: string[], rows: CsvRow[]): string {
  // unparse already ends a header-only table with a newline
  const text = Papa.unparse({ fields: headers, data: rows.map((r) => headers.map((h) => r[h] ?? "")) }, { newline: "\n" });
  return text.replace(/\n*$/, "\n");
}

/** Replaces `path` with `data` only once the bytes are flushed to disk. */
export async function writeFileDurable(path: string, data: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  const handle = await open(tmp, "w");
  try {
    await handle.writeFile(data, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  await rename(tmp, path);
}

export async function appendLineDurable(path: string, line: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const handle = await open(path, "a");
  try {
    await handle.appendFile(`${line}\n`, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
}

export async function readLines(path: string): Promise<string[]> {
  if (!existsSync(path)) return [];
  const text = await readFile(path, "utf-8");
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

export async function saveCsv(path: string, headers: string[], rows: CsvRow[]): Promise<string> {
  await writeFileDurable(path, toCsv(headers, rows));
  return path;
}

export async function removeFile(path: string): Promise<boolean> {
  if (!existsSync(path)) return false;
  await rm(path, { force: true });
  return true;
}
