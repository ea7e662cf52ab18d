import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileLedger, MemoryLedger } from "../ledger";
import { CsvResultOutputs, mergeRows, outputPaths } from "../outputs";
import { readCsv } from "../save";
import type { ExcludedHit, NameQuery, SearchHit } from "../types";

const query: NameQuery = {
  date: "03/10/2025",
  time: "9:00 AM",
  name: "DOE, JOHN",
  caseNumber: "23-CR-1045",
  hearingType: "Plea Hearing",
  location: "Room 1",
};

const hit: SearchHit = {
  title: "Local man pleads",
  link: "https://news.example/2023/03/plea",
  snippet: "A man pleaded...",
  resolvedYear: 2023,
  resolvedAuthor: "Jane Reporter",
};

describe("mergeRows", () => {
  it("keeps the first row for a repeated name and link", () => {
    const merged = mergeRows(
      [{ Name: "A", Link: "l1", Title: "old" }],
      [
        { Name: "A", Link: "l1", Title: "new" },
        { Name: "B", Link: "l1", Title: "other name" },
      ]
    );

    expect(merged.map((r) => r.Title)).toEqual(["old", "other name"]);
  });
});

describe("csv result outputs", () => {
  let dir: string;
  let outputs: CsvResultOutputs;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "court-news-out-"));
    outputs = new CsvResultOutputs(outputPaths(dir));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes valid hits with the docket columns first", async () => {
    expect(await outputs.appendValid(query, [hit])).toBe(1);

    const text = await readFile(join(dir, "search_results.csv"), "utf-8");
    expect(text).toBe(
      "Date,Time,Name,Case Number,Hearing Type,Location,Title,Link,Year,Snippet,Author\n" +
        '03/10/2025,9:00 AM,"DOE, JOHN",23-CR-1045,Plea Hearing,Room 1,Local man pleads,https://news.example/2023/03/plea,2023,A man pleaded...,Jane Reporter\n'
    );
  });

  it("does not duplicate a hit recorded twice", async () => {
    await outputs.appendValid(query, [hit]);
    expect(await outputs.appendValid(query, [{ ...hit, title: "Retitled" }])).toBe(0);

    const { rows } = await readCsv(join(dir, "search_results.csv"));
    expect(rows.map((r) => r.Title)).toEqual(["Local man pleads"]);
  });

  it("writes the exclusion reason and a blank year", async () => {
    const excluded: ExcludedHit = { ...hit, resolvedYear: null, verdict: { kind: "excluded-author", author: "Gray News" } };
    await outputs.appendExcluded(query, [excluded]);

    const { headers, rows } = await readCsv(join(dir, "excluded_results.csv"));
    expect(headers.at(-1)).toBe("Exclusion Reason");
    expect(rows[0].Year).toBe("");
    expect(rows[0]["Exclusion Reason"]).toBe("Excluded author: Gray News");
  });

  it("skips the write for an empty hit list", async () => {
    expect(await outputs.appendValid(query, [])).toBe(0);
    expect(existsSync(join(dir, "search_results.csv"))).toBe(false);
  });

  it("appends names to the no-results list", async () => {
    await outputs.appendNoResult("ROE, RICK");
    await outputs.appendNoResult("POE, PAT");

    expect(await readFile(join(dir, "no_results.txt"), "utf-8")).toBe("ROE, RICK\nPOE, PAT\n");
  });

  it("clears every output file", async () => {
    await outputs.appendNoResult("ROE, RICK");
    await writeFile(join(dir, "processed_names.txt"), "ROE, RICK\n");

    const removed = await outputs.clear();

    expect(removed).toEqual([join(dir, "no_results.txt"), join(dir, "processed_names.txt")]);
    expect(existsSync(join(dir, "no_results.txt"))).toBe(false);
  });
});

describe("ledgers", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "court-news-ledger-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("persists names once and reloads them", async () => {
    const path = join(dir, "processed_names.txt");
    const ledger = await FileLedger.open(path);
    expect(ledger.size).toBe(0);

    await ledger.add("DOE, JOHN");
    await ledger.add("DOE, JOHN");
    await ledger.add("ROE, RICK");

    expect(await readFile(path, "utf-8")).toBe("DOE, JOHN\nROE, RICK\n");
    const reopened = await FileLedger.open(path);
    expect(reopened.has("DOE, JOHN")).toBe(true);
    expect(reopened.has("POE, PAT")).toBe(false);
    expect(reopened.size).toBe(2);
  });

  it("keeps a name with a line break on one line", async () => {
    const path = join(dir, "processed_names.txt");
    const ledger = await FileLedger.open(path);
    await ledger.add("DOE,\nJOHN");

    expect(await readFile(path, "utf-8")).toBe("DOE, JOHN\n");
    const reopened = await FileLedger.open(path);
    expect(reopened.has("DOE,\nJOHN")).toBe(true);
    expect(reopened.size).toBe(1);
  });

  it("keeps an in-memory ledger with the same contract", async () => {
    const ledger = new MemoryLedger(["DOE, JOHN"]);
    await ledger.add("ROE, RICK");
    await ledger.add("DOE, JOHN");

    expect(ledger.list()).toEqual(["DOE, JOHN", "ROE, RICK"]);
  });
});
