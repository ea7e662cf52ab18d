import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createClassifier, type SearchResultClassifier } from "../classify";
import { createExclusionFilters } from "../features/exclusion-filters";
import { FileLedger, MemoryLedger } from "../ledger";
import { silentLogger } from "../logger";
import { CsvResultOutputs, outputPaths, type ResultOutputs } from "../outputs";
import type { AuthorResolver } from "../parse";
import { runPipeline, type PipelineDeps } from "../pipeline";
import type { SearchClient } from "../search";
import type { ExcludedHit, NameQuery, SearchHit, SearchResponse } from "../types";

function nameQuery(name: string, caseNumber = "23-CR-1045"): NameQuery {
  return { date: "03/10/2025", time: "9:00 AM", name, caseNumber, hearingType: "Plea Hearing", location: "Room 1" };
}

class RecordingOutputs implements ResultOutputs {
  valid: Array<[string, string]> = [];
  excluded: Array<[string, string]> = [];
  noResults: string[] = [];

  async appendValid(query: NameQuery, hits: SearchHit[]) {
    this.valid.push(...hits.map((h): [string, string] => [query.name, h.link]));
    return hits.length;
  }

  async appendExcluded(query: NameQuery, hits: ExcludedHit[]) {
    this.excluded.push(...hits.map((h): [string, string] => [query.name, h.link]));
    return hits.length;
  }

  async appendNoResult(name: string) {
    this.noResults.push(name);
  }
}

function searchReturning(responses: Record<string, SearchResponse | null>): SearchClient {
  return { search: vi.fn(async (q: string) => (q in responses ? responses[q] : { items: [] })) };
}

const authors: AuthorResolver = {
  resolveAuthor: async (url) => (url.includes("wire") ? "Associated Press" : "Jane Reporter"),
};

const classifier = createClassifier({
  authors,
  filters: createExclusionFilters({ excludedAuthors: ["associated press"], excludedUrlPatterns: ["sports/"], yearMatching: true }),
  logger: silentLogger,
});

function deps(overrides: Partial<PipelineDeps>): PipelineDeps {
  return {
    search: searchReturning({}),
    classifier,
    outputs: new RecordingOutputs(),
    ledger: new MemoryLedger(),
    logger: silentLogger,
    searchDelayMs: 0,
    ...overrides,
  };
}

describe("runPipeline", () => {
  it("records an empty hit list as no results and marks the name", async () => {
    const outputs = new RecordingOutputs();
    const ledger = new MemoryLedger();

    const summary = await runPipeline([nameQuery("ROE, RICK")], deps({ outputs, ledger }));

    expect(outputs.noResults).toEqual(["ROE, RICK"]);
    expect(outputs.valid).toEqual([]);
    expect(outputs.excluded).toEqual([]);
    expect(ledger.list()).toEqual(["ROE, RICK"]);
    expect(summary).toMatchObject({ pending: 1, noResults: 1, withResults: 0 });
  });

  it("records a failed search as no results", async () => {
    const outputs = new RecordingOutputs();
    const ledger = new MemoryLedger();

    await runPipeline([nameQuery("ROE, RICK")], deps({ search: searchReturning({ '"ROE, RICK"': null }), outputs, ledger }));

    expect(outputs.noResults).toEqual(["ROE, RICK"]);
    expect(ledger.has("ROE, RICK")).toBe(true);
  });

  it("puts an excluded author only in the excluded table", async () => {
    const outputs = new RecordingOutputs();
    const search = searchReturning({
      '"DOE, JOHN"': {
        items: [
          { title: "Wire brief", link: "https://wire.example/2023/01/brief" },
          { title: "Local story", link: "https://news.example/2023/01/story" },
        ],
      },
    });

    const summary = await runPipeline([nameQuery("DOE, JOHN")], deps({ search, outputs }));

    expect(outputs.excluded).toEqual([["DOE, JOHN", "https://wire.example/2023/01/brief"]]);
    expect(outputs.valid).toEqual([["DOE, JOHN", "https://news.example/2023/01/story"]]);
    expect(outputs.noResults).toEqual([]);
    expect(summary).toMatchObject({ withResults: 1, validHits: 1, excludedHits: 1 });
  });

  it("skips names in the ledger, blank names and repeats", async () => {
    const search = searchReturning({});
    const ledger = new MemoryLedger(["DOE, JOHN"]);

    const summary = await runPipeline(
      [nameQuery("DOE, JOHN"), nameQuery(""), nameQuery("ROE, RICK"), nameQuery("ROE, RICK", "24-CR-9")],
      deps({ search, ledger })
    );

    expect(search.search).toHaveBeenCalledTimes(1);
    expect(search.search).toHaveBeenCalledWith('"ROE, RICK"');
    expect(summary).toMatchObject({ total: 4, pending: 1, skipped: 3 });
  });

  it("waits between queries but not before the first", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => true);

    await runPipeline([nameQuery("A"), nameQuery("B"), nameQuery("C")], deps({ searchDelayMs: 3000, sleep }));

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([3000, 3000]);
  });

  it("leaves a failing name unmarked and carries on", async () => {
    const ledger = new MemoryLedger();
    const failing: SearchResultClassifier = {
      classify: async () => {
        throw new Error("disk full");
      },
    };
    const search = searchReturning({ '"A"': { items: [{ title: "t", link: "https://news.example/a" }] } });

    const summary = await runPipeline([nameQuery("A"), nameQuery("B")], deps({ search, classifier: failing, ledger }));

    expect(summary).toMatchObject({ failed: 1, noResults: 1 });
    expect(ledger.list()).toEqual(["B"]);
  });

  it("finishes the in-flight name and stops when cancelled", async () => {
    const controller = new AbortController();
    const ledger = new MemoryLedger();
    const search: SearchClient = {
      search: vi.fn(async () => {
        controller.abort();
        return { items: [] };
      }),
    };

    const summary = await runPipeline([nameQuery("A"), nameQuery("B")], deps({ search, ledger, searchDelayMs: 3000 }), controller.signal);

    expect(summary.cancelled).toBe(true);
    expect(search.search).toHaveBeenCalledTimes(1);
    expect(ledger.list()).toEqual(["A"]);
  });

  it("reports an interrupt during the last name as cancelled", async () => {
    const controller = new AbortController();
    const ledger = new MemoryLedger();
    const search: SearchClient = {
      search: vi.fn(async () => {
        controller.abort();
        return { items: [] };
      }),
    };

    const summary = await runPipeline([nameQuery("A")], deps({ search, ledger }), controller.signal);

    expect(summary.cancelled).toBe(true);
    expect(ledger.list()).toEqual(["A"]);
  });
});

describe("rerunning against files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "court-news-rerun-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function snapshotDir() {
    const files = (await readdir(dir)).sort();
    return Promise.all(files.map(async (f) => [f, await readFile(join(dir, f), "utf-8")]));
  }

  it("makes no searches and changes no files once every name is processed", async () => {
    const paths = outputPaths(dir);
    const queries = [nameQuery("DOE, JOHN"), nameQuery("ROE, RICK")];
    const search = searchReturning({
      '"DOE, JOHN"': { items: [{ title: "Local story", link: "https://news.example/2023/01/story" }] },
    });

    await runPipeline(queries, deps({ search, outputs: new CsvResultOutputs(paths), ledger: await FileLedger.open(paths.processed) }));
    const before = await snapshotDir();
    expect(before.map(([f]) => f)).toEqual(["no_results.txt", "processed_names.txt", "search_results.csv"]);

    const rerunSearch = searchReturning({});
    const summary = await runPipeline(
      queries,
      deps({ search: rerunSearch, outputs: new CsvResultOutputs(paths), ledger: await FileLedger.open(paths.processed) })
    );

    expect(rerunSearch.search).not.toHaveBeenCalled();
    expect(summary.pending).toBe(0);
    expect(await snapshotDir()).toEqual(before);
  });
});
