import pLimit from "p-limit";
import { UNKNOWN_AUTHOR } from "./constants";
import { extractYear, extractYearFromUrl } from "./features/case-year";
import type { ExclusionFilters } from "./features/exclusion-filters";
import type { Logger } from "./logger";
import type { AuthorResolver } from "./parse";
import type { Classification, ExclusionVerdict, SearchHit, SearchResponse, Verdict } from "./types";
import { trimTo } from "./utils";

export type ClassifierDeps = {
  authors: AuthorResolver;
  filters: ExclusionFilters;
  logger: Logger;
  /** Parallel author fetches per query. */
  concurrency?: number;
};

export function describeVerdict(verdict: ExclusionVerdict): string {
  switch (verdict.kind) {
    case "excluded-author":
      return `Excluded author: ${verdict.author}`;
    case "excluded-url-pattern":
      return `URL pattern match: ${verdict.pattern}`;
    case "excluded-year-mismatch":
      return `Year mismatch: Case year ${verdict.caseYear} ≠ Article year ${verdict.articleYear}`;
  }
}

/** Author, then URL pattern, then year; the first that applies is the only reason kept. */
export function judgeHit(hit: SearchHit, caseYear: number | null, filters: ExclusionFilters): Verdict {
  if (filters.isExcludedAuthor(hit.resolvedAuthor)) {
    return { kind: "excluded-author", author: hit.resolvedAuthor };
  }
  const pattern = filters.matchedUrlPattern(hit.link);
  if (pattern !== null) {
    return { kind: "excluded-url-pattern", pattern };
  }
  if (caseYear !== null && hit.resolvedYear !== null && filters.yearMismatch(caseYear, hit.resolvedYear)) {
    return { kind: "excluded-year-mismatch", caseYear, articleYear: hit.resolvedYear };
  }
  return { kind: "valid" };
}

export type SearchResultClassifier = {
  classify(response: SearchResponse | null, caseNumber: string | null | undefined): Promise<Classification>;
};

export function createClassifier({ authors, filters, logger, concurrency = 5 }: ClassifierDeps): SearchResultClassifier {
  const limit = pLimit(concurrency);

  return {
    async classify(response, caseNumber) {
      const items = response?.items ?? [];
      if (items.length === 0) return { valid: [], excluded: [] };

      const caseYear = extractYear(caseNumber);
      if (caseYear !== null) {
        logger.info(`Extracted case year: ${caseYear} from case number: ${caseNumber}`);
      } else {
        logger.info(`Could not extract year from case number: ${caseNumber ?? ""}`);
      }

      const hits = await Promise.all(
        items.map((item) =>
          limit(async (): Promise<SearchHit> => {
            const title = item.title ?? "";
            const link = item.link ?? "";
            const resolvedYear = extractYearFromUrl(link);
            logger.info(`Processing article: ${trimTo(title, 40)} from ${resolvedYear ?? "unknown year"}`);
            const resolvedAuthor = link ? await authors.resolveAuthor(link) : UNKNOWN_AUTHOR;
            return { title, link, snippet: item.snippet ?? "", resolvedYear, resolvedAuthor };
          })
        )
      );

      const result: Classification = { valid: [], excluded: [] };
      for (const hit of hits) {
        const verdict = judgeHit(hit, caseYear, filters);
        if (verdict.kind === "valid") {
          result.valid.push(hit);
        } else {
          logger.info(`Skipping: ${describeVerdict(verdict)}`);
          result.excluded.push({ ...hit, verdict });
        }
      }

      logger.info(`Processed ${result.valid.length} valid, ${result.excluded.length} excluded results`);
      return result;
    },
  };
}
