import type { Config } from "../config";

export type ExclusionFilters = {
  isExcludedAuthor(author: string): boolean;
  /** First configured pattern contained in the URL, or null. */
  matchedUrlPattern(url: string): string | null;
  isExcludedUrl(url: string): boolean;
  yearMismatch(caseYear: number | null, articleYear: number | null): boolean;
};

export type ExclusionSettings = Pick<Config, "excludedAuthors" | "excludedUrlPatterns" | "yearMatching">;

export function createExclusionFilters({
  excludedAuthors,
  excludedUrlPatterns,
  yearMatching,
}: ExclusionSettings): ExclusionFilters {
  const authors = new Set(excludedAuthors.map((a) => a.trim().toLowerCase()));

  const matchedUrlPattern = (url: string) => excludedUrlPatterns.find((p) => url.includes(p)) ?? null;

  return {
    isExcludedAuthor: (author) => authors.has(author.trim().toLowerCase()),
    matchedUrlPattern,
    isExcludedUrl: (url) => matchedUrlPattern(url) !== null,
    // an unknown year on either side never excludes
    yearMismatch: (caseYear, articleYear) =>
      yearMatching && caseYear !== null && articleYear !== null && caseYear !== articleYear,
  };
}
