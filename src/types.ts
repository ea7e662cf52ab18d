export type DocketRecord = {
  date: string;
  time: string;
  name: string;
  caseNumber: string; // ", "-joined when several raw rows share the same hearing
  hearingType: string;
  location: string;
  sourceFile: string;
};

export type ExcludedDocketRecord = {
  name: string;
  caseNumber: string;
  hearingType: string;
  sourceFile: string;
};

export type NameQuery = {
  date: string;
  time: string;
  name: string;
  caseNumber: string;
  hearingType: string;
  location: string;
};

export type RawSearchItem = {
  title?: string;
  link?: string;
  snippet?: string;
};

export type SearchResponse = {
  totalResults?: string;
  items: RawSearchItem[];
};

export type SearchHit = {
  title: string;
  link: string;
  snippet: string;
  resolvedYear: number | null; // from a /YYYY/ URL segment
  resolvedAuthor: string;
};

export type Verdict =
  | { kind: "valid" }
  | { kind: "excluded-author"; author: string }
  | { kind: "excluded-url-pattern"; pattern: string }
  | { kind: "excluded-year-mismatch"; caseYear: number; articleYear: number };

export type ExclusionVerdict = Exclude<Verdict, { kind: "valid" }>;

export type ExcludedHit = SearchHit & { verdict: ExclusionVerdict };

export type Classification = {
  valid: SearchHit[];
  excluded: ExcludedHit[];
};
