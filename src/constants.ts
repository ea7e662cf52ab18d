export const DOCKET_COLUMNS = {
  date: "Date",
  time: "Time",
  name: "Name",
  caseNumber: "Case Number",
  hearingType: "Hearing Type",
  location: "Location",
} as const;

export const CONSOLIDATED_HEADERS = [
  DOCKET_COLUMNS.date,
  DOCKET_COLUMNS.time,
  DOCKET_COLUMNS.name,
  DOCKET_COLUMNS.caseNumber,
  DOCKET_COLUMNS.hearingType,
  DOCKET_COLUMNS.location,
];

export const RESULT_HEADERS = [...CONSOLIDATED_HEADERS, "Title", "Link", "Year", "Snippet", "Author"];

export const EXCLUDED_RESULT_HEADERS = [...RESULT_HEADERS, "Exclusion Reason"];

export const OUTPUT_FILES = {
  results: "search_results.csv",
  excluded: "excluded_results.csv",
  noResults: "no_results.txt",
  processed: "processed_names.txt",
  log: "search_log.txt",
} as const;

export const CONSOLIDATION_FILES = {
  exclusionLog: "exclusion_log.txt",
  log: "consolidation_log.txt",
} as const;

export const DEFAULT_DOCKET_FILES = ["4th_district.csv", "10th_district.csv", "11th_district.csv"];

export const DEFAULT_EXCLUDED_AUTHORS = [
  "associated press",
  "cnn newsource",
  "cnn",
  "debra worley",
  "the associated press",
  "gray news",
];

export const DEFAULT_EXCLUDED_URL_PATTERNS = ["entertainment/", "sports/", "/lifestyle/"];

export const DEFAULT_EXCLUDED_HEARING_TYPES = [
  "Review WAppearance of Parties",
  "Hearing on Bond",
  "HrgRevocation of Probation",
  "Review Hearing",
  "Compliance Hrg DV Relinquish",
  "Appearance on Arrest Warrant",
  "Rttn on Summ for Rev of Prob",
  "Appearance of Counsel",
  "Status Conference",
  "Appearance on Bond",
  "Rtrn Filing of Charges",
  "HrgRevocation of Deferred",
  "Hearing on Petition to Seal",
  "Show Cause Hearing",
  "Setting",
  "Hearing on Probation",
  "PreTrial Readiness Conference",
  "Restitution Hearing",
  "Rtrn on Summ for Rev of Prob",
];

export const NO_AUTHOR = "No author";
export const UNKNOWN_AUTHOR = "Unknown";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";
