import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import {
  DEFAULT_DOCKET_FILES,
  DEFAULT_EXCLUDED_AUTHORS,
  DEFAULT_EXCLUDED_HEARING_TYPES,
  DEFAULT_EXCLUDED_URL_PATTERNS,
  DEFAULT_USER_AGENT,
} from "./constants";
import { ConfigError } from "./errors";
import type { Logger } from "./logger";
import { expandHome } from "./utils";

const ConfigFileSchema = z
  .object({
    api_key: z.string().default(""),
    cse_id: z.string().default(""),
    results_folder: z.string().min(1).default("data/results"),
    docket_folder: z.string().min(1).default("data/dockets"),
    docket_files: z.array(z.string().min(1)).min(1).default(DEFAULT_DOCKET_FILES),
    input_file: z.string().min(1).optional(),
    request_timeout: z.number().positive().default(20),
    search_delay: z.number().min(0).default(3),
    search_retries: z.number().int().min(1).max(10).default(3),
    search_result_count: z.number().int().min(1).max(10).default(10),
    author_concurrency: z.number().int().min(1).max(20).default(5),
    excluded_authors: z.array(z.string()).default(DEFAULT_EXCLUDED_AUTHORS),
    excluded_url_patterns: z.array(z.string().min(1)).default(DEFAULT_EXCLUDED_URL_PATTERNS),
    excluded_hearing_types: z.array(z.string()).default(DEFAULT_EXCLUDED_HEARING_TYPES),
    year_matching: z.boolean().default(true),
    user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  })
  .strict();

export type Config = {
  apiKey: string;
  cseId: string;
  resultsFolder: string;
  docketFolder: string;
  docketFiles: string[];
  /** Consolidated docket table: written by `consolidate`, read by `match`. */
  inputFile: string;
  requestTimeoutMs: number;
  searchDelayMs: number;
  searchRetries: number;
  searchResultCount: number;
  authorConcurrency: number;
  excludedAuthors: string[];
  excludedUrlPatterns: string[];
  excludedHearingTypes: string[];
  yearMatching: boolean;
  userAgent: string;
};

export type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number, got "${raw}"`);
  return n;
}

function envFlag(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean flag, got "${env[key]}"`);
}

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) return {};
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * Builds the run configuration: file values over defaults, environment over
 * file. A missing config file is not an error.
 */
export function loadConfig(configPath: string, env: Env = process.env): Config {
  const parsed = ConfigFileSchema.safeParse(readConfigFile(configPath));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid config file ${configPath}:\n  ${issues.join("\n  ")}`);
  }
  const file = parsed.data;

  const docketFolder = expandHome(env.DOCKET_FOLDER || file.docket_folder);
  const inputFile = env.INPUT_FILE || file.input_file || join(docketFolder, "docket_codeready.csv");

  return {
    apiKey: env.GOOGLE_API_KEY || file.api_key,
    cseId: env.GOOGLE_CX || env.Google_CX || file.cse_id,
    resultsFolder: resolve(expandHome(env.RESULTS_FOLDER || file.results_folder)),
    docketFolder: resolve(docketFolder),
    docketFiles: file.docket_files,
    inputFile: resolve(expandHome(inputFile)),
    requestTimeoutMs: (envNumber(env, "REQUEST_TIMEOUT") ?? file.request_timeout) * 1000,
    searchDelayMs: (envNumber(env, "SEARCH_DELAY") ?? file.search_delay) * 1000,
    searchRetries: file.search_retries,
    searchResultCount: file.search_result_count,
    authorConcurrency: file.author_concurrency,
    excludedAuthors: file.excluded_authors,
    excludedUrlPatterns: file.excluded_url_patterns,
    excludedHearingTypes: file.excluded_hearing_types,
    yearMatching: envFlag(env, "YEAR_MATCHING") ?? file.year_matching,
    userAgent: env.USER_AGENT || file.user_agent,
  };
}

/** Throws when a credential is missing, after writing the error to `logger`'s run log. */
export function requireSearchCredentials(config: Config, logger?: Logger): void {
  const missing = [!config.apiKey && "GOOGLE_API_KEY", !config.cseId && "GOOGLE_CX"].filter(Boolean);
  if (missing.length) {
    const error = new ConfigError(`Search API credentials missing: ${missing.join(", ")} (set them in .env or config.json)`);
    logger?.error(error.message);
    throw error;
  }
}
