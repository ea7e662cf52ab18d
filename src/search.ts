import { google } from "googleapis";
import { z } from "zod";
import type { Config } from "./config";
import { errorMessage } from "./errors";
import { createRetryPolicy, withRetry, type RetryHooks, type RetryPolicy } from "./features/retry-policy";
import type { Logger } from "./logger";
import type { SearchResponse } from "./types";

/** Issues one raw request for `query` and returns the decoded JSON body. */
export type SearchTransport = (query: string) => Promise<unknown>;

export type SearchClient = {
  /** null when every attempt failed; a response with no items is "no results". */
  search(query: string): Promise<SearchResponse | null>;
};

const SearchEnvelopeSchema = z.object({
  searchInformation: z.object({ totalResults: z.string().optional() }).passthrough(),
  items: z
    .array(
      z
        .object({
          title: z.string().optional(),
          link: z.string().optional(),
          snippet: z.string().optional(),
        })
        .passthrough()
    )
    .optional(),
});

class MalformedResponseError extends Error {
  constructor(detail: string) {
    super(`Invalid response format: ${detail}`);
    this.name = "MalformedResponseError";
  }
}

export function googleTransport(config: Pick<Config, "apiKey" | "cseId" | "searchResultCount" | "requestTimeoutMs">): SearchTransport {
  const customsearch = google.customsearch("v1");
  return async (q) => {
    const res = await customsearch.cse.list(
      { q, cx: config.cseId, key: config.apiKey, num: config.searchResultCount },
      { timeout: config.requestTimeoutMs, retry: false }
    );
    return res.data;
  };
}

/** Quotes the name so the engine matches it as a phrase. */
export function nameQuery(name: string): string {
  return `"${name.replace(/"/g, "")}"`;
}

export function createSearchClient(
  transport: SearchTransport,
  logger: Logger,
  policy: RetryPolicy = createRetryPolicy(3),
  hooks: Pick<RetryHooks, "sleep"> = {}
): SearchClient {
  return {
    async search(query) {
      const result = await withRetry(
        policy,
        async (attempt) => {
          logger.info(`Attempt ${attempt + 1} for query: ${query}`);
          const parsed = SearchEnvelopeSchema.safeParse(await transport(query));
          if (!parsed.success) {
            throw new MalformedResponseError(parsed.error.issues.map((i) => i.path.join(".") || i.message).join(", "));
          }
          return parsed.data;
        },
        {
          ...hooks,
          onRetry: (err, _attempt, delayMs) =>
            logger.warn(`${errorMessage(err)} for ${query}, retrying in ${delayMs / 1000} seconds...`),
        }
      );

      if (!result.ok) {
        logger.error(`All retries failed for query: ${query} (${errorMessage(result.error)})`);
        return null;
      }

      const items = result.value.items ?? [];
      if (items.length === 0) {
        logger.info(`No search results found for ${query}`);
      } else {
        logger.info(`Found ${items.length} results for ${query}`);
      }
      return { totalResults: result.value.searchInformation.totalResults, items };
    },
  };
}
