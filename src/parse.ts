import type { AxiosInstance } from "axios";
import { load, type CheerioAPI } from "cheerio";
import { NO_AUTHOR, UNKNOWN_AUTHOR } from "./constants";
import { errorMessage } from "./errors";
import { getPage } from "./http";
import type { Logger } from "./logger";

/** Returns an author name found in the page, or undefined to fall through. */
export type AuthorExtractor = {
  name: string;
  extract($: CheerioAPI): string | undefined;
};

export const BYLINE_SELECTORS = [
  "span.author",
  "div.meta__user.vcard.author > a",
  ".byline-name",
  ".author-name",
  "[rel='author']",
  ".article-byline",
  ".story-meta .name",
];

function clean(s: string | undefined): string | undefined {
  const t = s?.replace(/\s+/g, " ").trim();
  return t || undefined;
}

export const bylineExtractor = (selectors: string[] = BYLINE_SELECTORS): AuthorExtractor => ({
  name: "byline",
  // one combined selector so the earliest match in the document wins
  extract: ($) => clean($(selectors.join(", ")).first().text()),
});

export const metaAuthorExtractor: AuthorExtractor = {
  name: "meta[name=author]",
  extract: ($) => clean($("meta[name='author']").attr("content")),
};

export const DEFAULT_AUTHOR_EXTRACTORS: AuthorExtractor[] = [bylineExtractor(), metaAuthorExtractor];

export function extractAuthor(html: string, extractors: AuthorExtractor[] = DEFAULT_AUTHOR_EXTRACTORS): string | undefined {
  const $ = load(html);
  for (const extractor of extractors) {
    const author = extractor.extract($);
    if (author) return author;
  }
  return undefined;
}

export type AuthorResolver = {
  resolveAuthor(url: string): Promise<string>;
};

export function createAuthorResolver(
  http: AxiosInstance,
  logger: Logger,
  extractors: AuthorExtractor[] = DEFAULT_AUTHOR_EXTRACTORS
): AuthorResolver {
  return {
    async resolveAuthor(url) {
      try {
        const page = await getPage(http, url);
        if (page.status !== 200) {
          logger.warn(`Got status code ${page.status} for ${url}`);
          return NO_AUTHOR;
        }
        const author = extractAuthor(page.html, extractors);
        if (!author) return UNKNOWN_AUTHOR;
        logger.info(`Found author: ${author} for ${url}`);
        return author;
      } catch (e) {
        logger.error(`Error fetching author from ${url}: ${errorMessage(e)}`);
        return UNKNOWN_AUTHOR;
      }
    },
  };
}
