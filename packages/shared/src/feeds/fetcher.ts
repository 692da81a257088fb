// =============================================================================
// @rss-courier/shared — RSS/Atom feed fetcher
// =============================================================================
// Downloads one feed over HTTP and parses it with rss-parser. Transport
// problems surface as FetchError, malformed documents as ParseError. Items
// are mapped to Entry values lazily, in document order, each time the
// returned `entries` iterable is walked.
// =============================================================================

import crypto from "node:crypto";
import Parser from "rss-parser";
import { convert } from "html-to-text";
import { FetchError, ParseError, errorMessage } from "../errors.js";
import { logExternalCall, silentLogger, type Logger } from "../logger.js";
import type { Entry, FeedDocument, FeedSource } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_TIMEOUT_MS = 20_000;
const USER_AGENT = "rss-courier/0.1";
const ACCEPT =
  "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.5";

export interface FetchFeedOptions {
  timeoutMs?: number;
  logger?: Logger;
}

type FeedItem = Parser.Item & { "content:encoded"?: string; id?: string };

const parser: Parser<Record<string, unknown>, FeedItem> = new Parser({
  customFields: { item: ["content:encoded", "id"] },
});

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

/** HTML fragment → single-spaced plain text, links and images dropped. */
export function htmlToPlainText(html: string): string {
  if (!/[<&]/.test(html)) return html.replace(/\s+/g, " ").trim();
  return convert(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" },
    ],
  })
    .replace(/\s+/g, " ")
    .trim();
}

function fallbackEntryId(source: FeedSource, title: string, date: string): string {
  const digest = crypto
    .createHash("sha256")
    .update(`${source.url}\n${title}\n${date}`)
    .digest("hex");
  return `sha256:${digest.slice(0, 32)}`;
}

function toIsoDate(item: FeedItem): string | undefined {
  if (item.isoDate) return item.isoDate;
  if (!item.pubDate) return undefined;
  const ms = Date.parse(item.pubDate);
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}

/**
 * Maps a parsed feed item to an Entry. Returns null for items that carry no
 * title, body, or link: there is nothing to summarize or point at.
 */
export function toEntry(item: FeedItem, source: FeedSource): Entry | null {
  const title = htmlToPlainText(item.title ?? "");
  const rawBody =
    item["content:encoded"] ?? item.content ?? item.summary ?? "";
  const body = htmlToPlainText(rawBody) || (item.contentSnippet ?? "").trim();
  const link = item.link?.trim() || undefined;

  if (!title && !body && !link) return null;

  const id =
    item.guid?.trim() ||
    item.id?.trim() ||
    link ||
    fallbackEntryId(source, title, item.pubDate ?? "");

  return {
    id,
    title: title || link || "Untitled",
    link,
    body,
    publishedAt: toIsoDate(item),
    source,
  };
}

// ---------------------------------------------------------------------------
// fetchFeed
// ---------------------------------------------------------------------------

async function download(
  source: FeedSource,
  timeoutMs: number,
): Promise<string> {
  let response: Response;
  try {
    response = await fetch(source.url, {
      headers: { Accept: ACCEPT, "User-Agent": USER_AGENT },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const timedOut = err instanceof Error && err.name === "TimeoutError";
    throw new FetchError(
      source.url,
      timedOut
        ? `Timed out after ${timeoutMs}ms fetching ${source.url}`
        : `Request to ${source.url} failed: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  if (!response.ok) {
    throw new FetchError(
      source.url,
      `Feed request returned ${response.status} ${response.statusText}`.trim(),
      { status: response.status },
    );
  }

  try {
    return await response.text();
  } catch (err) {
    throw new FetchError(
      source.url,
      `Failed reading body of ${source.url}: ${errorMessage(err)}`,
      { status: response.status, cause: err },
    );
  }
}

/**
 * Fetches and parses one feed.
 *
 * The returned document's `entries` re-walks the parsed items on every
 * iteration; nothing beyond the HTTP body is cached.
 */
export async function fetchFeed(
  source: FeedSource,
  options: FetchFeedOptions = {},
): Promise<FeedDocument> {
  const logger = options.logger ?? silentLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const start = performance.now();

  let xml: string;
  try {
    xml = await download(source, timeoutMs);
  } catch (err) {
    logExternalCall(
      logger,
      "feed",
      "fetch",
      Math.round(performance.now() - start),
      errorMessage(err),
    );
    throw err;
  }
  logExternalCall(logger, "feed", "fetch", Math.round(performance.now() - start));

  let feed: Parser.Output<FeedItem>;
  try {
    feed = await parser.parseString(xml);
  } catch (err) {
    throw new ParseError(
      source.url,
      `Not a well-formed feed document: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const items = feed.items;

  return {
    source,
    title: feed.title?.trim() || undefined,
    entries: {
      *[Symbol.iterator]() {
        for (const item of items) {
          const entry = toEntry(item, source);
          if (entry) {
            yield entry;
          } else {
            logger.warn("Dropping feed item with no title, body, or link", {
              feed: source.url,
            });
          }
        }
      },
    },
  };
}
