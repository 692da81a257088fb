// =============================================================================
// @rss-courier/worker — Feed → summary → DM pipeline
// =============================================================================
// One run: fetch every configured feed, keep entries not yet in the SeenSet,
// summarize each, optionally archive it as a note, deliver it by DM, and only
// then mark it seen. Feed-level and entry-level failures are logged once and
// counted; the run carries on with the remaining work.
// =============================================================================

import {
  CourierError,
  DeliveryError,
  SummarizeError,
  errorMessage,
  fetchFeed as defaultFetchFeed,
  type Entry,
  type EntryOutcome,
  type FeedDocument,
  type FeedRunResult,
  type FeedSource,
  type FetchFeedOptions,
  type Logger,
  type Notifier,
  type RunReport,
  type SeenStore,
  type Summarizer,
  type Summary,
} from "@rss-courier/shared";
import { matchesInterests } from "./interests.js";
import { writeNote } from "./notes.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FeedFetcher = (
  source: FeedSource,
  options: FetchFeedOptions,
) => Promise<FeedDocument>;

export interface PipelineDeps {
  feeds: FeedSource[];
  seenStore: SeenStore;
  summarizer: Summarizer;
  /** Null only for dry runs */
  notifier: Notifier | null;
  logger: Logger;
  fetchFeed?: FeedFetcher;
  notesDir?: string;
  interestKeywords?: string[];
  requestTimeoutMs?: number;
  /** Feeds fetched at once; entries within a feed are always sequential */
  feedConcurrency?: number;
  /** Cap on new entries handled per feed per run; 0 = no cap */
  maxEntriesPerFeed?: number;
}

export interface RunOptions {
  /** Summarize and log only: no DMs, no SeenSet writes */
  dryRun?: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Runs `fn` over `items` with at most `limit` calls in flight, keeping order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    async () => {
      while (next < items.length) {
        const index = next++;
        results[index] = await fn(items[index], index);
      }
    },
  );

  await Promise.all(workers);
  return results;
}

function errorFields(err: unknown): Record<string, unknown> {
  const fields: Record<string, unknown> = { error: errorMessage(err) };
  if (err instanceof CourierError) fields.code = err.code;
  if (err instanceof SummarizeError) fields.transient = err.transient;
  if (err instanceof DeliveryError) fields.reason = err.reason;
  return fields;
}

// ---------------------------------------------------------------------------
// runPipeline
// ---------------------------------------------------------------------------

export async function runPipeline(
  deps: PipelineDeps,
  options: RunOptions = {},
): Promise<RunReport> {
  const dryRun = options.dryRun ?? false;
  const { notifier, seenStore, summarizer, logger } = deps;
  if (!dryRun && !notifier) {
    throw new Error("runPipeline needs a notifier unless dryRun is set");
  }

  const fetchFeed = deps.fetchFeed ?? defaultFetchFeed;
  const keywords = deps.interestKeywords ?? [];
  const maxPerFeed = deps.maxEntriesPerFeed ?? 0;
  const start = performance.now();

  const counts = { delivered: 0, filtered: 0, failed: 0, previewed: 0, skipped: 0 };
  // Ids taken by this run, so an item cross-posted to two feeds (or repeated
  // within one) is handled once even before it reaches the SeenSet.
  const claimed = new Set<string>();

  async function markSeen(entry: Entry, log: Logger): Promise<void> {
    try {
      await seenStore.markSeen(entry.id);
    } catch (err) {
      log.error("Entry not recorded as seen; it may repeat next run", errorFields(err));
    }
  }

  async function archive(entry: Entry, summary: Summary, log: Logger): Promise<void> {
    if (!deps.notesDir) return;
    try {
      const file = await writeNote(deps.notesDir, entry, summary);
      log.debug("Note written", { file });
    } catch (err) {
      log.warn("Could not write note", { error: errorMessage(err) });
    }
  }

  async function processEntry(entry: Entry, log: Logger): Promise<EntryOutcome> {
    let summary: Summary;
    try {
      summary = await summarizer.summarize(entry);
    } catch (err) {
      log.error("Entry failed", { stage: "summarize", ...errorFields(err) });
      return "summarize_failed";
    }

    await archive(entry, summary, log);

    if (!matchesInterests(entry, summary, keywords)) {
      if (!dryRun) await markSeen(entry, log);
      log.info("Entry filtered: no interest keyword matched", { title: entry.title });
      return "filtered";
    }

    if (dryRun || !notifier) {
      log.info("Dry run: summary not delivered", {
        title: entry.title,
        link: entry.link,
        summary: summary.text,
      });
      return "dry_run";
    }

    try {
      const receipt = await notifier.deliver(entry, summary);
      log.info("Entry delivered", {
        title: entry.title,
        messageId: receipt.messageId,
      });
    } catch (err) {
      log.error("Entry failed", { stage: "deliver", ...errorFields(err) });
      return "delivery_failed";
    }

    await markSeen(entry, log);
    return "delivered";
  }

  async function processFeed(source: FeedSource): Promise<FeedRunResult> {
    const feedLog = logger.child({ feed: source.url });
    const result: FeedRunResult = {
      url: source.url,
      ...(source.name ? { name: source.name } : {}),
      status: "ok",
      entries: 0,
      new: 0,
    };

    let doc: FeedDocument;
    try {
      doc = await fetchFeed(source, {
        timeoutMs: deps.requestTimeoutMs,
        logger: feedLog,
      });
    } catch (err) {
      feedLog.error("Feed skipped", errorFields(err));
      return { ...result, status: "failed", error: errorMessage(err) };
    }

    let handled = 0;
    for (const entry of doc.entries) {
      result.entries++;
      if (!seenStore.isNew(entry.id) || claimed.has(entry.id)) {
        counts.skipped++;
        continue;
      }
      result.new++;
      if (maxPerFeed > 0 && handled >= maxPerFeed) continue;

      claimed.add(entry.id);
      handled++;

      const outcome = await processEntry(entry, feedLog.child({ entry: entry.id }));
      switch (outcome) {
        case "delivered":
          counts.delivered++;
          break;
        case "filtered":
          counts.filtered++;
          break;
        case "dry_run":
          counts.previewed++;
          break;
        case "summarize_failed":
        case "delivery_failed":
          counts.failed++;
          break;
      }
    }

    if (maxPerFeed > 0 && result.new > handled) {
      feedLog.info("Per-feed cap reached; remaining entries wait for next run", {
        deferred: result.new - handled,
      });
    }
    feedLog.debug("Feed processed", { entries: result.entries, new: result.new });
    return result;
  }

  logger.info("Run starting", { feeds: deps.feeds.length, dryRun });

  const feeds = await mapWithConcurrency(
    deps.feeds,
    deps.feedConcurrency ?? 1,
    processFeed,
  );

  return {
    feeds,
    ...counts,
    dryRun,
    durationMs: Math.round(performance.now() - start),
  };
}
