// =============================================================================
// @rss-courier/shared — Domain types
// =============================================================================
// Feed sources, entries, summaries, and the per-run report produced by the
// worker pipeline.
// =============================================================================

// ---------------------------------------------------------------------------
// Feeds
// ---------------------------------------------------------------------------

/** A configured feed. Immutable for the life of the process. */
export interface FeedSource {
  url: string;
  name?: string;
}

/** One article from a feed, as handed to the rest of the pipeline. */
export interface Entry {
  /** guid, else link, else a content hash */
  id: string;
  title: string;
  link?: string;
  /** Plain text, HTML already stripped */
  body: string;
  /** ISO 8601 */
  publishedAt?: string;
  source: FeedSource;
}

export interface FeedDocument {
  source: FeedSource;
  title?: string;
  /** Lazy and restartable: each iteration re-walks the document in order. */
  entries: Iterable<Entry>;
}

// ---------------------------------------------------------------------------
// Summaries & delivery
// ---------------------------------------------------------------------------

export interface Summary {
  entryId: string;
  text: string;
  model: string;
  /** True when the article text was cut to fit the input limit */
  truncatedInput: boolean;
}

export interface DeliveryReceipt {
  entryId: string;
  messageId: string;
  deliveredAt: string;
}

// ---------------------------------------------------------------------------
// Run reporting
// ---------------------------------------------------------------------------

/** What happened to a single new entry during a run */
export type EntryOutcome =
  | "delivered"
  | "filtered"
  | "dry_run"
  | "summarize_failed"
  | "delivery_failed";

export interface FeedRunResult {
  url: string;
  name?: string;
  status: "ok" | "failed";
  error?: string;
  /** Entries present in the document */
  entries: number;
  /** Entries not yet in the SeenSet */
  new: number;
}

export interface RunReport {
  feeds: FeedRunResult[];
  delivered: number;
  filtered: number;
  failed: number;
  /** Summarized but not delivered because of a dry run */
  previewed: number;
  /** Entries skipped because they were already seen */
  skipped: number;
  dryRun: boolean;
  durationMs: number;
}
