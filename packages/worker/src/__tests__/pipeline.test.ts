// =============================================================================
// Unit tests for the feed → summary → DM pipeline
// =============================================================================
// Feeds, summarizer, and Discord are replaced with in-memory stand-ins; the
// SeenStore is the real one in read-only mode, so nothing reaches disk.
// =============================================================================

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type Anthropic from "@anthropic-ai/sdk";
import {
  FetchError,
  Notifier,
  SeenStore,
  createLogger,
  createSummarizer,
  type DirectMessageSession,
  type Entry,
  type FeedDocument,
  type FeedSource,
  type Summarizer,
} from "@rss-courier/shared";
import {
  mapWithConcurrency,
  runPipeline,
  type FeedFetcher,
  type PipelineDeps,
} from "../pipeline.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FEED: FeedSource = { url: "https://example.com/rss", name: "Example" };
const OTHER_FEED: FeedSource = { url: "https://other.example.org/atom" };

function entry(id: string, source: FeedSource = FEED, title = `Post ${id}`): Entry {
  return {
    id,
    title,
    link: `https://example.com/${id}`,
    body: `Body of ${id}`,
    source,
  };
}

function fakeFetcher(docs: Record<string, Entry[] | Error>): FeedFetcher {
  return vi.fn(async (source: FeedSource): Promise<FeedDocument> => {
    const value = docs[source.url];
    if (value instanceof Error) throw value;
    return { source, entries: value ?? [] };
  });
}

function fakeSummarizer(failFor: string[] = []): Summarizer & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async summarize(input) {
      calls.push(input.id);
      if (failFor.includes(input.id)) throw new Error(`cannot summarize ${input.id}`);
      return {
        entryId: input.id,
        text: `Summary of ${input.title}`,
        model: "claude-test",
        truncatedInput: false,
      };
    },
  };
}

class FakeSession implements DirectMessageSession {
  sent: string[] = [];
  failOn: (content: string) => unknown = () => null;

  async sendDirectMessage(_userId: string, content: string) {
    const failure = this.failOn(content);
    if (failure) throw failure;
    this.sent.push(content);
    return { messageId: `msg-${this.sent.length}` };
  }

  async close() {}
}

interface Harness {
  deps: PipelineDeps;
  session: FakeSession;
  seen: SeenStore;
  lines: Array<Record<string, unknown>>;
}

async function harness(
  overrides: Partial<PipelineDeps> & { seenIds?: string[] } = {},
): Promise<Harness> {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: "info",
    sink: (line) => lines.push(JSON.parse(line)),
  });
  const seen = new SeenStore({ path: "/unused/seen.json", readOnly: true });
  await seen.load();
  for (const id of overrides.seenIds ?? []) await seen.markSeen(id);

  const session = new FakeSession();
  const { seenIds: _ignored, ...rest } = overrides;
  const deps: PipelineDeps = {
    feeds: [FEED],
    seenStore: seen,
    summarizer: fakeSummarizer(),
    notifier: new Notifier(session, { userId: "123" }),
    logger,
    fetchFeed: fakeFetcher({ [FEED.url]: [entry("A"), entry("B")] }),
    ...rest,
  };
  return { deps, session, seen, lines };
}

function messages(lines: Array<Record<string, unknown>>, msg: string) {
  return lines.filter((l) => l.msg === msg);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("runPipeline", () => {
  it("delivers every new entry and marks it seen", async () => {
    const { deps, session, seen } = await harness();

    const report = await runPipeline(deps);

    expect(report.delivered).toBe(2);
    expect(report.failed).toBe(0);
    expect(report.skipped).toBe(0);
    expect(report.feeds).toEqual([
      { url: FEED.url, name: "Example", status: "ok", entries: 2, new: 2 },
    ]);
    expect(session.sent).toEqual([
      "**Post A**\nSummary of Post A\n\n<https://example.com/A>\n— Example",
      "**Post B**\nSummary of Post B\n\n<https://example.com/B>\n— Example",
    ]);
    expect(seen.has("A")).toBe(true);
    expect(seen.has("B")).toBe(true);
  });

  it("skips entries already in the seen set", async () => {
    const summarizer = fakeSummarizer();
    const { deps, session } = await harness({ seenIds: ["A"], summarizer });

    const report = await runPipeline(deps);

    expect(report.delivered).toBe(1);
    expect(report.skipped).toBe(1);
    expect(summarizer.calls).toEqual(["B"]);
    expect(session.sent).toHaveLength(1);
  });

  it("sends nothing on a second run over the same feed", async () => {
    const { deps, session } = await harness();

    await runPipeline(deps);
    const second = await runPipeline(deps);

    expect(second.delivered).toBe(0);
    expect(second.skipped).toBe(2);
    expect(session.sent).toHaveLength(2);
  });

  it("retries a transient summarizer failure once, then leaves the entry unseen", async () => {
    const create = vi.fn(async (params: { messages: Array<{ content: string }> }) => {
      if (params.messages[0].content.startsWith("Title: Post B")) {
        throw Object.assign(new Error("Service unavailable"), { status: 503 });
      }
      return { model: "claude-test", content: [{ type: "text", text: "Fine." }] };
    });
    const client = { messages: { create } } as unknown as Anthropic;
    const summarizer = createSummarizer(client, {
      model: "claude-test",
      maxTokens: 100,
      maxInputChars: 1000,
      maxSummaryChars: 500,
      retryDelayMs: 0,
      sleep: async () => {},
    });
    const { deps, session, seen, lines } = await harness({ summarizer });

    const report = await runPipeline(deps);

    expect(create).toHaveBeenCalledTimes(3);
    expect(report.delivered).toBe(1);
    expect(report.failed).toBe(1);
    expect(session.sent).toHaveLength(1);
    expect(seen.has("A")).toBe(true);
    expect(seen.has("B")).toBe(false);

    const failures = messages(lines, "Entry failed");
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({
      level: "error",
      feed: FEED.url,
      entry: "B",
      stage: "summarize",
      code: "SUMMARIZE_FAILED",
      transient: true,
    });
  });

  it("keeps an entry unseen when delivery fails", async () => {
    const { deps, session, seen, lines } = await harness();
    session.failOn = (content) =>
      content.includes("Post A")
        ? Object.assign(new Error("Cannot send messages to this user"), { code: 50007 })
        : null;

    const report = await runPipeline(deps);

    expect(report.delivered).toBe(1);
    expect(report.failed).toBe(1);
    expect(seen.has("A")).toBe(false);
    expect(seen.has("B")).toBe(true);
    expect(messages(lines, "Entry failed")[0]).toMatchObject({
      entry: "A",
      stage: "deliver",
      reason: "recipient",
    });
  });

  it("isolates a failing feed from the others", async () => {
    const fetchFeed = fakeFetcher({
      [FEED.url]: new FetchError(FEED.url, "Feed request returned 503 Service Unavailable", {
        status: 503,
      }),
      [OTHER_FEED.url]: [entry("C", OTHER_FEED)],
    });
    const { deps, lines } = await harness({ feeds: [FEED, OTHER_FEED], fetchFeed });

    const report = await runPipeline(deps);

    expect(report.feeds[0]).toEqual({
      url: FEED.url,
      name: "Example",
      status: "failed",
      error: "Feed request returned 503 Service Unavailable",
      entries: 0,
      new: 0,
    });
    expect(report.feeds[1].status).toBe("ok");
    expect(report.delivered).toBe(1);
    expect(messages(lines, "Feed skipped")).toHaveLength(1);
    expect(messages(lines, "Feed skipped")[0]).toMatchObject({
      feed: FEED.url,
      code: "FETCH_FAILED",
    });
  });

  it("summarizes without sending or recording anything on a dry run", async () => {
    const { deps, session, seen, lines } = await harness({ notifier: null });

    const report = await runPipeline(deps, { dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.previewed).toBe(2);
    expect(report.delivered).toBe(0);
    expect(session.sent).toEqual([]);
    expect(seen.size).toBe(0);
    expect(messages(lines, "Dry run: summary not delivered")[0]).toMatchObject({
      entry: "A",
      title: "Post A",
      summary: "Summary of Post A",
    });
  });

  it("refuses a real run without a notifier", async () => {
    const { deps } = await harness({ notifier: null });
    await expect(runPipeline(deps)).rejects.toThrow(
      "runPipeline needs a notifier unless dryRun is set",
    );
  });

  it("marks filtered entries seen without sending them", async () => {
    const fetchFeed = fakeFetcher({
      [FEED.url]: [entry("A", FEED, "Rust 2.0 released"), entry("B", FEED, "Gardening tips")],
    });
    const { deps, session, seen } = await harness({
      fetchFeed,
      interestKeywords: ["rust"],
    });

    const report = await runPipeline(deps);

    expect(report.delivered).toBe(1);
    expect(report.filtered).toBe(1);
    expect(session.sent).toHaveLength(1);
    expect(session.sent[0].startsWith("**Rust 2.0 released**")).toBe(true);
    expect(seen.has("B")).toBe(true);
  });

  it("defers entries beyond the per-feed cap to the next run", async () => {
    const fetchFeed = fakeFetcher({
      [FEED.url]: [entry("A"), entry("B"), entry("C")],
    });
    const { deps, seen, lines } = await harness({ fetchFeed, maxEntriesPerFeed: 2 });

    const first = await runPipeline(deps);
    expect(first.delivered).toBe(2);
    expect(first.feeds[0].new).toBe(3);
    expect(seen.has("C")).toBe(false);
    expect(
      messages(lines, "Per-feed cap reached; remaining entries wait for next run")[0],
    ).toMatchObject({ deferred: 1 });

    const second = await runPipeline(deps);
    expect(second.delivered).toBe(1);
    expect(seen.has("C")).toBe(true);
  });

  it("handles an id shared by two feeds once", async () => {
    const fetchFeed = fakeFetcher({
      [FEED.url]: [entry("shared")],
      [OTHER_FEED.url]: [entry("shared", OTHER_FEED)],
    });
    const summarizer = fakeSummarizer();
    const { deps, session } = await harness({
      feeds: [FEED, OTHER_FEED],
      fetchFeed,
      summarizer,
      feedConcurrency: 2,
    });

    const report = await runPipeline(deps);

    expect(report.delivered).toBe(1);
    expect(report.skipped).toBe(1);
    expect(summarizer.calls).toEqual(["shared"]);
    expect(session.sent).toHaveLength(1);
  });

  describe("notes archive", () => {
    let tmp: string;

    beforeEach(() => {
      tmp = fs.mkdtempSync(path.join(os.tmpdir(), "courier-notes-"));
    });

    afterEach(() => {
      fs.rmSync(tmp, { recursive: true, force: true });
    });

    it("writes one note per summarized entry", async () => {
      const notesDir = path.join(tmp, "notes");
      const { deps } = await harness({ notesDir });

      await runPipeline(deps);

      expect(fs.readdirSync(notesDir).sort()).toEqual(["Post A.txt", "Post B.txt"]);
      expect(fs.readFileSync(path.join(notesDir, "Post A.txt"), "utf-8")).toBe(
        "Title: Post A\nURL: https://example.com/A\n\nAI Summary:\nSummary of Post A\n",
      );
    });
  });
});

describe("mapWithConcurrency", () => {
  it("keeps result order and never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight--;
      return i;
    });

    expect(results).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
  });

  it("returns an empty array for no items", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
