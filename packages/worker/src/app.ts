// =============================================================================
// @rss-courier/worker — Dependency factory
// =============================================================================
// Builds everything a run needs from a validated Config: the Discord session
// (established first, so an authentication failure stops the process before
// any feed is fetched), the summarizer, and the SeenSet. Returns the pipeline
// dependencies plus a shutdown function that flushes state and closes the
// session.
// =============================================================================

import type Anthropic from "@anthropic-ai/sdk";
import {
  type Config,
  type DirectMessageSession,
  type Logger,
  Notifier,
  SeenStore,
  connectDiscord,
  createAnthropicClient,
  createSummarizer,
  errorMessage,
} from "@rss-courier/shared";
import type { FeedFetcher, PipelineDeps } from "./pipeline.js";

export interface WorkerOverrides {
  /** Replaces the discord.js login, e.g. with an in-memory session */
  connect?: (token: string, logger: Logger) => Promise<DirectMessageSession>;
  anthropicClient?: Anthropic;
  fetchFeed?: FeedFetcher;
}

export interface WorkerInstance {
  deps: PipelineDeps;
  /** Flush the SeenSet and close the Discord session. Safe to call twice. */
  shutdown: () => Promise<void>;
}

export async function createWorker(
  config: Config,
  options: { logger: Logger; dryRun: boolean } & WorkerOverrides,
): Promise<WorkerInstance> {
  const { logger, dryRun } = options;

  // --- Discord session (skipped for dry runs) ---
  let session: DirectMessageSession | null = null;
  let notifier: Notifier | null = null;
  if (!dryRun) {
    if (!config.discord) {
      throw new Error("Discord settings missing outside dry-run mode");
    }
    const connect =
      options.connect ??
      ((token: string, log: Logger) => connectDiscord(token, { logger: log }));
    session = await connect(config.discord.token, logger);
    notifier = new Notifier(session, { userId: config.discord.userId, logger });
    logger.info("Discord session ready");
  }

  // --- Summarizer ---
  const anthropicClient =
    options.anthropicClient ??
    createAnthropicClient({
      apiKey: config.summarizer.apiKey,
      baseURL: config.summarizer.baseUrl,
      timeoutMs: config.requestTimeoutMs,
    });
  const summarizer = createSummarizer(anthropicClient, {
    model: config.summarizer.model,
    maxTokens: config.summarizer.maxTokens,
    maxInputChars: config.summarizer.maxInputChars,
    maxSummaryChars: config.summarizer.maxSummaryChars,
    retryDelayMs: config.summarizer.retryDelayMs,
    logger,
  });

  // --- SeenSet ---
  const seenStore = new SeenStore({
    path: config.seenStorePath,
    readOnly: dryRun,
    logger,
  });
  await seenStore.load();

  const deps: PipelineDeps = {
    feeds: config.feeds,
    seenStore,
    summarizer,
    notifier,
    logger,
    fetchFeed: options.fetchFeed,
    notesDir: config.notesDir,
    interestKeywords: config.interestKeywords,
    requestTimeoutMs: config.requestTimeoutMs,
    feedConcurrency: config.feedConcurrency,
    maxEntriesPerFeed: config.maxEntriesPerFeed,
  };

  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    try {
      await seenStore.flush();
    } catch (err) {
      logger.error("Final seen store flush failed", { error: errorMessage(err) });
    }
    if (session) await session.close();
    logger.debug("Worker shut down");
  }

  return { deps, shutdown };
}
