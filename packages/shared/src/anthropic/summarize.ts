// =============================================================================
// @rss-courier/shared — Article summarizer (Claude Messages API)
// =============================================================================
// Builds a bounded prompt from an entry's title and body, asks the model for
// a short plain-text summary, and classifies failures as transient (5xx,
// timeouts, dropped connections) or permanent (4xx, empty output). Transient
// failures get exactly one retry after a fixed delay.
// =============================================================================

import Anthropic, { APIConnectionError } from "@anthropic-ai/sdk";
import { SummarizeError, errorMessage } from "../errors.js";
import { logExternalCall, silentLogger, type Logger } from "../logger.js";
import type { Entry, Summary } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const MAX_RETRIES = 1;
const ELLIPSIS = "…";

export const SUMMARY_SYSTEM_PROMPT = [
  "You summarize articles from RSS feeds for a busy reader.",
  "Reply with two to four plain-text sentences covering the key facts.",
  "No preamble, no headings, no markdown lists.",
  "Preserve factual accuracy; avoid speculation.",
].join(" ");

export interface SummarizerOptions {
  model: string;
  maxTokens: number;
  /** Upper bound on the article text sent to the model */
  maxInputChars: number;
  /** Upper bound on the returned summary */
  maxSummaryChars: number;
  retryDelayMs: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export type SummarizeInput = Pick<Entry, "id" | "title" | "body">;

export interface Summarizer {
  summarize(entry: SummarizeInput): Promise<Summary>;
}

// ---------------------------------------------------------------------------
// Prompt construction
// ---------------------------------------------------------------------------

/** Cuts `text` to at most `max` characters, marking the cut with an ellipsis. */
export function truncateText(
  text: string,
  max: number,
): { text: string; truncated: boolean } {
  if (text.length <= max) return { text, truncated: false };
  if (max <= ELLIPSIS.length) {
    return { text: text.slice(0, cutIndex(text, max)), truncated: true };
  }
  return {
    text: text.slice(0, cutIndex(text, max - ELLIPSIS.length)).trimEnd() + ELLIPSIS,
    truncated: true,
  };
}

/** Moves a cut that would split a surrogate pair back by one code unit. */
function cutIndex(text: string, end: number): number {
  const code = text.charCodeAt(end - 1);
  return code >= 0xd800 && code <= 0xdbff ? end - 1 : end;
}

export function buildSummaryRequest(
  entry: SummarizeInput,
  maxInputChars: number,
): {
  system: string;
  messages: Array<{ role: "user"; content: string }>;
  truncated: boolean;
} {
  const article = entry.body
    ? `Title: ${entry.title}\n\n${entry.body}`
    : `Title: ${entry.title}`;
  const { text, truncated } = truncateText(article, maxInputChars);

  return {
    system: SUMMARY_SYSTEM_PROMPT,
    messages: [{ role: "user", content: text }],
    truncated,
  };
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number") return status;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof APIConnectionError) return true;
  if (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  ) {
    return true;
  }
  const status = statusOf(error);
  return status !== undefined && status >= 500 && status < 600;
}

export function toSummarizeError(error: unknown): SummarizeError {
  if (error instanceof SummarizeError) return error;
  const status = statusOf(error);
  const prefix =
    status !== undefined
      ? `Summarizer request failed (${status})`
      : "Summarizer request failed";
  return new SummarizeError(`${prefix}: ${errorMessage(error)}`, {
    transient: isTransientError(error),
    status,
    cause: error,
  });
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// createSummarizer
// ---------------------------------------------------------------------------

export function createSummarizer(
  client: Anthropic,
  options: SummarizerOptions,
): Summarizer {
  const logger = options.logger ?? silentLogger;
  const sleep = options.sleep ?? defaultSleep;

  async function requestOnce(
    entry: SummarizeInput,
    request: ReturnType<typeof buildSummaryRequest>,
  ): Promise<Summary> {
    const start = performance.now();
    let response: Anthropic.Message;
    try {
      response = await client.messages.create({
        model: options.model,
        max_tokens: options.maxTokens,
        system: request.system,
        messages: request.messages,
      });
    } catch (err) {
      logExternalCall(
        logger,
        "anthropic",
        "messages.create",
        Math.round(performance.now() - start),
        errorMessage(err),
      );
      throw toSummarizeError(err);
    }
    logExternalCall(
      logger,
      "anthropic",
      "messages.create",
      Math.round(performance.now() - start),
    );

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();

    if (!text) {
      throw new SummarizeError("Summarizer returned no text", {
        transient: false,
      });
    }

    return {
      entryId: entry.id,
      text: truncateText(text, options.maxSummaryChars).text,
      model: response.model || options.model,
      truncatedInput: request.truncated,
    };
  }

  return {
    async summarize(entry) {
      const request = buildSummaryRequest(entry, options.maxInputChars);

      for (let attempt = 0; ; attempt++) {
        try {
          return await requestOnce(entry, request);
        } catch (err) {
          const error = toSummarizeError(err);
          if (!error.transient || attempt >= MAX_RETRIES) throw error;
          logger.debug("Transient summarizer failure, retrying", {
            entry: entry.id,
            delayMs: options.retryDelayMs,
            error: error.message,
          });
          await sleep(options.retryDelayMs);
        }
      }
    },
  };
}
