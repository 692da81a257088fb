// =============================================================================
// @rss-courier/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables (optionally seeded from a
// .env file) into a single typed Config. Every missing or invalid variable is
// reported at once through ConfigError. Discord settings are only required
// when deliveries will actually be made.
// =============================================================================

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { FeedSource } from "./types.js";

// ---------------------------------------------------------------------------
// Feed source parsing
// ---------------------------------------------------------------------------

const feedUrlSchema = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), "must be an http(s) URL");

/**
 * Parses feed source lines. Each item is either a bare URL or
 * `Display Name|https://...`. Blank items and `#` comments are ignored.
 */
export function parseFeedSources(
  text: string,
  separator: RegExp = /[\n,]/,
): { sources: FeedSource[]; errors: string[] } {
  const sources: FeedSource[] = [];
  const errors: string[] = [];
  const seen = new Set<string>();

  for (const raw of text.split(separator)) {
    const item = raw.trim();
    if (!item || item.startsWith("#")) continue;

    const pipe = item.indexOf("|");
    const name = pipe >= 0 ? item.slice(0, pipe).trim() : undefined;
    const url = (pipe >= 0 ? item.slice(pipe + 1) : item).trim();

    const parsed = feedUrlSchema.safeParse(url);
    if (!parsed.success) {
      errors.push(`"${url}" is not a valid feed URL`);
      continue;
    }
    if (seen.has(url)) continue;
    seen.add(url);
    sources.push(name ? { url, name } : { url });
  }

  return { sources, errors };
}

/** Splits an interest list on commas and whitespace, lowercased and deduped. */
export function parseKeywords(text: string): string[] {
  const words = text
    .split(/[\s,]+/)
    .map((w) => w.trim().toLowerCase())
    .filter((w) => w.length > 0);
  return [...new Set(words)];
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

const envSchema = z.object({
  // Feeds (at least one source overall, checked after parsing)
  FEED_URLS: optionalString,
  FEED_SOURCES_FILE: optionalString,

  // Summarizer
  SUMMARIZER_API_KEY: z
    .string({ required_error: "SUMMARIZER_API_KEY is required" })
    .min(1, "SUMMARIZER_API_KEY is required"),
  SUMMARIZER_BASE_URL: z.string().url().default("https://api.anthropic.com"),
  SUMMARIZER_MODEL: z.string().min(1).default("claude-3-5-haiku-latest"),
  SUMMARIZER_MAX_TOKENS: z.coerce.number().int().min(16).max(4096).default(300),
  SUMMARIZER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  MAX_INPUT_CHARS: z.coerce.number().int().min(200).default(8000),
  MAX_SUMMARY_CHARS: z.coerce.number().int().min(50).max(1900).default(1200),

  // Discord (required unless dry run)
  DISCORD_BOT_TOKEN: optionalString,
  DISCORD_USER_ID: optionalString.refine(
    (v) => v === undefined || /^\d{17,20}$/.test(v),
    "DISCORD_USER_ID must be a numeric Discord user ID",
  ),

  // Storage & runtime
  SEEN_STORE_PATH: z.string().min(1).default("./data/seen.json"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).default(20_000),
  FEED_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(1),
  MAX_ENTRIES_PER_FEED: z.coerce.number().int().min(0).default(0),
  NOTES_DIR: optionalString,
  INTEREST_KEYWORDS: optionalString,
  INTERESTS_FILE: optionalString,
  CRON_SCHEDULE: z.string().min(1).default("*/15 * * * *"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
});

type Env = z.infer<typeof envSchema>;

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export interface Config {
  feeds: FeedSource[];
  summarizer: {
    apiKey: string;
    baseUrl: string;
    model: string;
    maxTokens: number;
    retryDelayMs: number;
    maxInputChars: number;
    maxSummaryChars: number;
  };
  /** Absent only in dry-run mode */
  discord?: {
    token: string;
    userId: string;
  };
  seenStorePath: string;
  requestTimeoutMs: number;
  feedConcurrency: number;
  /** 0 = no cap */
  maxEntriesPerFeed: number;
  notesDir?: string;
  interestKeywords: string[];
  cronSchedule: string;
  logLevel: Env["LOG_LEVEL"];
}

export interface LoadConfigOptions {
  /** Relax the Discord requirements; nothing will be delivered. */
  dryRun?: boolean;
  /** Base for relative file settings. Defaults to process.cwd(). */
  cwd?: string;
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

function formatIssue(issue: z.ZodIssue): string {
  const field = issue.path.join(".");
  if (issue.message.startsWith(field)) return issue.message;
  return field ? `${field}: ${issue.message}` : issue.message;
}

function readSettingFile(
  setting: string,
  file: string,
  cwd: string,
  issues: string[],
): string | undefined {
  try {
    return fs.readFileSync(path.resolve(cwd, file), "utf-8");
  } catch (err) {
    const code =
      err instanceof Error && "code" in err ? String(err.code) : "unknown";
    issues.push(`${setting}: cannot read "${file}" (${code})`);
    return undefined;
  }
}

/**
 * Load and validate configuration from environment variables.
 *
 * Throws ConfigError listing every problem found, so a misconfigured
 * deployment can be fixed in one pass.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadConfigOptions = {},
): Config {
  const cwd = options.cwd ?? process.cwd();
  const issues: string[] = [];

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    issues.push(...parsed.error.issues.map(formatIssue));
  }

  // Feed sources and interests are checked even when other fields failed,
  // so the error lists everything.
  const feeds: FeedSource[] = [];
  const feedText = [
    env.FEED_URLS ?? "",
    env.FEED_SOURCES_FILE?.trim()
      ? readSettingFile("FEED_SOURCES_FILE", env.FEED_SOURCES_FILE.trim(), cwd, issues) ?? ""
      : "",
  ].join("\n");
  const { sources, errors } = parseFeedSources(feedText);
  feeds.push(...sources);
  issues.push(...errors.map((e) => `FEED_URLS: ${e}`));
  if (feeds.length === 0 && errors.length === 0) {
    issues.push("FEED_URLS or FEED_SOURCES_FILE must name at least one feed");
  }

  let interestText = env.INTEREST_KEYWORDS ?? "";
  if (env.INTERESTS_FILE?.trim()) {
    interestText +=
      "\n" +
      (readSettingFile("INTERESTS_FILE", env.INTERESTS_FILE.trim(), cwd, issues) ?? "");
  }

  if (!options.dryRun) {
    if (!env.DISCORD_BOT_TOKEN?.trim()) {
      issues.push("DISCORD_BOT_TOKEN is required");
    }
    if (!env.DISCORD_USER_ID?.trim()) {
      issues.push("DISCORD_USER_ID is required");
    }
  }

  if (!parsed.success || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const e = parsed.data;
  return {
    feeds,
    summarizer: {
      apiKey: e.SUMMARIZER_API_KEY,
      baseUrl: e.SUMMARIZER_BASE_URL,
      model: e.SUMMARIZER_MODEL,
      maxTokens: e.SUMMARIZER_MAX_TOKENS,
      retryDelayMs: e.SUMMARIZER_RETRY_DELAY_MS,
      maxInputChars: e.MAX_INPUT_CHARS,
      maxSummaryChars: e.MAX_SUMMARY_CHARS,
    },
    discord:
      e.DISCORD_BOT_TOKEN && e.DISCORD_USER_ID
        ? { token: e.DISCORD_BOT_TOKEN, userId: e.DISCORD_USER_ID }
        : undefined,
    seenStorePath: path.resolve(cwd, e.SEEN_STORE_PATH),
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    feedConcurrency: e.FEED_CONCURRENCY,
    maxEntriesPerFeed: e.MAX_ENTRIES_PER_FEED,
    notesDir: e.NOTES_DIR ? path.resolve(cwd, e.NOTES_DIR) : undefined,
    interestKeywords: parseKeywords(interestText),
    cronSchedule: e.CRON_SCHEDULE,
    logLevel: e.LOG_LEVEL,
  };
}

/**
 * Reads a dotenv file into a copy of `base`. Variables already present in
 * `base` win, matching dotenv's default precedence. A missing default `.env`
 * is fine; a missing explicit file is a ConfigError.
 */
export function loadEnvFile(
  file: string | undefined,
  base: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): Record<string, string | undefined> {
  const target = path.resolve(cwd, file ?? ".env");
  let contents: string;
  try {
    contents = fs.readFileSync(target, "utf-8");
  } catch {
    if (file === undefined) return { ...base };
    throw new ConfigError([`--config: cannot read "${file}"`]);
  }
  return { ...dotenv.parse(contents), ...base };
}
