// =============================================================================
// @rss-courier/worker — Notes archive
// =============================================================================
// Writes each summary to a text file named after the article title, so the
// summaries outlive the DM thread.
// =============================================================================

import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Entry, Summary } from "@rss-courier/shared";

const MAX_NAME_CHARS = 50;
const SAFE_CHAR = /[\p{L}\p{N}\-_ ()[\]]/u;

/** Title reduced to letters, digits, and `-_ ()[]`, capped at 50 chars. */
export function noteFileName(entry: Pick<Entry, "id" | "title">): string {
  const safe = Array.from(entry.title)
    .filter((c) => SAFE_CHAR.test(c))
    .join("")
    .trim()
    .slice(0, MAX_NAME_CHARS)
    .trim();

  if (safe) return `${safe}.txt`;

  const digest = crypto.createHash("sha256").update(entry.id).digest("hex");
  return `entry-${digest.slice(0, 16)}.txt`;
}

export function formatNote(entry: Entry, summary: Summary): string {
  return [
    `Title: ${entry.title}`,
    `URL: ${entry.link ?? ""}`,
    "",
    "AI Summary:",
    summary.text,
    "",
  ].join("\n");
}

/** Writes (or overwrites) the note and returns its path. */
export async function writeNote(
  dir: string,
  entry: Entry,
  summary: Summary,
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const file = path.join(dir, noteFileName(entry));
  await fs.writeFile(file, formatNote(entry, summary), "utf-8");
  return file;
}
