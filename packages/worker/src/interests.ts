import type { Entry, Summary } from "@rss-courier/shared";

/**
 * True when no keywords are configured, or when any keyword occurs
 * (case-insensitive substring) in the entry title or its summary.
 * Keywords are expected lowercased, as produced by parseKeywords().
 */
export function matchesInterests(
  entry: Pick<Entry, "title">,
  summary: Pick<Summary, "text">,
  keywords: readonly string[],
): boolean {
  if (keywords.length === 0) return true;
  const haystack = `${entry.title} ${summary.text}`.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword));
}
