/**
 * Build the query for each search tier from a track reference.
 * Pure functions, no provider interaction.
 */

import type { TierQuery, TrackReference } from "./types.js";

const VERSION_WORDS =
  "Mono|Stereo|Remaster(?:ed)?(?:\\s+\\d{4})?|Deluxe(?:\\s+Edition)?" +
  "|Ultimate\\s+Mix|Single\\s+Version|Album\\s+Version" +
  "|Radio\\s+Edit|Bonus\\s+Track|Anniversary(?:\\s+Edition)?" +
  "|Super\\s+Deluxe|Special\\s+Edition|\\d{4}\\s+Mix";

// Trailing " - Remastered 2009", " - Mono", ...
const VERSION_SUFFIX_RE = new RegExp(`\\s*[-–]\\s*(?:${VERSION_WORDS}).*$`, "i");

// The same labels in parentheses: "(Remastered 2009)", "(Mono)"
const VERSION_PAREN_RE = new RegExp(`\\s*\\((?:${VERSION_WORDS})\\)`, "gi");

const NOISE_WORDS = new Set([
  "single", "version", "long", "short", "full", "edit", "mix",
  "remastered", "remaster", "deluxe", "edition", "bonus", "track",
  "album", "mono", "stereo", "original", "extended",
  "feat", "featuring", "ft", "the", "an", "and", "or", "of",
  "in", "on", "at", "to", "for", "with", "from", "by",
]);

/**
 * Fold typographic characters peers never have in file names to ASCII
 * and collapse whitespace.
 */
export function normalizeQueryText(text: string): string {
  return text
    .replace(/…/g, "")
    .replace(/[‘’′`]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[\\/]/g, " ")
    .replace(/[–—]/g, "-")
    .replace(/×/g, "x")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Strip catalog version labels that add useless keywords to a search.
 * "Help! - Remastered 2009" -> "Help!"
 */
export function cleanSearchTitle(title: string): string {
  const cleaned = normalizeQueryText(
    title.replace(VERSION_SUFFIX_RE, "").replace(VERSION_PAREN_RE, "")
  );
  return cleaned.length > 0 ? cleaned : normalizeQueryText(title);
}

/**
 * Drop one word at a time and append the release year.
 * Peers and servers block some exact phrases; the variants often get through
 * while the year keeps results narrow.
 *
 * @returns One query per word, or none when there is no year or fewer than two words
 */
export function buildReducedQueries(title: string, year: string | undefined): string[] {
  if (!year) return [];
  const words = title.split(/\s+/).filter((w) => w.length > 0);
  if (words.length < 2) return [];

  return words.map((_, i) => [...words.slice(0, i), ...words.slice(i + 1), year].join(" "));
}

/**
 * Distinctive Latin keywords from a possibly mixed-script title.
 * "紅 - KURENAI - シングル - Single Long Version" -> ["KURENAI"]
 */
export function extractLatinKeywords(title: string): string[] {
  const words = title.match(/[a-zA-Z]{2,}/g) ?? [];
  return words.filter((w) => !NOISE_WORDS.has(w.toLowerCase()));
}

/**
 * Ordered queries for every tier. FULL and TITLE_ONLY carry one query each.
 * KEYWORD_REDUCED carries the word-dropped variants, then the artist alone,
 * with the title's Latin keywords narrowing that catalog locally.
 */
export function buildTierQueries(reference: TrackReference): TierQuery[] {
  const title = cleanSearchTitle(reference.title);
  const artist = normalizeQueryText(reference.artist);

  const queries: TierQuery[] = [
    { tier: "FULL", query: `${artist} ${title}`.trim() },
    { tier: "TITLE_ONLY", query: title },
    ...buildReducedQueries(title, reference.year).map((query): TierQuery => ({ tier: "KEYWORD_REDUCED", query })),
  ];

  const keywords = extractLatinKeywords(title);
  queries.push(
    keywords.length > 0
      ? { tier: "KEYWORD_REDUCED", query: artist, requiredKeywords: keywords }
      : { tier: "KEYWORD_REDUCED", query: artist }
  );

  // Drop empty and repeated queries
  const seen = new Set<string>();
  return queries.filter(({ query }) => {
    const key = query.toLowerCase();
    if (query.length === 0 || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
