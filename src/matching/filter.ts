/**
 * Gates raw search results before scoring: extension, exclude keywords, duration.
 */

import type { MatchingConfig } from "../config/types.js";
import { acceptableToleranceSecs } from "../config/config.js";
import type { CandidateResult, TrackReference } from "../search/types.js";
import { remoteBasename } from "../search/candidate.js";
import { logger } from "../utils/logger.js";
import type { DurationMatch, FilterOutcome, FilteredCandidate } from "./types.js";

export type FilterOptions = Pick<
  MatchingConfig,
  | "durationToleranceSecs"
  | "acceptableToleranceSecs"
  | "exclusionSecs"
  | "excludeKeywords"
  | "preferredExtension"
  | "fallbackExtensions"
>;

/**
 * Classify a candidate's length against the reference.
 *
 * @returns The class and delta, or null when the delta is beyond the exclusion bound
 */
export function classifyDuration(
  candidateSecs: number | undefined,
  referenceSecs: number,
  options: Pick<MatchingConfig, "durationToleranceSecs" | "acceptableToleranceSecs" | "exclusionSecs">
): { match: DurationMatch; deltaSecs: number | undefined } | null {
  if (candidateSecs === undefined || candidateSecs <= 0) {
    return { match: "unknown", deltaSecs: undefined };
  }

  const deltaSecs = Math.abs(candidateSecs - referenceSecs);
  if (deltaSecs > options.exclusionSecs) return null;
  if (deltaSecs <= options.durationToleranceSecs) return { match: "perfect", deltaSecs };
  if (deltaSecs <= acceptableToleranceSecs(options)) return { match: "acceptable", deltaSecs };
  return { match: "marginal", deltaSecs };
}

/**
 * First exclude keyword found in the file name, unless the reference title
 * carries the same keyword (a song called "Live Wire" may say "live").
 */
export function findExcludedKeyword(
  basename: string,
  referenceTitle: string,
  keywords: string[]
): string | undefined {
  const name = basename.toLowerCase();
  const title = referenceTitle.toLowerCase();
  return keywords.find((kw) => name.includes(kw) && !title.includes(kw));
}

function gate(
  candidate: CandidateResult,
  reference: TrackReference,
  options: FilterOptions
): FilteredCandidate | null {
  const basename = remoteBasename(candidate.filename);

  const keyword = findExcludedKeyword(basename, reference.title, options.excludeKeywords);
  if (keyword !== undefined) {
    logger.debug(`Excluded (keyword '${keyword}'): ${basename}`);
    return null;
  }

  const duration = classifyDuration(candidate.durationSecs, reference.durationSecs, options);
  if (duration === null) {
    logger.debug(`Excluded (duration ${candidate.durationSecs}s vs ${reference.durationSecs}s): ${basename}`);
    return null;
  }

  return { candidate, durationDeltaSecs: duration.deltaSecs, durationMatch: duration.match };
}

function passingWithExtension(
  candidates: CandidateResult[],
  extension: string,
  reference: TrackReference,
  options: FilterOptions
): FilteredCandidate[] {
  const passing: FilteredCandidate[] = [];
  for (const candidate of candidates) {
    if (candidate.extension !== extension) continue;
    const kept = gate(candidate, reference, options);
    if (kept) passing.push(kept);
  }
  return passing;
}

/**
 * Keep the candidates worth scoring.
 *
 * Candidates in the preferred format win if any pass the keyword and duration
 * gates. Otherwise every passing candidate in a fallback format is kept,
 * grouped by the formats' priority order.
 */
export function filterCandidates(
  candidates: CandidateResult[],
  reference: TrackReference,
  options: FilterOptions
): FilterOutcome {
  const preferred = passingWithExtension(candidates, options.preferredExtension, reference, options);
  if (preferred.length > 0) {
    logger.debug(`${preferred.length} of ${candidates.length} results passed filtering`);
    return { candidates: preferred, usedFallbackFormat: false, extensions: [options.preferredExtension] };
  }

  const fallback: FilteredCandidate[] = [];
  const extensions: string[] = [];
  for (const extension of options.fallbackExtensions) {
    if (extension === options.preferredExtension || extensions.includes(extension)) continue;
    const passing = passingWithExtension(candidates, extension, reference, options);
    if (passing.length === 0) continue;
    fallback.push(...passing);
    extensions.push(extension);
  }

  if (fallback.length === 0) {
    return { candidates: [], usedFallbackFormat: false, extensions: [] };
  }

  logger.info(
    `No ${options.preferredExtension.toUpperCase()} results passed filtering, falling back to ${fallback.length} ${extensions.map((e) => e.toUpperCase()).join("/")} result(s)`
  );
  return { candidates: fallback, usedFallbackFormat: true, extensions };
}
