/**
 * Scoring engine for ranking filtered search results against a reference track.
 *
 * Four additive components, total capped at 100:
 *   duration    0-40  closeness of the declared length
 *   quality     0-25  bit depth / sample rate, CD standard preferred for library consistency
 *   reliability 0-20  free upload slot, upload speed, queue length
 *   filename    0-15  reference artist/title words present in the remote path
 */

import type { MatchingConfig, TieBreaker } from "../config/types.js";
import { acceptableToleranceSecs } from "../config/config.js";
import type { CandidateResult, TrackReference } from "../search/types.js";
import { remoteBasename } from "../search/candidate.js";
import type { FilteredCandidate, ScoreBreakdown, ScoredCandidate } from "./types.js";

const DURATION_MAX = 40;
const DURATION_AT_TOLERANCE = 30;
const DURATION_AT_ACCEPTABLE = 10;
/** Peers that do not declare a length get a neutral duration score */
const DURATION_UNKNOWN = 15;

const FILENAME_MAX = 15;

const FREE_SLOT_POINTS = 8;
const SPEED_POINTS_PER_MB = 0.7;
/** Speeds above this many MB/s earn no more points */
const SPEED_CAP_MB = 10;
const QUEUE_POINTS = 5;

export type ScoringOptions = Pick<
  MatchingConfig,
  "durationToleranceSecs" | "acceptableToleranceSecs" | "exclusionSecs"
>;

export type RankingOptions = ScoringOptions & Pick<MatchingConfig, "tieBreak" | "maxResults">;

/**
 * Piecewise-linear duration score: 40 at an exact match, 30 at the tight
 * tolerance, 10 at the acceptable tolerance, 0 at the exclusion bound.
 */
export function scoreDuration(deltaSecs: number | undefined, options: ScoringOptions): number {
  if (deltaSecs === undefined) return DURATION_UNKNOWN;

  const tight = options.durationToleranceSecs;
  const acceptable = acceptableToleranceSecs(options);
  const exclusion = options.exclusionSecs;

  if (deltaSecs <= tight) {
    return tight === 0
      ? DURATION_MAX
      : DURATION_MAX - (DURATION_MAX - DURATION_AT_TOLERANCE) * (deltaSecs / tight);
  }
  if (deltaSecs <= acceptable) {
    return (
      DURATION_AT_TOLERANCE -
      (DURATION_AT_TOLERANCE - DURATION_AT_ACCEPTABLE) * ((deltaSecs - tight) / (acceptable - tight))
    );
  }
  if (deltaSecs <= exclusion) {
    return DURATION_AT_ACCEPTABLE * (1 - (deltaSecs - acceptable) / (exclusion - acceptable));
  }
  return 0;
}

function bitDepthPoints(bitDepth: number | undefined): number {
  if (!bitDepth) return 2;
  if (bitDepth === 16) return 15;
  if (bitDepth === 24) return 12;
  return 5;
}

function sampleRatePoints(sampleRate: number | undefined): number {
  if (!sampleRate) return 1;
  if (sampleRate === 44100) return 10;
  if (sampleRate === 48000 || sampleRate === 88200 || sampleRate === 96000) return 7;
  return 3;
}

/**
 * Quality from the declared format. 16-bit/44.1kHz scores highest; hi-res
 * slightly lower; undeclared metadata lowest.
 */
export function scoreQuality(bitDepth: number | undefined, sampleRate: number | undefined): number {
  return bitDepthPoints(bitDepth) + sampleRatePoints(sampleRate);
}

/**
 * Free slot (8) + upload speed (up to 7 at 10 MB/s) + inverse queue length (5 for an empty queue).
 */
export function scoreReliability(
  candidate: Pick<CandidateResult, "hasFreeSlot" | "uploadSpeed" | "queueLength">
): number {
  const slot = candidate.hasFreeSlot ? FREE_SLOT_POINTS : 0;
  const speedMb = Math.max(0, candidate.uploadSpeed) / 1_000_000;
  const speed = Math.min(speedMb, SPEED_CAP_MB) * SPEED_POINTS_PER_MB;
  const queue = QUEUE_POINTS / (1 + Math.max(0, candidate.queueLength));
  return slot + speed + queue;
}

/** Unique lowercase letter/digit runs */
export function tokenize(text: string): string[] {
  return [...new Set(text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [])];
}

/**
 * Share of the reference's artist and title words found in the remote path, scaled to 15.
 */
export function scoreFilename(remotePath: string, reference: Pick<TrackReference, "artist" | "title">): number {
  const tokens = tokenize(`${reference.artist} ${reference.title}`);
  if (tokens.length === 0) return 0;

  const haystack = remotePath.toLowerCase();
  const found = tokens.filter((token) => haystack.includes(token)).length;
  return (found / tokens.length) * FILENAME_MAX;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Score one filtered candidate.
 */
export function scoreCandidate(
  filtered: FilteredCandidate,
  reference: TrackReference,
  options: ScoringOptions
): ScoreBreakdown {
  const { candidate } = filtered;
  const duration = round2(scoreDuration(filtered.durationDeltaSecs, options));
  const quality = round2(scoreQuality(candidate.bitDepth, candidate.sampleRate));
  const reliability = round2(scoreReliability(candidate));
  const filename = round2(scoreFilename(candidate.filename, reference));

  return {
    duration,
    quality,
    reliability,
    filename,
    total: Math.min(100, round2(duration + quality + reliability + filename)),
  };
}

type Unranked = Omit<ScoredCandidate, "rank">;

const TIE_BREAK_COMPARATORS: Record<TieBreaker, (a: Unranked, b: Unranked) => number> = {
  reliability: (a, b) => b.scores.reliability - a.scores.reliability,
  filenameLength: (a, b) =>
    remoteBasename(a.candidate.filename).length - remoteBasename(b.candidate.filename).length,
};

/**
 * Score, sort and number candidates.
 *
 * Sorted by total (highest first), then by the configured tie-breakers.
 * Files with the same name from several peers collapse into the best-scoring one.
 * At most `maxResults` entries are returned.
 */
export function rankCandidates(
  filtered: FilteredCandidate[],
  reference: TrackReference,
  options: RankingOptions
): ScoredCandidate[] {
  const scored: Unranked[] = filtered
    .filter((f) => f.durationDeltaSecs === undefined || f.durationDeltaSecs <= options.exclusionSecs)
    .map((f) => ({
      ...f,
      scores: scoreCandidate(f, reference, options),
    }));

  const tieBreakers = options.tieBreak.map((t) => TIE_BREAK_COMPARATORS[t]);
  scored.sort((a, b) => {
    const byTotal = b.scores.total - a.scores.total;
    if (byTotal !== 0) return byTotal;
    for (const compare of tieBreakers) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  });

  const seen = new Set<string>();
  const ranked: ScoredCandidate[] = [];
  for (const entry of scored) {
    if (ranked.length >= options.maxResults) break;
    const key = remoteBasename(entry.candidate.filename).toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    ranked.push({ ...entry, rank: ranked.length + 1 });
  }

  return ranked;
}
