import type { CandidateResult } from "../search/types.js";

/**
 * How close a candidate's declared length is to the reference.
 * "unknown" when the peer did not declare a length.
 */
export type DurationMatch = "perfect" | "acceptable" | "marginal" | "unknown";

/** A candidate that passed every filter gate */
export interface FilteredCandidate {
  readonly candidate: CandidateResult;
  readonly durationDeltaSecs: number | undefined;
  readonly durationMatch: DurationMatch;
}

export interface FilterOutcome {
  candidates: FilteredCandidate[];
  /** The kept candidates are not in the preferred format */
  usedFallbackFormat: boolean;
  /** Formats of the kept candidates, in priority order */
  extensions: string[];
}

export interface ScoreBreakdown {
  /** 0-40 */
  readonly duration: number;
  /** 0-25 */
  readonly quality: number;
  /** 0-20 */
  readonly reliability: number;
  /** 0-15 */
  readonly filename: number;
  /** Sum of the above, capped at 100 */
  readonly total: number;
}

export interface ScoredCandidate extends FilteredCandidate {
  readonly scores: ScoreBreakdown;
  /** 1-based position in the ranked list */
  readonly rank: number;
}
