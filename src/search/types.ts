/**
 * Types shared by the search orchestrator, its providers and the matching stage.
 */

/** Trusted reference for one request, supplied by the metadata collaborator */
export interface TrackReference {
  readonly artist: string;
  readonly title: string;
  readonly album?: string;
  readonly durationSecs: number;
  /** Release year, e.g. "1984" */
  readonly year?: string;
}

/** Query strategies, from most to least specific */
export type SearchTier = "FULL" | "TITLE_ONLY" | "KEYWORD_REDUCED";

/** One query to submit, tagged with the tier that produced it */
export interface TierQuery {
  tier: SearchTier;
  query: string;
  /**
   * Words a result's path should contain, checked locally. Results without
   * any of them are only considered when none has one.
   */
  requiredKeywords?: string[];
}

/** A single file offered by a peer */
export interface CandidateResult {
  readonly username: string;
  /** Full remote path as the peer shares it, e.g. "Music\\Artist\\01 - Song.flac" */
  readonly filename: string;
  readonly size: number;
  readonly extension: string;
  readonly bitRate?: number;
  readonly bitDepth?: number;
  readonly sampleRate?: number;
  readonly durationSecs?: number;
  readonly hasFreeSlot: boolean;
  /** Bytes per second */
  readonly uploadSpeed: number;
  readonly queueLength: number;
}

/** Provider-reported progress for a running search */
export interface ProviderStatus {
  isComplete: boolean;
  fileCount: number;
  responseCount: number;
  /** Raw state tag, e.g. "InProgress" or "Completed, TimedOut" */
  state: string;
}

/**
 * Lifecycle of one provider session. Transitions only move forward:
 * INIT -> SUBMITTED -> POLLING -> COMPLETED | TIMED_OUT -> STOPPED -> COLLECTED -> CLEANED_UP
 */
export type SessionState =
  | "INIT"
  | "SUBMITTED"
  | "POLLING"
  | "COMPLETED"
  | "TIMED_OUT"
  | "STOPPED"
  | "COLLECTED"
  | "CLEANED_UP";
