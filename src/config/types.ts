/** Connection to the slskd daemon */
export interface SlskdConfig {
  /** Base URL, e.g. http://localhost:5030 */
  url: string;
  apiKey: string;
  /** Directory slskd writes completed downloads into (<dir>/<username>/...) */
  downloadDir: string;
  /** Deadline for every HTTP call to slskd */
  requestTimeoutMs: number;
}

export interface SearchConfig {
  /** Overall deadline for one search request, shared across tiers */
  timeoutSecs: number;
  pollIntervalMs: number;
  /** A search whose file count has not changed for this long is treated as complete */
  stableAfterMs: number;
}

/** Secondary ordering for candidates with equal totals, applied in list order */
export type TieBreaker = "reliability" | "filenameLength";

export interface MatchingConfig {
  /** Delta at or below which a duration is a perfect match */
  durationToleranceSecs: number;
  /** Delta at or below which a duration is acceptable. Defaults to twice the tolerance. */
  acceptableToleranceSecs?: number;
  /** Delta beyond which a candidate is dropped outright */
  exclusionSecs: number;
  excludeKeywords: string[];
  preferredExtension: string;
  /** Used in order when no preferred-extension candidate passes */
  fallbackExtensions: string[];
  /** Number of ranked candidates shown to the caller */
  maxResults: number;
  tieBreak: TieBreaker[];
}

/** Heuristic bounds separating the verdict bands */
export interface VerdictThresholds {
  /** dB below the 2-8 kHz passband that counts as "no content" */
  cutoffDropDb: number;
  /** Cutoff at or above this fraction of Nyquist is authentic */
  authenticRatio: number;
  /** Shelves below this frequency sit in the band lossy encoders cut at */
  lossyBandMaxKhz: number;
  sharpRolloffDbPerKhz: number;
  brickWallDbPerKhz: number;
  /** Mean level above the cutoff at or below which the band counts as empty */
  brickWallFloorDb: number;
  /** RMS below which an excerpt is treated as silence */
  silenceRms: number;
}

export interface AnalysisConfig {
  /** Welch segment length in samples (rounded down to a power of two) */
  segmentLength: number;
  /** Fraction of each segment shared with the next, 0 <= overlap < 1 */
  overlap: number;
  /** Seconds of audio decoded for analysis, starting a third into the file */
  sampleSecs: number;
  /** Worker threads for PSD computation; 0 analyzes on the calling thread */
  workers: number;
  thresholds: VerdictThresholds;
}

export interface DownloadConfig {
  timeoutSecs: number;
  pollIntervalMs: number;
}

export interface LoggingConfig {
  debug: boolean;
}

/** Top-level config file schema */
export interface Config {
  slskd: SlskdConfig;
  search: SearchConfig;
  matching: MatchingConfig;
  analysis: AnalysisConfig;
  download: DownloadConfig;
  logging: LoggingConfig;
}

/** Config file contents: every section optional, every field within a section optional */
export type PartialConfig = {
  [K in Exclude<keyof Config, "analysis">]?: Partial<Config[K]>;
} & {
  analysis?: Partial<Omit<AnalysisConfig, "thresholds">> & {
    thresholds?: Partial<VerdictThresholds>;
  };
};
