import type { AnalysisConfig } from "../config/types.js";

/**
 * Authenticity classes, from genuinely lossless to certainly transcoded.
 * UNDETERMINED when the file could not be read or analyzed.
 */
export type VerdictKind = "AUTHENTIC" | "WARNING" | "SUSPICIOUS" | "FAKE" | "UNDETERMINED";

export interface AuthenticityVerdict {
  readonly verdict: VerdictKind;
  /** Estimated spectral cutoff; 0 when undetermined */
  readonly cutoffHz: number;
  readonly nyquistHz: number;
  readonly sampleRate: number;
  /** Level drop across the cutoff, dB per kHz */
  readonly rolloffDbPerKhz: number;
  /** Mean level from the cutoff to Nyquist, dB relative to the 2-8 kHz passband */
  readonly aboveCutoffDb: number;
  readonly rationale: string;
  /** One-line summary, e.g. "Lossless OK (spectrum to 22.0kHz)" */
  readonly display: string;
}

/** Mono PCM in [-1, 1] */
export interface DecodedAudio {
  samples: Float32Array;
  sampleRate: number;
  /** Container bit depth, when known */
  bitDepth?: number;
  /** Full track length, when known */
  durationSecs?: number;
}

export type AnalysisOptions = Pick<AnalysisConfig, "segmentLength" | "overlap" | "thresholds">;

/** Worker request */
export interface AnalysisJob {
  id: number;
  samples: Float32Array;
  sampleRate: number;
  options: AnalysisOptions;
}

/** Worker reply */
export type AnalysisReply =
  | { id: number; ok: true; verdict: AuthenticityVerdict }
  | { id: number; ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isAnalysisJob(value: unknown): value is AnalysisJob {
  return (
    isRecord(value) &&
    typeof value.id === "number" &&
    value.samples instanceof Float32Array &&
    typeof value.sampleRate === "number" &&
    isRecord(value.options)
  );
}

export function isAnalysisReply(value: unknown): value is AnalysisReply {
  if (!isRecord(value) || typeof value.id !== "number") return false;
  return value.ok === true ? isRecord(value.verdict) : value.ok === false && typeof value.error === "string";
}
