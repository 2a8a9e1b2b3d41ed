/**
 * Spectral authenticity classifier.
 *
 * Lossy encoders low-pass the signal before coding, so a lossless container
 * holding transcoded audio shows a shelf well below Nyquist. The PSD is
 * expressed relative to the 2-8 kHz passband, the highest frequency that still
 * carries content is located, and the sharpness of the drop decides the band.
 */

import type { VerdictThresholds } from "../config/types.js";
import { welch, type PowerSpectrum } from "./psd.js";
import type { AnalysisOptions, AuthenticityVerdict, VerdictKind } from "./types.js";

const PASSBAND_LOW_HZ = 2000;
const PASSBAND_HIGH_HZ = 8000;
/** Below this there is nothing a lossy low-pass would have removed */
const HIGH_BAND_HZ = 14000;
const MIN_HIGH_BINS = 10;
const MIN_SAMPLES = 256;
/** Bins that must all carry content for the cutoff to sit there */
const CONSECUTIVE_BINS = 3;
/** Width of the bands compared on each side of the cutoff */
const ROLLOFF_SPAN_HZ = 1000;
const DB_FLOOR = 1e-30;

const VERDICT_LABELS: Record<Exclude<VerdictKind, "AUTHENTIC" | "UNDETERMINED">, string> = {
  WARNING: "Possible transcode",
  SUSPICIOUS: "Likely transcode",
  FAKE: "Fake lossless",
};

function khz(hz: number): string {
  return `${(hz / 1000).toFixed(1)}kHz`;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** One-line summary shown to the user before the keep/discard decision */
export function verdictDisplay(verdict: VerdictKind, cutoffHz: number): string {
  if (verdict === "AUTHENTIC") return `Lossless OK (spectrum to ${khz(cutoffHz)})`;
  if (verdict === "UNDETERMINED") return "Could not verify";
  return `${VERDICT_LABELS[verdict]} (cutoff ${khz(cutoffHz)})`;
}

/** Verdict for audio that could not be analyzed */
export function undetermined(reason: string, sampleRate = 0): AuthenticityVerdict {
  return {
    verdict: "UNDETERMINED",
    cutoffHz: 0,
    nyquistHz: sampleRate / 2,
    sampleRate,
    rolloffDbPerKhz: 0,
    aboveCutoffDb: 0,
    rationale: reason,
    display: verdictDisplay("UNDETERMINED", 0),
  };
}

function rms(samples: Float32Array): number {
  let sum = 0;
  for (const s of samples) sum += s * s;
  return Math.sqrt(sum / samples.length);
}

/** Mean of `values` over bins whose frequency satisfies `inBand`, or undefined for an empty band */
function bandMean(
  values: Float64Array,
  freqs: Float64Array,
  inBand: (hz: number) => boolean
): number | undefined {
  let sum = 0;
  let count = 0;
  for (let k = 0; k < freqs.length; k++) {
    if (inBand(freqs[k])) {
      sum += values[k];
      count++;
    }
  }
  return count > 0 ? sum / count : undefined;
}

interface SpectralProfile {
  freqs: Float64Array;
  /** dB relative to the passband mean */
  relDb: Float64Array;
}

function profile(spectrum: PowerSpectrum): SpectralProfile {
  const { freqs, psd } = spectrum;
  const db = psd.map((p) => 10 * Math.log10(p + DB_FLOOR));
  const passband =
    bandMean(db, freqs, (hz) => hz >= PASSBAND_LOW_HZ && hz <= PASSBAND_HIGH_HZ) ??
    bandMean(db, freqs, () => true) ??
    0;
  return { freqs, relDb: db.map((v) => v - passband) };
}

/**
 * Scanning down from Nyquist, the first bin that starts a run of
 * CONSECUTIVE_BINS bins within `dropDb` of the passband.
 */
export function findCutoffHz(freqs: Float64Array, relDb: Float64Array, dropDb: number): number {
  const floor = -dropDb;
  for (let i = relDb.length - 1; i >= CONSECUTIVE_BINS - 1; i--) {
    let sustained = true;
    for (let j = 0; j < CONSECUTIVE_BINS; j++) {
      if (relDb[i - j] < floor) {
        sustained = false;
        break;
      }
    }
    if (sustained) return freqs[i];
  }
  return 0;
}

function classify(
  cutoffHz: number,
  nyquistHz: number,
  rolloff: number,
  aboveCutoffDb: number,
  t: VerdictThresholds
): { verdict: VerdictKind; rationale: string } {
  if (cutoffHz >= t.authenticRatio * nyquistHz) {
    return {
      verdict: "AUTHENTIC",
      rationale: `Content extends to ${khz(cutoffHz)}, close to the ${khz(nyquistHz)} Nyquist limit`,
    };
  }

  const shape = `${rolloff.toFixed(1)} dB/kHz roll-off, ${aboveCutoffDb.toFixed(1)} dB above the cutoff`;

  if (cutoffHz < t.lossyBandMaxKhz * 1000) {
    if (rolloff >= t.brickWallDbPerKhz && aboveCutoffDb <= t.brickWallFloorDb) {
      return {
        verdict: "FAKE",
        rationale: `Brick-wall cutoff at ${khz(cutoffHz)} with nothing above it (${shape}), typical of a lossy encoder's low-pass`,
      };
    }
    if (rolloff >= t.sharpRolloffDbPerKhz) {
      return {
        verdict: "SUSPICIOUS",
        rationale: `Sharp shelf at ${khz(cutoffHz)} in the band lossy encoders cut at (${shape})`,
      };
    }
  }

  return {
    verdict: "WARNING",
    rationale: `Spectrum ends early at ${khz(cutoffHz)} without a clear encoder shelf (${shape}); may be an older recording or a high-bitrate lossy source`,
  };
}

/**
 * Classify decoded mono PCM. Pure and deterministic.
 *
 * @throws Error if there are too few samples for a spectrum
 */
export function analyze(samples: Float32Array, sampleRate: number, options: AnalysisOptions): AuthenticityVerdict {
  const t = options.thresholds;
  const nyquistHz = sampleRate / 2;

  const result = (
    verdict: VerdictKind,
    cutoffHz: number,
    rationale: string,
    rolloff = 0,
    aboveCutoffDb = 0
  ): AuthenticityVerdict => ({
    verdict,
    cutoffHz: round2(cutoffHz),
    nyquistHz,
    sampleRate,
    rolloffDbPerKhz: round2(rolloff),
    aboveCutoffDb: round2(aboveCutoffDb),
    rationale,
    display: verdictDisplay(verdict, cutoffHz),
  });

  if (!(sampleRate > 0)) {
    throw new Error(`Invalid sample rate ${sampleRate}`);
  }

  if (samples.length === 0) {
    throw new Error("No samples to analyze");
  }
  if (samples.length < MIN_SAMPLES) {
    throw new Error(`Too few samples for spectral analysis (${samples.length}, need at least ${MIN_SAMPLES})`);
  }

  if (rms(samples) < t.silenceRms) {
    return result("AUTHENTIC", nyquistHz, "Excerpt is near-silent; no spectral evidence of lossy encoding");
  }

  const { freqs, relDb } = profile(welch(samples, sampleRate, options.segmentLength, options.overlap));

  const highBins = freqs.filter((hz) => hz >= HIGH_BAND_HZ).length;
  if (highBins < MIN_HIGH_BINS) {
    return result("AUTHENTIC", nyquistHz, `Sample rate ${sampleRate} Hz leaves no high band to inspect`);
  }

  const cutoffHz = findCutoffHz(freqs, relDb, t.cutoffDropDb);

  const below = bandMean(relDb, freqs, (hz) => hz >= cutoffHz - ROLLOFF_SPAN_HZ && hz < cutoffHz);
  const above = bandMean(relDb, freqs, (hz) => hz > cutoffHz && hz <= cutoffHz + ROLLOFF_SPAN_HZ);
  const rolloff = below !== undefined && above !== undefined ? (below - above) / (ROLLOFF_SPAN_HZ / 1000) : 0;
  const aboveCutoffDb = bandMean(relDb, freqs, (hz) => hz > cutoffHz) ?? 0;

  const { verdict, rationale } = classify(cutoffHz, nyquistHz, rolloff, aboveCutoffDb, t);
  return result(verdict, cutoffHz, rationale, rolloff, aboveCutoffDb);
}
