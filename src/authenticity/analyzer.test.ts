import { describe, it, expect } from "vitest";
import { analyze, findCutoffHz, undetermined, verdictDisplay } from "./analyzer.js";
import { fft } from "./psd.js";
import { defaultConfig } from "../config/defaults.js";

const SAMPLE_RATE = 44100;
const LENGTH = 1 << 17;
const options = defaultConfig.analysis;

function whiteNoise(length: number, seed: number): Float64Array {
  let state = seed;
  return Float64Array.from({ length }, () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 4294967296 - 0.5;
  });
}

/**
 * White noise with its spectrum shaped by `gainDb(hz)`, applied in the
 * frequency domain over the whole signal.
 */
function shapedNoise(gainDb: (hz: number) => number, seed = 1): Float32Array {
  const re = whiteNoise(LENGTH, seed);
  const im = new Float64Array(LENGTH);
  fft(re, im);

  for (let k = 0; k < LENGTH; k++) {
    const hz = (Math.min(k, LENGTH - k) * SAMPLE_RATE) / LENGTH;
    const gain = Math.pow(10, gainDb(hz) / 20);
    re[k] *= gain;
    im[k] *= -gain;
  }

  // Inverse transform by conjugation
  fft(re, im);
  return Float32Array.from(re, (v) => v / LENGTH);
}

describe("analyze", () => {
  it("passes full-band content", () => {
    const result = analyze(shapedNoise(() => 0), SAMPLE_RATE, options);

    expect(result.verdict).toBe("AUTHENTIC");
    expect(result.cutoffHz).toBeGreaterThanOrEqual(0.92 * 22050);
    expect(result.nyquistHz).toBe(22050);
    expect(result.sampleRate).toBe(SAMPLE_RATE);
  });

  it("flags a brick-wall low-pass at 16 kHz as fake", () => {
    const result = analyze(shapedNoise((hz) => (hz <= 16000 ? 0 : -Infinity)), SAMPLE_RATE, options);

    expect(result.verdict).toBe("FAKE");
    expect(result.cutoffHz).toBeGreaterThanOrEqual(15950);
    expect(result.cutoffHz).toBeLessThanOrEqual(16050);
    expect(result.rolloffDbPerKhz).toBeGreaterThanOrEqual(48);
    expect(result.aboveCutoffDb).toBeLessThanOrEqual(-60);
    expect(result.display).toBe("Fake lossless (cutoff 16.0kHz)");
    expect(result.rationale).toMatch(/^Brick-wall cutoff at 16\.0kHz/);
  });

  it("rates a steep shelf over a noise floor as suspicious", () => {
    const slope = (hz: number): number => (hz <= 16000 ? 0 : Math.max(-45, (-60 * (hz - 16000)) / 1000));

    const result = analyze(shapedNoise(slope), SAMPLE_RATE, options);

    expect(result.verdict).toBe("SUSPICIOUS");
    expect(result.cutoffHz).toBeGreaterThanOrEqual(16350);
    expect(result.cutoffHz).toBeLessThanOrEqual(16650);
    expect(result.rolloffDbPerKhz).toBeGreaterThan(30);
    expect(result.rolloffDbPerKhz).toBeLessThan(42);
  });

  it("only warns about a gradual high-frequency decline", () => {
    const decline = (hz: number): number => (hz <= 15000 ? 0 : (-8 * (hz - 15000)) / 1000);

    const result = analyze(shapedNoise(decline), SAMPLE_RATE, options);

    expect(result.verdict).toBe("WARNING");
    expect(result.cutoffHz).toBeGreaterThanOrEqual(18500);
    expect(result.cutoffHz).toBeLessThanOrEqual(19100);
    expect(result.rolloffDbPerKhz).toBeLessThan(24);
  });

  it("treats silence as authentic", () => {
    const result = analyze(new Float32Array(LENGTH), SAMPLE_RATE, options);

    expect(result.verdict).toBe("AUTHENTIC");
    expect(result.cutoffHz).toBe(22050);
    expect(result.rationale).toBe("Excerpt is near-silent; no spectral evidence of lossy encoding");
  });

  it("has nothing to inspect at low sample rates", () => {
    const samples = Float32Array.from(whiteNoise(1 << 15, 3));

    const result = analyze(samples, 22050, options);

    expect(result.verdict).toBe("AUTHENTIC");
    expect(result.rationale).toBe("Sample rate 22050 Hz leaves no high band to inspect");
  });

  it("is deterministic", () => {
    const samples = shapedNoise((hz) => (hz <= 17000 ? 0 : -Infinity), 9);

    expect(analyze(samples, SAMPLE_RATE, options)).toEqual(analyze(samples, SAMPLE_RATE, options));
  });

  it("rejects a non-positive sample rate", () => {
    expect(() => analyze(new Float32Array(16), 0, options)).toThrow("Invalid sample rate 0");
  });

  it("refuses an empty excerpt", () => {
    expect(() => analyze(new Float32Array(0), SAMPLE_RATE, options)).toThrow("No samples to analyze");
  });

  it("refuses an excerpt too short to resolve the high band", () => {
    expect(() => analyze(new Float32Array(32).fill(0.5), SAMPLE_RATE, options)).toThrow(
      "Too few samples for spectral analysis (32, need at least 256)"
    );
  });
});

describe("findCutoffHz", () => {
  const freqs = Float64Array.from([0, 1, 2, 3, 4, 5]);

  it("returns the top of the highest sustained run", () => {
    expect(findCutoffHz(freqs, Float64Array.from([0, 0, 0, -40, 0, -40]), 30)).toBe(2);
  });

  it("ignores isolated bins", () => {
    expect(findCutoffHz(freqs, Float64Array.from([0, 0, 0, 0, -40, -10]), 30)).toBe(3);
  });

  it("returns 0 when nothing is sustained", () => {
    expect(findCutoffHz(freqs, Float64Array.from([-50, -50, -50, -50, -50, -50]), 30)).toBe(0);
  });
});

describe("verdictDisplay", () => {
  it.each([
    ["AUTHENTIC", 21000, "Lossless OK (spectrum to 21.0kHz)"],
    ["WARNING", 18700, "Possible transcode (cutoff 18.7kHz)"],
    ["SUSPICIOUS", 16500, "Likely transcode (cutoff 16.5kHz)"],
    ["FAKE", 16000, "Fake lossless (cutoff 16.0kHz)"],
    ["UNDETERMINED", 0, "Could not verify"],
  ] as const)("%s", (verdict, cutoffHz, expected) => {
    expect(verdictDisplay(verdict, cutoffHz)).toBe(expected);
  });
});

describe("undetermined", () => {
  it("carries the reason and sample rate", () => {
    expect(undetermined("Could not decode audio: bad header", 48000)).toEqual({
      verdict: "UNDETERMINED",
      cutoffHz: 0,
      nyquistHz: 24000,
      sampleRate: 48000,
      rolloffDbPerKhz: 0,
      aboveCutoffDb: 0,
      rationale: "Could not decode audio: bad header",
      display: "Could not verify",
    });
  });
});
