/**
 * Power spectral density estimation with Welch's averaged-periodogram method.
 */

export interface PowerSpectrum {
  /** Bin centre frequencies, 0 to Nyquist inclusive */
  freqs: Float64Array;
  /** One-sided density, power per Hz */
  psd: Float64Array;
  /** Number of periodograms averaged */
  segments: number;
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/** Largest power of two <= n (1 for n < 2) */
export function floorPowerOfTwo(n: number): number {
  let p = 1;
  while (p * 2 <= n) p *= 2;
  return p;
}

/**
 * In-place iterative radix-2 FFT.
 * @throws Error if the length is not a power of two
 */
export function fft(re: Float64Array, im: Float64Array): void {
  const n = re.length;
  if (!isPowerOfTwo(n) || im.length !== n) {
    throw new Error(`FFT length must be a power of two (got ${n})`);
  }

  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
      [im[i], im[j]] = [im[j], im[i]];
    }
  }

  for (let len = 2; len <= n; len <<= 1) {
    const angle = (-2 * Math.PI) / len;
    const wRe = Math.cos(angle);
    const wIm = Math.sin(angle);
    const half = len >> 1;
    for (let start = 0; start < n; start += len) {
      let curRe = 1;
      let curIm = 0;
      for (let k = 0; k < half; k++) {
        const a = start + k;
        const b = a + half;
        const tRe = re[b] * curRe - im[b] * curIm;
        const tIm = re[b] * curIm + im[b] * curRe;
        re[b] = re[a] - tRe;
        im[b] = im[a] - tIm;
        re[a] += tRe;
        im[a] += tIm;
        const nextRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = nextRe;
      }
    }
  }
}

/** Periodic Hann window, the spectral-analysis form */
export function hannWindow(length: number): Float64Array {
  const w = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    w[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / length);
  }
  return w;
}

/**
 * Welch PSD: Hann-windowed, mean-detrended segments, averaged periodograms,
 * one-sided density scaling.
 *
 * The segment length is rounded down to a power of two and clamped to the
 * signal length; `overlap` is the shared fraction between neighbours.
 */
export function welch(
  samples: ArrayLike<number>,
  sampleRate: number,
  segmentLength: number,
  overlap: number
): PowerSpectrum {
  if (samples.length < 2) {
    throw new Error(`Too few samples for spectral analysis (${samples.length})`);
  }

  const nperseg = floorPowerOfTwo(Math.min(segmentLength, samples.length));
  const step = Math.max(1, nperseg - Math.floor(nperseg * overlap));
  const window = hannWindow(nperseg);
  const windowPower = window.reduce((sum, v) => sum + v * v, 0);
  const bins = nperseg / 2 + 1;

  const acc = new Float64Array(bins);
  const re = new Float64Array(nperseg);
  const im = new Float64Array(nperseg);
  let segments = 0;

  for (let start = 0; start + nperseg <= samples.length; start += step) {
    let mean = 0;
    for (let i = 0; i < nperseg; i++) mean += samples[start + i];
    mean /= nperseg;

    for (let i = 0; i < nperseg; i++) {
      re[i] = (samples[start + i] - mean) * window[i];
      im[i] = 0;
    }
    fft(re, im);

    for (let k = 0; k < bins; k++) {
      acc[k] += re[k] * re[k] + im[k] * im[k];
    }
    segments++;
  }

  const scale = 1 / (sampleRate * windowPower * segments);
  const psd = new Float64Array(bins);
  const freqs = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    // DC and Nyquist have no mirrored counterpart
    const oneSided = k === 0 || k === bins - 1 ? 1 : 2;
    psd[k] = acc[k] * scale * oneSided;
    freqs[k] = (k * sampleRate) / nperseg;
  }

  return { freqs, psd, segments };
}
