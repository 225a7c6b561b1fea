/**
 * Frame-level signal features for the energy analyzer.
 *
 * Frames are centred: the signal is zero-padded by frameLength/2 on both sides,
 * so frame i covers samples [i*hop - frameLength/2, i*hop + frameLength/2) and a
 * signal of n samples yields 1 + floor(n / hop) frames.
 */

export interface FrameOptions {
  hopLength: number;
  /** Must be a power of two (FFT size) */
  frameLength: number;
}

// ---------------------------------------------------------------------------
// Framing
// ---------------------------------------------------------------------------

export function frameCount(signalLength: number, hopLength: number): number {
  if (signalLength <= 0) return 0;
  return 1 + Math.floor(signalLength / hopLength);
}

function readFrame(signal: Float32Array, index: number, opts: FrameOptions, out: Float64Array): void {
  const offset = index * opts.hopLength - Math.floor(opts.frameLength / 2);
  for (let j = 0; j < opts.frameLength; j++) {
    const s = offset + j;
    out[j] = s >= 0 && s < signal.length ? signal[s] : 0;
  }
}

function hannWindow(length: number): Float64Array {
  const w = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    // periodic Hann, as used for spectral analysis
    w[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / length);
  }
  return w;
}

// ---------------------------------------------------------------------------
// FFT (in-place, radix-2)
// ---------------------------------------------------------------------------

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

export function fft(re: Float64Array, im: Float64Array): void {
  const n = re.length;
  if (!isPowerOfTwo(n) || im.length !== n) {
    throw new Error(`FFT size must be a power of two, got ${n}`);
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

  for (let size = 2; size <= n; size <<= 1) {
    const half = size >> 1;
    const step = (-2 * Math.PI) / size;
    for (let start = 0; start < n; start += size) {
      for (let k = 0; k < half; k++) {
        const cos = Math.cos(step * k);
        const sin = Math.sin(step * k);
        const a = start + k;
        const b = a + half;
        const tr = re[b] * cos - im[b] * sin;
        const ti = re[b] * sin + im[b] * cos;
        re[b] = re[a] - tr;
        im[b] = im[a] - ti;
        re[a] += tr;
        im[a] += ti;
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Features
// ---------------------------------------------------------------------------

export interface FrameFeatures {
  /** Root-mean-square amplitude per frame */
  rms: Float64Array;
  /** Spectral centroid per frame, Hz */
  centroid: Float64Array;
  /** Positive log-magnitude spectral flux per frame */
  onset: Float64Array;
}

/**
 * Compute RMS, spectral centroid and onset strength in a single pass over the
 * frames so the FFT is only run once per frame.
 */
export function computeFrameFeatures(signal: Float32Array, sampleRate: number, opts: FrameOptions): FrameFeatures {
  const frames = frameCount(signal.length, opts.hopLength);
  const bins = opts.frameLength / 2 + 1;
  const window = hannWindow(opts.frameLength);

  const rms = new Float64Array(frames);
  const centroid = new Float64Array(frames);
  const onset = new Float64Array(frames);

  const frame = new Float64Array(opts.frameLength);
  const re = new Float64Array(opts.frameLength);
  const im = new Float64Array(opts.frameLength);
  let prevLogMag = new Float64Array(bins);
  let logMag = new Float64Array(bins);

  for (let f = 0; f < frames; f++) {
    readFrame(signal, f, opts, frame);

    let sumSq = 0;
    for (let j = 0; j < opts.frameLength; j++) {
      sumSq += frame[j] * frame[j];
      re[j] = frame[j] * window[j];
      im[j] = 0;
    }
    rms[f] = Math.sqrt(sumSq / opts.frameLength);

    fft(re, im);

    let weighted = 0;
    let total = 0;
    let flux = 0;
    for (let k = 0; k < bins; k++) {
      const mag = Math.hypot(re[k], im[k]);
      const freq = (k * sampleRate) / opts.frameLength;
      weighted += freq * mag;
      total += mag;
      logMag[k] = Math.log1p(mag);
      if (f > 0) {
        const diff = logMag[k] - prevLogMag[k];
        if (diff > 0) flux += diff;
      }
    }
    centroid[f] = total > 0 ? weighted / total : 0;
    onset[f] = f > 0 ? flux / bins : 0;

    [prevLogMag, logMag] = [logMag, prevLogMag];
  }

  return { rms, centroid, onset };
}

// ---------------------------------------------------------------------------
// Curve helpers
// ---------------------------------------------------------------------------

/** Min-max normalise to [0, 1]; a flat input yields all zeros. */
export function normalize(values: Float64Array): Float64Array {
  const out = new Float64Array(values.length);
  if (values.length === 0) return out;

  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const range = max - min;
  if (range < 1e-8) return out;

  for (let i = 0; i < values.length; i++) {
    out[i] = (values[i] - min) / range;
  }
  return out;
}

/**
 * Centred moving average with zero padding at the edges, same length as the
 * input (numpy's `convolve(x, ones(k)/k, mode='same')` for odd k).
 */
export function movingAverage(values: Float64Array, kernelSize: number): Float64Array {
  const n = values.length;
  const out = new Float64Array(n);
  if (kernelSize <= 1) {
    out.set(values);
    return out;
  }
  const half = Math.floor(kernelSize / 2);

  const prefix = new Float64Array(n + 1);
  for (let i = 0; i < n; i++) prefix[i + 1] = prefix[i] + values[i];

  for (let i = 0; i < n; i++) {
    const lo = Math.max(0, i - half);
    const hi = Math.min(n, i + half + 1);
    out[i] = (prefix[hi] - prefix[lo]) / kernelSize;
  }
  return out;
}

export function mean(values: ArrayLike<number>, from = 0, to = values.length): number {
  if (to <= from) return 0;
  let sum = 0;
  for (let i = from; i < to; i++) sum += values[i];
  return sum / (to - from);
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
