import { describe, expect, it } from 'vitest';
import { computeFrameFeatures, fft, frameCount, movingAverage, normalize, round } from './dsp';

describe('frameCount', () => {
  it('counts centred frames', () => {
    expect(frameCount(1024, 512)).toBe(3);
    expect(frameCount(1023, 512)).toBe(2);
    expect(frameCount(0, 512)).toBe(0);
  });
});

describe('normalize', () => {
  it('maps the range onto [0, 1]', () => {
    expect(Array.from(normalize(Float64Array.from([2, 4, 6])))).toEqual([0, 0.5, 1]);
  });

  it('returns zeros for a flat input', () => {
    expect(Array.from(normalize(Float64Array.from([3, 3, 3])))).toEqual([0, 0, 0]);
  });
});

describe('movingAverage', () => {
  it('averages a centred window with zero padding at the edges', () => {
    const out = movingAverage(Float64Array.from([3, 3, 3, 3, 3]), 3);
    expect(Array.from(out)).toEqual([2, 3, 3, 3, 2]);
  });

  it('is the identity for a kernel of one', () => {
    expect(Array.from(movingAverage(Float64Array.from([1, 5, 2]), 1))).toEqual([1, 5, 2]);
  });
});

describe('fft', () => {
  it('transforms an impulse into a flat spectrum', () => {
    const re = Float64Array.from([1, 0, 0, 0]);
    const im = new Float64Array(4);
    fft(re, im);
    expect(Array.from(re)).toEqual([1, 1, 1, 1]);
    expect(Array.from(im).every((v) => Math.abs(v) < 1e-12)).toBe(true);
  });

  it('puts a constant signal in the DC bin', () => {
    const re = Float64Array.from([1, 1, 1, 1]);
    const im = new Float64Array(4);
    fft(re, im);
    expect(re[0]).toBeCloseTo(4, 10);
    expect(Math.abs(re[1]) + Math.abs(re[2]) + Math.abs(re[3])).toBeLessThan(1e-12);
  });

  it('rejects sizes that are not powers of two', () => {
    expect(() => fft(new Float64Array(6), new Float64Array(6))).toThrow('power of two');
  });
});

describe('computeFrameFeatures', () => {
  it('reports zeros for silence', () => {
    const features = computeFrameFeatures(new Float32Array(4096), 8000, { hopLength: 512, frameLength: 1024 });
    expect(features.rms.every((v) => v === 0)).toBe(true);
    expect(features.centroid.every((v) => v === 0)).toBe(true);
    expect(features.onset.every((v) => v === 0)).toBe(true);
  });

  it('places the centroid of a pure tone at its frequency', () => {
    const sampleRate = 8000;
    const signal = new Float32Array(2048);
    for (let i = 0; i < signal.length; i++) {
      signal[i] = Math.sin((2 * Math.PI * 1000 * i) / sampleRate);
    }
    const features = computeFrameFeatures(signal, sampleRate, { hopLength: 128, frameLength: 256 });
    // frame 4 lies entirely inside the signal
    expect(features.centroid[4]).toBeCloseTo(1000, 0);
    expect(features.rms[4]).toBeCloseTo(Math.SQRT1_2, 3);
  });
});

describe('round', () => {
  it('rounds to the given number of decimals', () => {
    expect(round(1.23456, 2)).toBe(1.23);
    expect(round(0.125, 2)).toBe(0.13);
  });
});
