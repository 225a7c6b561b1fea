import { describe, expect, it } from 'vitest';
import type { AnalysisSettings } from '../../config/env';
import type { AudioDecoder } from './audio-decoder.service';
import {
  AnalysisError,
  EnergyAnalyzerService,
  computeEnergyCurve,
  findPeakSegments,
  smoothingKernelSize,
} from './energy-analyzer.service';

const settings: AnalysisSettings = {
  sampleRate: 8000,
  hopLength: 512,
  frameLength: 1024,
  maxSmoothingKernel: 21,
  minSegmentSeconds: 5,
  maxSegmentSeconds: 8,
  maxSegments: 2,
  minGapSeconds: 2,
  fallbackTempo: 120,
};

function stepCurve(length: number, regions: Array<[number, number, number]>): Float64Array {
  const curve = new Float64Array(length);
  for (const [from, to, value] of regions) {
    for (let i = from; i < to; i++) curve[i] = value;
  }
  return curve;
}

describe('smoothingKernelSize', () => {
  it('skips smoothing for very short curves', () => {
    expect(smoothingKernelSize(10, 21)).toBe(1);
  });

  it('uses a fifth of the curve, forced odd, capped', () => {
    expect(smoothingKernelSize(50, 21)).toBe(11);
    expect(smoothingKernelSize(60, 21)).toBe(13);
    expect(smoothingKernelSize(1000, 21)).toBe(21);
  });
});

describe('computeEnergyCurve', () => {
  it('returns a zero curve for silence', () => {
    const { curve } = computeEnergyCurve(new Float32Array(8000), 8000, settings);
    expect(curve.length).toBe(16);
    expect(curve.every((v) => v === 0)).toBe(true);
  });

  it('keeps every value inside [0, 1]', () => {
    const signal = new Float32Array(16000);
    for (let i = 0; i < signal.length; i++) {
      const envelope = i < 8000 ? 0.1 : 0.9;
      signal[i] = envelope * Math.sin((2 * Math.PI * 440 * i) / 8000);
    }
    const { curve } = computeEnergyCurve(signal, 8000, settings);
    expect(curve.every((v) => v >= 0 && v <= 1)).toBe(true);
  });
});

describe('findPeakSegments', () => {
  it('finds the plateau and the best separated runner-up', () => {
    const curve = stepCurve(200, [
      [20, 50, 0.5],
      [100, 140, 1],
    ]);

    const segments = findPeakSegments(curve, 1, {
      minSegmentSeconds: 20,
      maxSegmentSeconds: 30,
      maxSegments: 2,
      minGapSeconds: 10,
    });

    expect(segments).toEqual([
      { startTime: 24, endTime: 50, duration: 26, energyScore: 50, isPrimary: false, label: 'segment_1' },
      { startTime: 102, endTime: 131, duration: 29, energyScore: 100, isPrimary: true, label: 'segment_2' },
    ]);
  });

  it('returns nothing when the curve is shorter than the minimum length', () => {
    const segments = findPeakSegments(new Float64Array(10), 1, {
      minSegmentSeconds: 20,
      maxSegmentSeconds: 30,
      maxSegments: 2,
      minGapSeconds: 5,
    });
    expect(segments).toEqual([]);
  });

  it('honours segment invariants on an irregular curve', () => {
    const fps = 22050 / 512;
    const curve = new Float64Array(Math.round(300 * fps));
    for (let i = 0; i < curve.length; i++) {
      curve[i] = 0.5 + 0.5 * Math.sin(i / 37) * Math.cos(i / 91);
    }

    const minGap = 20;
    const segments = findPeakSegments(curve, fps, {
      minSegmentSeconds: 30,
      maxSegmentSeconds: 45,
      maxSegments: 3,
      minGapSeconds: minGap,
    });

    expect(segments.length).toBeGreaterThan(0);
    expect(segments.length).toBeLessThanOrEqual(3);
    expect(segments.filter((s) => s.isPrimary)).toHaveLength(1);
    for (const s of segments) {
      expect(s.endTime).toBeGreaterThan(s.startTime);
      expect(s.duration).toBeCloseTo(s.endTime - s.startTime, 6);
      expect(s.duration).toBeGreaterThanOrEqual(29.9);
      expect(s.duration).toBeLessThanOrEqual(45.01);
    }
    for (let i = 1; i < segments.length; i++) {
      // rounding to 0.01 s can eat at most a hundredth of the gap
      expect(segments[i].startTime - segments[i - 1].endTime).toBeGreaterThanOrEqual(minGap - 0.01);
    }
  });
});

describe('EnergyAnalyzerService', () => {
  it('falls back to the default tempo on silence', () => {
    const analyzer = new EnergyAnalyzerService(settings);
    const result = analyzer.analyzeSignal(new Float32Array(30 * 8000), 8000);

    expect(result.tempoBpm).toBe(120);
    expect(result.beatTimes).toEqual([]);
    expect(result.overallEnergy).toBe(0);
    expect(result.segments).toHaveLength(2);
    expect(result.segments[0].isPrimary).toBe(true);
    expect(result.segments[1].isPrimary).toBe(false);
  });

  it('reports decode failures with their stage', async () => {
    const decoder: AudioDecoder = {
      decode: () => Promise.reject(new Error('Audio file not found: missing.mp3')),
    };
    const analyzer = new EnergyAnalyzerService(settings, decoder);

    const error = await analyzer.analyzeFile('missing.mp3').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AnalysisError);
    expect(error).toMatchObject({ stage: 'decode', message: 'Audio file not found: missing.mp3' });
  });

  it('analyzes decoded audio', async () => {
    const decoder: AudioDecoder = {
      decode: () => Promise.resolve(new Float32Array(20 * 8000)),
    };
    const analyzer = new EnergyAnalyzerService(settings, decoder);

    const result = await analyzer.analyzeFile('quiet.wav');
    expect(result.framesPerSecond).toBe(15.625);
    expect(result.energyCurve.length).toBe(313);
  });
});
