import { describe, expect, it } from 'vitest';
import { TempoEstimationError, detectBeatGrid, estimateTempo, trackBeats } from './tempo';

function impulseTrain(length: number, period: number, offset = 0): Float64Array {
  const onset = new Float64Array(length);
  for (let i = offset; i < length; i += period) onset[i] = 1;
  return onset;
}

describe('estimateTempo', () => {
  it('prefers the period nearest the common tempo range', () => {
    // 100 frames/s, a pulse every 50 frames = 120 BPM; the 60 BPM sub-harmonic loses on the prior
    expect(estimateTempo(impulseTrain(1000, 50), 100)).toBe(120);
  });

  it('rejects a silent envelope', () => {
    expect(() => estimateTempo(new Float64Array(1000), 100)).toThrow(TempoEstimationError);
  });

  it('rejects an envelope shorter than two slow periods', () => {
    expect(() => estimateTempo(impulseTrain(150, 50), 100)).toThrow('too short');
  });
});

describe('trackBeats', () => {
  it('locks onto the phase of the pulses', () => {
    const beats = trackBeats(impulseTrain(1000, 50, 10), 100, 120);
    expect(beats[0]).toBe(0.1);
    expect(beats[1]).toBe(0.6);
    expect(beats).toHaveLength(20);
  });
});

describe('detectBeatGrid', () => {
  it('returns tempo and beats together', () => {
    const grid = detectBeatGrid(impulseTrain(1000, 50), 100);
    expect(grid.tempoBpm).toBe(120);
    expect(grid.beatTimes.slice(0, 3)).toEqual([0, 0.5, 1]);
  });
});
