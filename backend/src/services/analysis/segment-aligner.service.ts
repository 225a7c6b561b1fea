/**
 * Segment Aligner
 *
 * Picks one musically clean highlight per track:
 *
 *   1. Choose a raw window: the local energy peak, or the "most replayed" window
 *      when a popularity curve exists and it is energetic enough.
 *   2. Snap the start forward to the next beat (never earlier, so a lead-in is
 *      not clipped) and the end to the nearest quiet phrase boundary, falling
 *      back to the previous beat.
 *   3. Abandon alignment if it leaves the window shorter than the configured
 *      minimum.
 */

import type { AlignmentSettings } from '../../config/env';
import type { AudioSegment, PopularitySample } from '../../types/mix.types';
import { mean, round } from './dsp';
import type { SignalAnalysis } from './energy-analyzer.service';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TimeWindow {
  startTime: number;
  endTime: number;
}

export interface HybridChoice extends TimeWindow {
  source: 'energy' | 'popularity';
  /** Mean composite energy (0-1) of the chosen window */
  energy: number;
  popularityScore?: number;
}

export type EndSnap = 'phrase' | 'beat' | 'none';

export interface AlignedWindow extends TimeWindow {
  startSnapped: boolean;
  endSnap: EndSnap;
  /** False when alignment was abandoned and the raw window returned */
  aligned: boolean;
}

// ---------------------------------------------------------------------------
// Segment length
// ---------------------------------------------------------------------------

const MIN_HIGHLIGHT_SECONDS = 45;
const MAX_HIGHLIGHT_SECONDS = 90;
const END_BUFFER_SECONDS = 5;

/**
 * High-energy tracks get short, punchy highlights (45-55 s); calmer tracks get
 * room to build (up to 90 s). `energy` is 0-1.
 */
export function highlightDuration(energy: number, trackDuration: number): number {
  let target: number;
  if (energy >= 0.8) {
    target = MIN_HIGHLIGHT_SECONDS + (1 - energy) * 50;
  } else if (energy >= 0.5) {
    target = 55 + (0.8 - energy) * 50;
  } else {
    target = 70 + (0.5 - energy) * 40;
  }
  target = Math.max(MIN_HIGHLIGHT_SECONDS, Math.min(MAX_HIGHLIGHT_SECONDS, target));

  const available = trackDuration - END_BUFFER_SECONDS;
  if (available <= 0) return Math.max(0, trackDuration);
  return Math.min(target, available);
}

// ---------------------------------------------------------------------------
// Hybrid window choice
// ---------------------------------------------------------------------------

function windowMean(curve: ArrayLike<number>, fps: number, startTime: number, duration: number): number {
  const from = Math.max(0, Math.round(startTime * fps));
  const to = Math.min(curve.length, from + Math.max(1, Math.round(duration * fps)));
  return mean(curve, from, to);
}

function localPeakWindow(curve: ArrayLike<number>, fps: number, duration: number): { startTime: number; energy: number } {
  const frames = Math.max(1, Math.round(duration * fps));
  if (curve.length <= frames) {
    return { startTime: 0, energy: mean(curve) };
  }

  let sum = 0;
  for (let i = 0; i < frames; i++) sum += curve[i];
  let best = sum;
  let bestStart = 0;
  for (let start = 1; start + frames <= curve.length; start++) {
    sum += curve[start + frames - 1] - curve[start - 1];
    if (sum > best) {
      best = sum;
      bestStart = start;
    }
  }
  return { startTime: bestStart / fps, energy: best / frames };
}

export function chooseHybridWindow(
  curve: ArrayLike<number>,
  fps: number,
  popularity: PopularitySample[] | undefined,
  duration: number,
  trackDuration: number,
  thresholds: Pick<AlignmentSettings, 'popularityEnergyShare' | 'popularityScoreThreshold'>
): HybridChoice {
  const local = localPeakWindow(curve, fps, duration);
  const localChoice: HybridChoice = {
    startTime: local.startTime,
    endTime: local.startTime + duration,
    source: 'energy',
    energy: local.energy,
  };

  if (!popularity || popularity.length === 0) return localChoice;

  const peak = popularity.reduce((best, s) => (s.value > best.value ? s : best));
  const latestStart = Math.max(0, trackDuration - duration);
  const popularStart = Math.min(Math.max(0, peak.startTime), latestStart);
  const popularEnergy = windowMean(curve, fps, popularStart, duration);

  const energeticEnough = popularEnergy >= local.energy * thresholds.popularityEnergyShare;
  const clearlyPopular = peak.value > thresholds.popularityScoreThreshold;

  if (energeticEnough || clearlyPopular) {
    return {
      startTime: popularStart,
      endTime: popularStart + duration,
      source: 'popularity',
      energy: popularEnergy,
      popularityScore: peak.value,
    };
  }
  return { ...localChoice, popularityScore: peak.value };
}

// ---------------------------------------------------------------------------
// Beat / phrase alignment
// ---------------------------------------------------------------------------

export interface AlignOptions
  extends Pick<AlignmentSettings, 'phraseSearchRadius' | 'dipRatio' | 'minAlignedDuration'> {
  trackDuration: number;
}

function nextBeat(beats: number[], time: number): number | undefined {
  return beats.find((b) => b >= time);
}

function previousBeat(beats: number[], time: number, after: number): number | undefined {
  let found: number | undefined;
  for (const b of beats) {
    if (b > time) break;
    if (b > after) found = b;
  }
  return found;
}

/** Quietest frame near `target`, if it is a clear dip relative to its surroundings. */
function findPhraseBoundary(
  rms: ArrayLike<number>,
  fps: number,
  target: number,
  after: number,
  radius: number,
  dipRatio: number
): number | undefined {
  const from = Math.max(0, Math.round((target - radius) * fps), Math.floor(after * fps) + 1);
  const to = Math.min(rms.length, Math.round((target + radius) * fps) + 1);
  if (to - from < 3) return undefined;

  let minIndex = from;
  for (let i = from; i < to; i++) {
    const closer = Math.abs(i / fps - target) < Math.abs(minIndex / fps - target);
    if (rms[i] < rms[minIndex] || (rms[i] === rms[minIndex] && closer)) minIndex = i;
  }

  const localMean = mean(rms, from, to);
  if (localMean <= 0 || rms[minIndex] >= localMean * dipRatio) return undefined;
  return minIndex / fps;
}

export function alignWindow(
  window: TimeWindow,
  beats: number[],
  rms: ArrayLike<number>,
  fps: number,
  opts: AlignOptions
): AlignedWindow {
  const raw: AlignedWindow = {
    startTime: window.startTime,
    endTime: window.endTime,
    startSnapped: false,
    endSnap: 'none',
    aligned: false,
  };

  const snappedStart = nextBeat(beats, window.startTime);
  const startTime = snappedStart ?? window.startTime;

  let endTime = window.endTime;
  let endSnap: EndSnap = 'none';
  const dip = findPhraseBoundary(rms, fps, window.endTime, startTime, opts.phraseSearchRadius, opts.dipRatio);
  if (dip !== undefined) {
    endTime = dip;
    endSnap = 'phrase';
  } else {
    const beat = previousBeat(beats, window.endTime, startTime);
    if (beat !== undefined) {
      endTime = beat;
      endSnap = 'beat';
    }
  }
  endTime = Math.min(endTime, opts.trackDuration);

  if (endTime <= startTime || endTime - startTime < opts.minAlignedDuration) {
    return raw;
  }

  return {
    startTime,
    endTime,
    startSnapped: snappedStart !== undefined,
    endSnap,
    aligned: true,
  };
}

// ---------------------------------------------------------------------------
// Per-track highlight
// ---------------------------------------------------------------------------

export function selectSegmentForTrack(
  analysis: SignalAnalysis,
  trackDuration: number,
  popularity: PopularitySample[] | undefined,
  settings: AlignmentSettings
): { segment: AudioSegment; choice: HybridChoice; alignment: AlignedWindow } {
  const energy = analysis.overallEnergy / 100;
  const duration = highlightDuration(energy, trackDuration);
  const fps = analysis.framesPerSecond;

  const choice = chooseHybridWindow(analysis.energyCurve, fps, popularity, duration, trackDuration, settings);
  const alignment = alignWindow(choice, analysis.beatTimes, analysis.rms, fps, { ...settings, trackDuration });

  const startTime = round(alignment.startTime, 2);
  const endTime = round(alignment.endTime, 2);
  const segment: AudioSegment = {
    startTime,
    endTime,
    duration: round(endTime - startTime, 2),
    energyScore: round(windowMean(analysis.energyCurve, fps, startTime, endTime - startTime) * 100, 1),
    isPrimary: true,
    label: choice.source === 'popularity' ? 'most_replayed' : 'peak_energy',
  };

  return { segment, choice, alignment };
}
