/**
 * Energy Analyzer
 *
 * Finds the most exciting windows of a track. Three frame features (loudness,
 * brightness, rhythmic punch) are normalised and blended into one energy curve;
 * a sliding window then looks for plateaus of high energy rather than single
 * spikes, and the best non-overlapping windows become the track's segments.
 *
 * Tempo is estimated independently from the same onset envelope and never fails
 * the analysis: on any tempo error the track is reported at the fallback BPM
 * with an empty beat grid.
 */

import { logger, errorMessage } from '../../config/logger';
import type { AnalysisSettings } from '../../config/env';
import type { AnalysisResult, AudioSegment } from '../../types/mix.types';
import { computeFrameFeatures, mean, movingAverage, normalize, round } from './dsp';
import { detectBeatGrid } from './tempo';
import defaultDecoder, { type AudioDecoder } from './audio-decoder.service';

const RMS_WEIGHT = 0.4;
const CENTROID_WEIGHT = 0.3;
const ONSET_WEIGHT = 0.3;
/** Extension keeps going while the window mean stays within 5% of the best mean */
const PLATEAU_TOLERANCE = 0.95;

export type AnalysisStage = 'decode' | 'analyze';

export class AnalysisError extends Error {
  constructor(
    public readonly stage: AnalysisStage,
    message: string
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

// ---------------------------------------------------------------------------
// Energy curve
// ---------------------------------------------------------------------------

export interface EnergyCurveOptions {
  hopLength: number;
  frameLength: number;
  maxSmoothingKernel: number;
}

export interface EnergyCurve {
  /** Composite energy per frame, 0-1 */
  curve: Float64Array;
  /** Raw RMS per frame, used for phrase-boundary search */
  rms: Float64Array;
  /** Raw onset strength per frame, used for tempo */
  onset: Float64Array;
}

export function smoothingKernelSize(frames: number, maxKernel: number): number {
  if (frames <= 10) return 1;
  let k = Math.min(maxKernel, Math.floor(frames / 5));
  if (k % 2 === 0) k += 1;
  return k;
}

export function computeEnergyCurve(signal: Float32Array, sampleRate: number, opts: EnergyCurveOptions): EnergyCurve {
  const features = computeFrameFeatures(signal, sampleRate, opts);

  const rmsNorm = normalize(features.rms);
  const centroidNorm = normalize(features.centroid);
  const onsetNorm = normalize(features.onset);

  const raw = new Float64Array(rmsNorm.length);
  for (let i = 0; i < raw.length; i++) {
    raw[i] = RMS_WEIGHT * rmsNorm[i] + CENTROID_WEIGHT * centroidNorm[i] + ONSET_WEIGHT * onsetNorm[i];
  }

  const curve = movingAverage(raw, smoothingKernelSize(raw.length, opts.maxSmoothingKernel));
  return { curve, rms: features.rms, onset: features.onset };
}

// ---------------------------------------------------------------------------
// Peak segments
// ---------------------------------------------------------------------------

export interface PeakSearchOptions {
  minSegmentSeconds: number;
  maxSegmentSeconds: number;
  maxSegments: number;
  minGapSeconds: number;
}

interface Candidate {
  startFrame: number;
  endFrame: number;
  energy: number;
}

function tooClose(a: Candidate, b: Candidate, gapFrames: number): boolean {
  return !(a.endFrame + gapFrames <= b.startFrame || a.startFrame >= b.endFrame + gapFrames);
}

export function findPeakSegments(
  curve: ArrayLike<number>,
  framesPerSecond: number,
  opts: PeakSearchOptions
): AudioSegment[] {
  const minFrames = Math.floor(opts.minSegmentSeconds * framesPerSecond);
  const maxFrames = Math.floor(opts.maxSegmentSeconds * framesPerSecond);
  // rounded up so the separation in seconds is never below the configured gap
  const gapFrames = Math.ceil(opts.minGapSeconds * framesPerSecond);

  const windowFrames = Math.floor((minFrames + maxFrames) / 2);
  const stepFrames = Math.max(1, Math.floor(windowFrames / 4));
  const extendStep = Math.max(1, Math.floor(stepFrames / 2));

  if (minFrames <= 0 || opts.maxSegments <= 0) return [];

  const candidates: Candidate[] = [];
  for (let start = 0; start < curve.length - minFrames; start += stepFrames) {
    let bestEnd = start + minFrames;
    let bestMean = mean(curve, start, bestEnd);
    let lastEnd = bestEnd;

    const limit = Math.min(start + maxFrames + 1, curve.length);
    for (let end = start + minFrames + extendStep; end < limit; end += extendStep) {
      const m = mean(curve, start, end);
      if (m < bestMean * PLATEAU_TOLERANCE) break;
      lastEnd = end;
      bestMean = Math.max(bestMean, m);
    }
    bestEnd = lastEnd;

    candidates.push({ startFrame: start, endFrame: bestEnd, energy: mean(curve, start, bestEnd) });
  }

  // stable: equal energies keep their earlier start first
  candidates.sort((a, b) => b.energy - a.energy);

  const selected: Candidate[] = [];
  for (const candidate of candidates) {
    if (selected.length >= opts.maxSegments) break;
    if (selected.some((s) => tooClose(candidate, s, gapFrames))) continue;
    selected.push(candidate);
  }

  selected.sort((a, b) => a.startFrame - b.startFrame);

  let primaryIndex = 0;
  selected.forEach((s, i) => {
    if (s.energy > selected[primaryIndex].energy) primaryIndex = i;
  });

  return selected.map((s, i) => {
    const startTime = round(s.startFrame / framesPerSecond, 2);
    const endTime = round(s.endFrame / framesPerSecond, 2);
    return {
      startTime,
      endTime,
      duration: round(endTime - startTime, 2),
      energyScore: round(s.energy * 100, 1),
      isPrimary: i === primaryIndex,
      label: `segment_${i + 1}`,
    };
  });
}

// ---------------------------------------------------------------------------
// Whole-track analysis
// ---------------------------------------------------------------------------

export interface AnalyzeOptions extends Partial<PeakSearchOptions> {
  trackLabel?: string;
}

export interface SignalAnalysis extends AnalysisResult {
  /** Raw RMS per frame, kept for beat/phrase alignment */
  rms: Float64Array;
}

export class EnergyAnalyzerService {
  constructor(
    private readonly settings: AnalysisSettings,
    private readonly decoder: AudioDecoder = defaultDecoder
  ) {}

  get framesPerSecond(): number {
    return this.settings.sampleRate / this.settings.hopLength;
  }

  analyzeSignal(signal: Float32Array, sampleRate: number, options: AnalyzeOptions = {}): SignalAnalysis {
    const fps = sampleRate / this.settings.hopLength;
    const { curve, rms, onset } = computeEnergyCurve(signal, sampleRate, this.settings);

    let tempoBpm = this.settings.fallbackTempo;
    let beatTimes: number[] = [];
    try {
      const grid = detectBeatGrid(onset, fps);
      tempoBpm = grid.tempoBpm;
      beatTimes = grid.beatTimes;
    } catch (error) {
      logger.warn('Tempo estimation failed, using fallback BPM', {
        track: options.trackLabel,
        fallbackBpm: tempoBpm,
        error: errorMessage(error),
      });
    }

    const segments = findPeakSegments(curve, fps, {
      minSegmentSeconds: options.minSegmentSeconds ?? this.settings.minSegmentSeconds,
      maxSegmentSeconds: options.maxSegmentSeconds ?? this.settings.maxSegmentSeconds,
      maxSegments: options.maxSegments ?? this.settings.maxSegments,
      minGapSeconds: options.minGapSeconds ?? this.settings.minGapSeconds,
    });

    return {
      tempoBpm: round(tempoBpm, 1),
      overallEnergy: round(mean(curve) * 100, 1),
      segments,
      beatTimes,
      energyCurve: curve,
      framesPerSecond: fps,
      rms,
    };
  }

  async analyzeFile(filePath: string, options: AnalyzeOptions = {}): Promise<SignalAnalysis> {
    const label = options.trackLabel ?? filePath;
    logger.info('Analyzing audio', { track: label });

    let signal: Float32Array;
    try {
      signal = await this.decoder.decode(filePath, this.settings.sampleRate);
    } catch (error) {
      throw new AnalysisError('decode', errorMessage(error));
    }

    let result: SignalAnalysis;
    try {
      result = this.analyzeSignal(signal, this.settings.sampleRate, { ...options, trackLabel: label });
    } catch (error) {
      throw new AnalysisError('analyze', errorMessage(error));
    }

    logger.info('Audio analysis complete', {
      track: label,
      bpm: result.tempoBpm,
      overallEnergy: result.overallEnergy,
      segments: result.segments.length,
    });
    return result;
  }
}
