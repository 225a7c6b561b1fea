/**
 * Tempo estimation and beat tracking from an onset-strength envelope.
 *
 * Tempo: autocorrelation of the envelope over lags covering 60-200 BPM, weighted
 * by a log-normal prior centred on 120 BPM (one octave standard deviation), so
 * ambiguous half/double-time peaks resolve towards the common dance range.
 *
 * Beats: with the period fixed, pick the phase whose comb of beat positions
 * collects the most onset energy, then read the grid off that phase.
 */

export const MIN_BPM = 60;
export const MAX_BPM = 200;
const PRIOR_CENTER_BPM = 120;
const PRIOR_STD_OCTAVES = 1;

export class TempoEstimationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TempoEstimationError';
  }
}

export interface BeatGrid {
  tempoBpm: number;
  /** Beat positions in seconds */
  beatTimes: number[];
}

function tempoPrior(bpm: number): number {
  const octaves = Math.log2(bpm / PRIOR_CENTER_BPM);
  return Math.exp(-0.5 * (octaves / PRIOR_STD_OCTAVES) ** 2);
}

/**
 * Returns the estimated tempo in BPM. Throws TempoEstimationError when the
 * envelope is too short to cover two periods of the slowest tempo or carries
 * no onset energy at all.
 */
export function estimateTempo(onset: ArrayLike<number>, framesPerSecond: number): number {
  const minLag = Math.max(1, Math.floor((60 * framesPerSecond) / MAX_BPM));
  const maxLag = Math.ceil((60 * framesPerSecond) / MIN_BPM);

  if (onset.length < maxLag * 2) {
    throw new TempoEstimationError(`Onset envelope too short (${onset.length} frames)`);
  }

  let energy = 0;
  for (let i = 0; i < onset.length; i++) energy += onset[i] * onset[i];
  if (energy <= 1e-12) {
    throw new TempoEstimationError('Onset envelope is silent');
  }

  let bestLag = 0;
  let bestScore = -Infinity;
  for (let lag = minLag; lag <= maxLag; lag++) {
    let acf = 0;
    for (let i = 0; i + lag < onset.length; i++) acf += onset[i] * onset[i + lag];
    // unbiased estimate so long lags are not penalised for having fewer terms
    acf /= onset.length - lag;

    const bpm = (60 * framesPerSecond) / lag;
    const score = acf * tempoPrior(bpm);
    if (score > bestScore) {
      bestScore = score;
      bestLag = lag;
    }
  }

  if (bestLag === 0 || bestScore <= 0) {
    throw new TempoEstimationError('No periodicity found in onset envelope');
  }

  return (60 * framesPerSecond) / bestLag;
}

export function trackBeats(onset: ArrayLike<number>, framesPerSecond: number, tempoBpm: number): number[] {
  const period = (60 * framesPerSecond) / tempoBpm;
  if (!(period >= 1) || onset.length === 0) return [];

  let bestPhase = 0;
  let bestScore = -Infinity;
  const phases = Math.floor(period);
  for (let phase = 0; phase < phases; phase++) {
    let score = 0;
    for (let pos = phase; pos < onset.length; pos += period) {
      score += onset[Math.round(pos)] ?? 0;
    }
    if (score > bestScore) {
      bestScore = score;
      bestPhase = phase;
    }
  }

  const beats: number[] = [];
  for (let pos = bestPhase; Math.round(pos) < onset.length; pos += period) {
    beats.push(Math.round((Math.round(pos) / framesPerSecond) * 1000) / 1000);
  }
  return beats;
}

export function detectBeatGrid(onset: ArrayLike<number>, framesPerSecond: number): BeatGrid {
  const tempoBpm = estimateTempo(onset, framesPerSecond);
  return { tempoBpm, beatTimes: trackBeats(onset, framesPerSecond, tempoBpm) };
}
