/**
 * Mix Sequencer
 *
 * Decides the order in which cut segments play. Ordering primitives:
 *   - tempo distance (aware of half/double-time relationships)
 *   - energy distance between adjacent cuts
 *   - a language-variety constraint on consecutive cuts
 *   - a named energy curve for the overall shape of the set
 *
 * Everything here is deterministic. The only shuffling (energy tiers of the
 * peak_middle curve) draws from a seeded generator.
 */

import { logger } from '../../config/logger';
import { round } from '../analysis/dsp';
import type {
  EnergyCurve,
  MixPlan,
  MixStrategy,
  NextSuggestion,
  SequenceOptions,
  SequencerItem,
  TransitionRecord,
} from '../../types/mix.types';

export const DEFAULT_STRATEGY: MixStrategy = 'balanced';
export const DEFAULT_ENERGY_CURVE: EnergyCurve = 'peak_middle';
export const DEFAULT_MAX_SAME_LANGUAGE = 2;
export const DEFAULT_SEED = 0x5eed;

/** Penalty when either tempo is unknown */
const UNKNOWN_TEMPO_DISTANCE = 10;
/** Half/double-time matches are close, but not as close as a direct match */
const HARMONIC_PENALTY = 1.5;
const LANGUAGE_RUN_PENALTY = 5;

// ---------------------------------------------------------------------------
// Distances
// ---------------------------------------------------------------------------

export function tempoDistance(a: number | null, b: number | null): number {
  if (a === null || b === null) return UNKNOWN_TEMPO_DISTANCE;

  const lo = Math.min(a, b);
  const hi = Math.max(a, b);
  const direct = hi - lo;
  const halfTime = Math.abs(lo - hi / 2);
  const doubleTime = Math.abs(lo * 2 - hi);

  return Math.min(direct, halfTime * HARMONIC_PENALTY, doubleTime * HARMONIC_PENALTY);
}

/** Energy scores are 0-100; the distance is reported on a 0-1 scale. */
export function energyDistance(a: number, b: number): number {
  return Math.abs(a - b) / 100;
}

const energyOf = (item: SequencerItem): number => item.segment.energyScore;
const tempoOf = (item: SequencerItem): number | null => item.track.tempoBpm;
const languageOf = (item: SequencerItem): string => item.track.language;

/** Index of the smallest score; ties go to the earliest index. */
function argMin<T>(values: T[], score: (value: T, index: number) => number): number {
  let best = 0;
  let bestScore = Infinity;
  values.forEach((v, i) => {
    const s = score(v, i);
    if (s < bestScore) {
      bestScore = s;
      best = i;
    }
  });
  return best;
}

// ---------------------------------------------------------------------------
// Seeded shuffle
// ---------------------------------------------------------------------------

export type Random = () => number;

/** mulberry32: small, fast, good enough for shuffling a playlist */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function shuffle<T>(items: T[], random: Random): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

/**
 * Nearest-neighbour walk on tempo distance, starting from the cut whose energy
 * is closest to the set's mean.
 */
export function orderByTempo(items: SequencerItem[]): SequencerItem[] {
  if (items.length <= 1) return items.slice();

  const remaining = items.slice();
  const avgEnergy = remaining.reduce((sum, it) => sum + energyOf(it), 0) / remaining.length;

  const ordered = remaining.splice(
    argMin(remaining, (it) => Math.abs(energyOf(it) - avgEnergy)),
    1
  );

  while (remaining.length > 0) {
    const last = tempoOf(ordered[ordered.length - 1]);
    ordered.push(...remaining.splice(argMin(remaining, (it) => tempoDistance(last, tempoOf(it))), 1));
  }
  return ordered;
}

function trailingRun(languages: string[], language: string): number {
  let run = 0;
  for (let i = languages.length - 1; i >= 0 && languages[i] === language; i--) run++;
  return run;
}

/**
 * Whether the remaining cuts can still be laid out without a run longer than
 * `maxConsecutive`, given the language run the order currently ends on.
 */
function canComplete(
  remaining: SequencerItem[],
  trailLanguage: string | undefined,
  trailRun: number,
  maxConsecutive: number
): boolean {
  const counts = new Map<string, number>();
  for (const it of remaining) counts.set(languageOf(it), (counts.get(languageOf(it)) ?? 0) + 1);

  for (const [language, count] of counts) {
    const others = remaining.length - count;
    const room = maxConsecutive * (others + 1) - (language === trailLanguage ? trailRun : 0);
    if (count > room) return false;
  }
  return true;
}

/**
 * Reorder so that no more than `maxConsecutive` adjacent cuts share a language.
 * Among the cuts that keep the constraint (and leave a remainder that can still
 * keep it), the one closest in tempo to the previous pick wins. When none keeps
 * it, take the first cut whose language differs from the previous one, else
 * the first remaining cut.
 */
export function enforceLanguageVariety(items: SequencerItem[], maxConsecutive: number): SequencerItem[] {
  if (items.length <= maxConsecutive || maxConsecutive < 1) return items.slice();

  const remaining = items.slice();
  const result: SequencerItem[] = [];
  const languages: string[] = [];

  while (remaining.length > 0) {
    const allowed = remaining
      .map((it, i) => ({ it, i }))
      .filter(({ it }) => trailingRun(languages, languageOf(it)) < maxConsecutive);

    const safe = allowed.filter(({ it, i }) => {
      const language = languageOf(it);
      const rest = remaining.filter((_, j) => j !== i);
      return canComplete(rest, language, trailingRun(languages, language) + 1, maxConsecutive);
    });

    let valid = (safe.length > 0 ? safe : allowed).map(({ i }) => i);

    if (valid.length === 0) {
      const previous = languages[languages.length - 1];
      const differing = remaining.findIndex((it) => languageOf(it) !== previous);
      valid = [differing >= 0 ? differing : 0];
    }

    let pick = valid[0];
    if (result.length > 0) {
      const lastTempo = tempoOf(result[result.length - 1]);
      pick = valid[argMin(valid, (i) => tempoDistance(lastTempo, tempoOf(remaining[i])))];
    }

    const [item] = remaining.splice(pick, 1);
    result.push(item);
    languages.push(languageOf(item));
  }
  return result;
}

/**
 * Reshape the order to follow a named intensity curve. `ascending` and
 * `descending` are stable sorts for any set size; `peak_middle` and `wave`
 * need tiers and pairs, so sets of three or fewer keep their input order.
 */
export function shapeEnergyCurve(items: SequencerItem[], curve: EnergyCurve, random: Random): SequencerItem[] {
  const ascending = items.slice().sort((a, b) => energyOf(a) - energyOf(b));

  switch (curve) {
    case 'ascending':
      return ascending;

    case 'descending':
      return items.slice().sort((a, b) => energyOf(b) - energyOf(a));

    case 'peak_middle': {
      if (items.length <= 3) return items.slice();
      const third = Math.floor(ascending.length / 3);
      const low = shuffle(ascending.slice(0, third), random);
      const mid = shuffle(ascending.slice(third, 2 * third), random);
      const high = shuffle(ascending.slice(2 * third), random);

      // open mid, build through mid + high, cool down on low
      const opening = mid.splice(0, 1);
      return [...opening, ...shuffle([...mid, ...high], random), ...low];
    }

    case 'wave': {
      if (items.length <= 3) return items.slice();
      const n = ascending.length;
      const half = Math.floor(n / 2);
      const result: SequencerItem[] = [];
      for (let i = 0; i < half; i++) {
        result.push(ascending[i], ascending[n - 1 - i]);
      }
      if (n % 2 === 1) result.push(ascending[half]);
      return result;
    }
  }
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export function scoreTransitions(order: SequencerItem[]): TransitionRecord[] {
  const transitions: TransitionRecord[] = [];
  for (let i = 0; i < order.length - 1; i++) {
    const from = order[i];
    const to = order[i + 1];
    const tempo = tempoDistance(tempoOf(from), tempoOf(to));
    const energy = energyDistance(energyOf(from), energyOf(to));
    const smoothness = Math.max(0, Math.min(100, 100 - tempo * 2 - energy * 50));

    transitions.push({
      from: from.id,
      to: to.id,
      tempoDelta: round(tempo, 1),
      energyDelta: round(energy, 2),
      sameLanguage: languageOf(from) === languageOf(to),
      smoothnessScore: round(smoothness, 1),
    });
  }
  return transitions;
}

/** Number of windows of `maxConsecutive + 1` adjacent cuts that all share a language. */
export function countLanguageRuns(order: SequencerItem[], maxConsecutive: number): number {
  let windows = 0;
  for (let i = 0; i + maxConsecutive < order.length; i++) {
    const language = languageOf(order[i]);
    let allSame = true;
    for (let j = 1; j <= maxConsecutive; j++) {
      if (languageOf(order[i + j]) !== language) {
        allSame = false;
        break;
      }
    }
    if (allSame) windows++;
  }
  return windows;
}

export function qualityScore(order: SequencerItem[], transitions: TransitionRecord[], maxConsecutive: number): number {
  if (transitions.length === 0) return order.length === 0 ? 0 : 100;
  const avg = transitions.reduce((sum, t) => sum + t.smoothnessScore, 0) / transitions.length;
  const penalty = countLanguageRuns(order, maxConsecutive) * LANGUAGE_RUN_PENALTY;
  return round(Math.max(0, avg - penalty), 1);
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

export function sequence(items: SequencerItem[], options: SequenceOptions = {}): MixPlan {
  const strategy = options.strategy ?? DEFAULT_STRATEGY;
  const energyCurve = options.energyCurve ?? DEFAULT_ENERGY_CURVE;
  const maxSameLanguage = options.maxSameLanguage ?? DEFAULT_MAX_SAME_LANGUAGE;
  const random = createRandom(options.seed ?? DEFAULT_SEED);

  if (items.length === 0) {
    return { entries: [], transitions: [], qualityScore: 0, strategy, energyCurve, notes: ['Empty playlist'] };
  }
  if (items.length === 1) {
    return { entries: items.slice(), transitions: [], qualityScore: 100, strategy, energyCurve, notes: ['Single segment'] };
  }

  const notes: string[] = [];
  let order: SequencerItem[];

  switch (strategy) {
    case 'tempo_smooth':
      order = orderByTempo(items);
      notes.push('Optimized for tempo transitions');
      break;
    case 'language_variety':
      order = enforceLanguageVariety(items, maxSameLanguage);
      notes.push(`Ensured max ${maxSameLanguage} consecutive same-language segments`);
      break;
    case 'energy_curve':
      order = shapeEnergyCurve(items, energyCurve, random);
      notes.push(`Applied ${energyCurve} energy curve`);
      break;
    case 'balanced':
    default:
      order = enforceLanguageVariety(shapeEnergyCurve(items, energyCurve, random), maxSameLanguage);
      notes.push(`Balanced mix: ${energyCurve} curve, language variety`);
      break;
  }

  const transitions = scoreTransitions(order);
  const score = qualityScore(order, transitions, maxSameLanguage);

  const runs = countLanguageRuns(order, maxSameLanguage);
  if (runs > 0) {
    notes.push(`${runs} run(s) of more than ${maxSameLanguage} same-language segments remain`);
  }

  logger.debug('Mix sequenced', { strategy, energyCurve, segments: order.length, qualityScore: score });

  return { entries: order, transitions, qualityScore: score, strategy, energyCurve, notes };
}

/**
 * Rank candidates for the slot after `current`. Base 50, up to +30 for tempo
 * closeness, up to +20 for energy closeness, +10 for a language change and +5
 * for a language not heard recently.
 */
export function suggestNext(
  current: SequencerItem,
  candidates: SequencerItem[],
  recentLanguages: string[] = []
): NextSuggestion[] {
  const scored = candidates
    .filter((c) => c.id !== current.id)
    .map((item) => {
      let score = 50;
      score += Math.max(0, 30 - tempoDistance(tempoOf(current), tempoOf(item)));
      score += Math.max(0, 20 - energyDistance(energyOf(current), energyOf(item)) * 40);
      if (languageOf(item) !== languageOf(current)) score += 10;
      if (!recentLanguages.includes(languageOf(item))) score += 5;
      return { item, score: round(score, 1) };
    });

  return scored.sort((a, b) => b.score - a.score);
}
