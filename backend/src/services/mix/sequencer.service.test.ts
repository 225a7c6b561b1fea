import { describe, expect, it } from 'vitest';
import type { SequencerItem } from '../../types/mix.types';
import {
  countLanguageRuns,
  createRandom,
  energyDistance,
  enforceLanguageVariety,
  orderByTempo,
  sequence,
  shapeEnergyCurve,
  suggestNext,
  tempoDistance,
} from './sequencer.service';

function item(id: string, tempoBpm: number | null, energy: number, language = 'en'): SequencerItem {
  return {
    id,
    sourceId: `src-${id}`,
    segment: {
      startTime: 30,
      endTime: 70,
      duration: 40,
      energyScore: energy,
      isPrimary: true,
      label: 'segment_1',
    },
    track: {
      tempoBpm,
      energyScore: energy,
      language,
      title: `Song ${id}`,
      artist: `Artist ${id}`,
      sourceDuration: 200,
    },
  };
}

const ids = (items: SequencerItem[]): string[] => items.map((i) => i.id);

function longestLanguageRun(items: SequencerItem[]): number {
  let longest = 0;
  let run = 0;
  items.forEach((it, i) => {
    run = i > 0 && items[i - 1].track.language === it.track.language ? run + 1 : 1;
    longest = Math.max(longest, run);
  });
  return longest;
}

describe('tempoDistance', () => {
  it('treats half and double time as close', () => {
    expect(tempoDistance(80, 160)).toBe(0);
    expect(tempoDistance(100, 190)).toBe(7.5);
  });

  it('uses the direct difference when it is smallest', () => {
    expect(tempoDistance(120, 100)).toBe(20);
    expect(tempoDistance(100, 140)).toBe(40);
  });

  it('penalises unknown tempo with a fixed distance', () => {
    expect(tempoDistance(null, 120)).toBe(10);
    expect(tempoDistance(120, null)).toBe(10);
  });
});

describe('energyDistance', () => {
  it('reports the difference on a 0-1 scale', () => {
    expect(energyDistance(90, 60)).toBeCloseTo(0.3, 10);
    expect(energyDistance(40, 40)).toBe(0);
  });
});

describe('orderByTempo', () => {
  it('starts from the mean-energy cut and walks to the nearest tempo', () => {
    const items = [item('a', 100, 40, 'en'), item('b', 140, 90, 'hi'), item('c', 120, 60, 'es')];
    expect(ids(orderByTempo(items))).toEqual(['c', 'a', 'b']);
  });
});

describe('enforceLanguageVariety', () => {
  it('breaks up runs longer than the limit', () => {
    const items = [
      item('en1', 120, 50, 'en'),
      item('en2', 120, 50, 'en'),
      item('en3', 120, 50, 'en'),
      item('hi1', 120, 50, 'hi'),
      item('hi2', 120, 50, 'hi'),
      item('es1', 120, 50, 'es'),
    ];
    const ordered = enforceLanguageVariety(items, 2);
    expect(ids(ordered)).toEqual(['en1', 'en2', 'hi1', 'en3', 'hi2', 'es1']);
    expect(longestLanguageRun(ordered)).toBeLessThanOrEqual(2);
  });

  it('prefers the tempo-closest cut among those that keep the limit', () => {
    const items = [item('a', 120, 50, 'en'), item('b', 90, 50, 'hi'), item('c', 124, 50, 'es'), item('d', 95, 50, 'en')];
    expect(ids(enforceLanguageVariety(items, 1))).toEqual(['a', 'c', 'd', 'b']);
  });

  it('keeps input order when no diversity is available', () => {
    const items = [item('a', 120, 50), item('b', 100, 50), item('c', 140, 50)];
    expect(ids(enforceLanguageVariety(items, 1))).toEqual(['a', 'b', 'c']);
  });
});

describe('shapeEnergyCurve', () => {
  const random = createRandom(1);

  it('sorts descending for any set size', () => {
    const items = [item('low', 120, 30), item('high', 120, 90), item('mid', 120, 60)];
    expect(ids(shapeEnergyCurve(items, 'descending', random))).toEqual(['high', 'mid', 'low']);
  });

  it('sorts ascending for any set size', () => {
    const items = [item('low', 120, 30), item('high', 120, 90), item('mid', 120, 60)];
    expect(ids(shapeEnergyCurve(items, 'ascending', random))).toEqual(['low', 'mid', 'high']);
  });

  it('keeps input order for tiny sets on tiered curves', () => {
    const items = [item('a', 120, 30), item('b', 120, 90), item('c', 120, 60)];
    expect(ids(shapeEnergyCurve(items, 'peak_middle', random))).toEqual(['a', 'b', 'c']);
    expect(ids(shapeEnergyCurve(items, 'wave', random))).toEqual(['a', 'b', 'c']);
  });

  it('alternates low and high for a wave', () => {
    const items = [item('e30', 120, 30), item('e10', 120, 10), item('e50', 120, 50), item('e20', 120, 20), item('e40', 120, 40)];
    expect(ids(shapeEnergyCurve(items, 'wave', random))).toEqual(['e10', 'e50', 'e20', 'e40', 'e30']);
  });

  it('opens mid, builds, then cools down for peak_middle', () => {
    const items = [
      item('low1', 120, 10),
      item('low2', 120, 20),
      item('mid1', 120, 40),
      item('mid2', 120, 50),
      item('high1', 120, 80),
      item('high2', 120, 90),
    ];
    const shaped = ids(shapeEnergyCurve(items, 'peak_middle', createRandom(7)));

    expect(shaped).toHaveLength(6);
    expect(['mid1', 'mid2']).toContain(shaped[0]);
    expect(shaped.slice(1, 4).sort()).toEqual(
      ['high1', 'high2', 'mid1', 'mid2'].filter((id) => id !== shaped[0]).sort()
    );
    expect(shaped.slice(4).sort()).toEqual(['low1', 'low2']);
  });
});

describe('sequence', () => {
  it('returns an empty plan for no input', () => {
    const plan = sequence([]);
    expect(plan.entries).toEqual([]);
    expect(plan.transitions).toEqual([]);
    expect(plan.qualityScore).toBe(0);
  });

  it('scores a single cut as perfect', () => {
    const plan = sequence([item('solo', 128, 70)]);
    expect(ids(plan.entries)).toEqual(['solo']);
    expect(plan.qualityScore).toBe(100);
  });

  it('orders and scores the tempo-smooth example', () => {
    const items = [item('a', 100, 40, 'en'), item('b', 140, 90, 'hi'), item('c', 120, 60, 'es')];
    const plan = sequence(items, { strategy: 'tempo_smooth' });

    expect(ids(plan.entries)).toEqual(['c', 'a', 'b']);
    expect(plan.transitions).toEqual([
      { from: 'c', to: 'a', tempoDelta: 20, energyDelta: 0.2, sameLanguage: false, smoothnessScore: 50 },
      { from: 'a', to: 'b', tempoDelta: 40, energyDelta: 0.5, sameLanguage: false, smoothnessScore: 0 },
    ]);
    expect(plan.qualityScore).toBe(25);
  });

  it('applies the descending curve example exactly', () => {
    const items = [item('e30', 120, 30), item('e90', 120, 90), item('e60', 120, 60)];
    const plan = sequence(items, { strategy: 'energy_curve', energyCurve: 'descending' });
    expect(plan.entries.map((e) => e.segment.energyScore)).toEqual([90, 60, 30]);
  });

  it('penalises same-language runs that remain', () => {
    const items = [item('a', 120, 50), item('b', 120, 50), item('c', 120, 50)];
    const plan = sequence(items, { strategy: 'tempo_smooth', maxSameLanguage: 2 });
    // two perfect transitions, one window of three English cuts
    expect(plan.qualityScore).toBe(95);
    expect(plan.notes).toContain('1 run(s) of more than 2 same-language segments remain');
  });

  it('is deterministic for the same input and seed', () => {
    const items = [
      item('a', 100, 20, 'en'),
      item('b', 128, 85, 'hi'),
      item('c', 124, 55, 'en'),
      item('d', 90, 35, 'es'),
      item('e', 140, 95, 'hi'),
      item('f', 118, 65, 'en'),
      item('g', 110, 45, 'ko'),
    ];
    const first = sequence(items, { seed: 42 });
    const second = sequence(items, { seed: 42 });

    expect(ids(second.entries)).toEqual(ids(first.entries));
    expect(second.qualityScore).toBe(first.qualityScore);
    expect(longestLanguageRun(first.entries)).toBeLessThanOrEqual(2);
    expect(countLanguageRuns(first.entries, 2)).toBe(0);
  });
});

describe('suggestNext', () => {
  it('ranks candidates by tempo, energy and language change', () => {
    const current = item('now', 120, 60, 'en');
    const candidates = [current, item('same', 120, 60, 'en'), item('near', 125, 70, 'hi'), item('unknown', null, 60, 'es')];

    const ranked = suggestNext(current, candidates, ['en']);
    expect(ranked.map((r) => [r.item.id, r.score])).toEqual([
      ['near', 106],
      ['unknown', 105],
      ['same', 100],
    ]);
  });

  it('returns nothing without candidates', () => {
    expect(suggestNext(item('now', 120, 60), [])).toEqual([]);
  });
});
