import phraseData from '../../data/commentary-phrases.json';
import type { CommentaryContext, CommentaryCue, CommentaryFrequency } from '../../types/mix.types';
import { round } from '../analysis/dsp';

// ===========================================================================
// Commentary Planner
//
// Decides what the DJ says and when, on the timeline of the finished mix:
//
//   minimal    intro + outro
//   moderate   intro + mid + a peak-energy cue + outro
//   frequent   moderate + a cue at the start of every later song: a language
//              switch announcement, or a remark on the energy change
//
// Song cues now and then name the tempo.
//
// Cue times are provisional until the voice clips exist; scheduleCues()
// then fits the rendered clips into the mix without overlaps.
// ===========================================================================

export interface PhraseTable {
  /** Voice style name → provider voice id */
  voices: Record<string, string>;
  intro: string[];
  themedIntro: string[];
  mid: string[];
  languageSwitch: string[];
  peak: string[];
  energyUp: string[];
  energyDown: string[];
  energySmooth: string[];
  /** Tempo remarks; `{bpm}` is filled in */
  bpm: string[];
  outro: string[];
  /** Language → place name used in switch announcements */
  places: Record<string, string>;
}

export const DEFAULT_PHRASES: PhraseTable = phraseData;

/** One song's span on the final timeline. */
export interface TimelineSlot {
  start: number;
  duration: number;
  language: string;
  title: string;
  /** 0-100 */
  energyScore?: number;
  tempoBpm?: number | null;
}

export interface MixTimeline {
  totalDuration: number;
  slots: TimelineSlot[];
}

const INTRO_CUE_TIME = 2.0;
const OUTRO_LEAD_SECONDS = 8;
const OUTRO_MIN_SHARE = 0.85;
const SWITCH_CUE_DELAY = 1.0;
/** Energy change (0-100 scale) that counts as going up or down */
const ENERGY_SHIFT = 15;
/** One song cue in this many names the tempo */
const BPM_CUE_EVERY = 5;
/** Silence kept between two voice clips */
const CUE_GAP_SECONDS = 0.5;

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => values[key] ?? '');
}

const displayLanguage = (language: string): string =>
  language ? language.charAt(0).toUpperCase() + language.slice(1) : 'Global';

function choose(list: string[], index: number): string {
  return list.length > 0 ? list[index % list.length] : '';
}

/** Index of the most energetic song; -1 when energies are unknown */
function peakIndex(slots: TimelineSlot[]): number {
  let best = -1;
  slots.forEach((slot, i) => {
    if (slot.energyScore === undefined) return;
    const bestScore = best >= 0 ? slots[best].energyScore : undefined;
    if (bestScore === undefined || slot.energyScore > bestScore) best = i;
  });
  return best;
}

function energyPhrases(previous: TimelineSlot, current: TimelineSlot, phrases: PhraseTable): string[] | undefined {
  if (previous.energyScore === undefined || current.energyScore === undefined) return undefined;
  const change = current.energyScore - previous.energyScore;
  if (change > ENERGY_SHIFT) return phrases.energyUp;
  if (change < -ENERGY_SHIFT) return phrases.energyDown;
  return phrases.energySmooth;
}

function slotAt(timeline: MixTimeline, time: number): TimelineSlot | undefined {
  return (
    timeline.slots.find((s) => time >= s.start && time < s.start + s.duration) ??
    timeline.slots[timeline.slots.length - 1]
  );
}

/**
 * Plan the commentary cues for a mix. Phrase choice is deterministic for a
 * given timeline.
 */
export function planCommentaryCues(
  timeline: MixTimeline,
  context: CommentaryContext = {},
  frequency: CommentaryFrequency = 'moderate',
  phrases: PhraseTable = DEFAULT_PHRASES
): CommentaryCue[] {
  const d = timeline.totalDuration;
  if (!(d > 0) || timeline.slots.length === 0) return [];

  const variant = Math.floor(d);
  const cues: CommentaryCue[] = [];
  const cue = (kind: CommentaryCue['kind'], scheduledTime: number, text: string): CommentaryCue => ({
    kind,
    text: text.trim(),
    scheduledTime: round(scheduledTime, 3),
    clipDuration: 0,
  });

  // intro
  let intro = context.theme
    ? fillTemplate(choose(phrases.themedIntro, variant), { theme: context.theme })
    : choose(phrases.intro, variant);
  if (context.audience) intro = `Hey ${context.audience}! ${intro}`;
  if (context.shoutouts && context.shoutouts.length > 0) {
    intro += ` Shout out to ${context.shoutouts.join(', ')}!`;
  }
  cues.push(cue('intro', INTRO_CUE_TIME, intro));

  // mid
  if (frequency !== 'minimal') {
    const midTime = d / 2;
    const language = slotAt(timeline, midTime)?.language ?? '';
    cues.push(cue('mid', midTime, fillTemplate(choose(phrases.mid, variant + 1), { language: displayLanguage(language) })));
  }

  // song cues; the first song already has the intro
  if (frequency !== 'minimal') {
    const peak = peakIndex(timeline.slots);
    timeline.slots.forEach((slot, i) => {
      if (i === 0) return;
      const previous = timeline.slots[i - 1];
      let planned: { kind: CommentaryCue['kind']; text: string } | undefined;

      if (frequency === 'frequent' && slot.language !== previous.language) {
        planned = {
          kind: 'transition',
          text: fillTemplate(choose(phrases.languageSwitch, variant + i), {
            language: displayLanguage(slot.language),
            place: phrases.places[slot.language] ?? displayLanguage(slot.language),
          }),
        };
      } else if (i === peak) {
        planned = { kind: 'peak', text: choose(phrases.peak, variant + i) };
      } else if (frequency === 'frequent') {
        const options = energyPhrases(previous, slot, phrases);
        if (options) planned = { kind: 'energy', text: choose(options, variant + i) };
      }
      if (!planned) return;

      if (slot.tempoBpm && (variant + i) % BPM_CUE_EVERY === 0) {
        planned.text += ` ${fillTemplate(choose(phrases.bpm, variant + i), { bpm: String(Math.round(slot.tempoBpm)) })}`;
      }
      cues.push(cue(planned.kind, slot.start + SWITCH_CUE_DELAY, planned.text));
    });
  }

  // outro
  cues.push(cue('outro', Math.max(d - OUTRO_LEAD_SECONDS, d * OUTRO_MIN_SHARE), choose(phrases.outro, variant + 2)));

  return cues.sort((a, b) => a.scheduledTime - b.scheduledTime);
}

export interface ScheduleResult {
  cues: CommentaryCue[];
  dropped: CommentaryCue[];
}

/**
 * Fit rendered cues into the mix: a cue starting in the last second is
 * pulled back so its clip ends a second before the end, a cue overlapping
 * the previous one is pushed after it, and a cue that then runs past the
 * end is dropped.
 */
export function scheduleCues(cues: CommentaryCue[], timelineDuration: number): ScheduleResult {
  const ordered = [...cues].sort((a, b) => a.scheduledTime - b.scheduledTime);
  const scheduled: CommentaryCue[] = [];
  const dropped: CommentaryCue[] = [];
  let previousEnd = -Infinity;

  for (const c of ordered) {
    let start = Math.max(0, c.scheduledTime);
    if (start >= timelineDuration - 1) {
      start = Math.max(0, timelineDuration - c.clipDuration - 1);
    }
    if (start < previousEnd + CUE_GAP_SECONDS) {
      start = previousEnd + CUE_GAP_SECONDS;
    }
    if (start + c.clipDuration > timelineDuration) {
      dropped.push(c);
      continue;
    }

    scheduled.push({ ...c, scheduledTime: round(start, 3) });
    previousEnd = start + c.clipDuration;
  }

  return { cues: scheduled, dropped };
}

/** Map a voice style name onto the id a provider expects. */
export function resolveVoice(style: string, phrases: PhraseTable = DEFAULT_PHRASES): string {
  return phrases.voices[style] ?? style;
}
