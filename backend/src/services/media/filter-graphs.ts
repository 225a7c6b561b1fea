/**
 * FFmpeg command builders for every clip the mix is made of.
 *
 * Pure functions: each returns a TranscodeCommand description and never touches
 * the filesystem, so timing and filter strings can be checked in isolation.
 *
 * All clips share one output profile (H.264 + AAC 44.1 kHz stereo, constant
 * frame rate) so that any two of them can be joined without renegotiating
 * formats.
 */

import { round } from '../analysis/dsp';
import type { TransitionStyle } from '../../types/mix.types';
import type { StreamDurations, TranscodeCommand } from './transcoder.interface';
import { playableDuration } from './transcoder.interface';

export interface OutputProfile {
  width: number;
  height: number;
  fps: number;
  audioSampleRate: number;
}

/** Seconds formatted for filter arguments (millisecond precision). */
export const fmt = (seconds: number): string => String(round(seconds, 3));

export function encodeOptions(profile: OutputProfile): string[] {
  return [
    '-c:v', 'libx264',
    '-preset', 'fast',
    '-pix_fmt', 'yuv420p',
    '-c:a', 'aac',
    '-ar', String(profile.audioSampleRate),
    '-ac', '2',
    '-vsync', 'cfr',
    '-r', String(profile.fps),
    '-movflags', '+faststart',
  ];
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

/** Escape a string for use inside a quoted drawtext `text='...'` argument. */
export function escapeDrawtext(text: string): string {
  if (!text) return '';
  return text
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "'\\''")
    .replace(/:/g, '\\:')
    .replace(/%/g, '\\%')
    .replace(/\[/g, '\\[')
    .replace(/\]/g, '\\]');
}

// ---------------------------------------------------------------------------
// Title cards (intro / outro)
// ---------------------------------------------------------------------------

export interface TitleCardSpec {
  kind: 'intro' | 'outro';
  text: string;
  subtitle?: string;
  duration: number;
  outputPath: string;
}

export function titleCardCommand(spec: TitleCardSpec, profile: OutputProfile): TranscodeCommand {
  const { width, height } = profile;
  const d = spec.duration;
  const fadeStart = fmt(Math.max(0, d - 1));

  let video: string;
  if (spec.kind === 'intro') {
    const titleSize = Math.max(48, Math.floor(height / 10));
    const subtitleSize = Math.max(24, Math.floor(height / 24));
    // text appears after half a second and is fully visible after 1.5 s
    const alpha = 'if(lt(t,0.5),0,if(lt(t,1.5),(t-0.5),1))';
    const parts = [
      `drawtext=text='${escapeDrawtext(spec.text)}':fontsize=${titleSize}:fontcolor=white:` +
        `x=(w-text_w)/2:y=(h-text_h)/2-40:alpha='${alpha}'`,
    ];
    if (spec.subtitle) {
      parts.push(
        `drawtext=text='${escapeDrawtext(spec.subtitle)}':fontsize=${subtitleSize}:fontcolor=white@0.8:` +
          `x=(w-text_w)/2:y=(h/2)+30:alpha='${alpha}'`
      );
    }
    parts.push('fade=t=in:st=0:d=0.5');
    video = `[0:v]${parts.join(',')}[v]`;
  } else {
    const textSize = Math.max(36, Math.floor(height / 14));
    video =
      `[0:v]drawtext=text='${escapeDrawtext(spec.text)}':fontsize=${textSize}:fontcolor=white:` +
      `x=(w-text_w)/2:y=(h-text_h)/2:alpha='if(lt(t,${fadeStart}),1,1-(t-${fadeStart}))',` +
      `fade=t=out:st=${fadeStart}:d=1[v]`;
  }
  const audio = `[1:a]atrim=0:${fmt(d)},afade=t=out:st=${fadeStart}:d=1[a]`;

  return {
    label: spec.kind,
    inputs: [
      { source: `color=c=black:s=${width}x${height}:d=${fmt(d)}:r=${profile.fps}`, options: ['-f', 'lavfi'] },
      { source: `anullsrc=r=${profile.audioSampleRate}:cl=stereo`, options: ['-f', 'lavfi'] },
    ],
    filterComplex: `${video};${audio}`,
    outputOptions: ['-map', '[v]', '-map', '[a]', ...encodeOptions(profile), '-t', fmt(d)],
    outputPath: spec.outputPath,
  };
}

// ---------------------------------------------------------------------------
// Segment extraction
// ---------------------------------------------------------------------------

export interface SegmentOverlay {
  title: string;
  artist: string;
  language?: string;
}

export interface SegmentSpec {
  label: string;
  sourcePath: string;
  startTime: number;
  endTime: number;
  overlay?: SegmentOverlay;
  outputPath: string;
}

/**
 * Fade envelope for overlay text: 1 s fade in, hold, 1 s fade out by ~6 s.
 * Clips under 3 s get a plain fade in and out with no hold.
 */
export function overlayAlpha(duration: number): string {
  const show = Math.max(2, Math.min(6, duration - 1));
  const out = fmt(show - 1);
  return `if(lt(t,1),t,if(lt(t,${out}),1,1-(t-${out})))`;
}

export function segmentCommand(spec: SegmentSpec, profile: OutputProfile): TranscodeCommand {
  const { width, height } = profile;
  const duration = spec.endTime - spec.startTime;

  const filters = [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
    'setsar=1',
  ];

  if (spec.overlay) {
    const titleSize = Math.max(28, Math.floor(height / 20));
    const artistSize = Math.max(20, Math.floor(height / 28));
    const badgeSize = Math.max(16, Math.floor(height / 36));
    const padding = Math.floor(height / 20);
    const alpha = overlayAlpha(duration);

    filters.push(
      `drawtext=text='${escapeDrawtext(spec.overlay.title)}':fontsize=${titleSize}:fontcolor=white:` +
        `borderw=2:bordercolor=black@0.7:x=${padding}:y=h-${padding + artistSize + titleSize + 10}:alpha='${alpha}'`,
      `drawtext=text='${escapeDrawtext(spec.overlay.artist)}':fontsize=${artistSize}:fontcolor=white@0.85:` +
        `borderw=1:bordercolor=black@0.6:x=${padding}:y=h-${padding + artistSize}:alpha='${alpha}'`
    );
    if (spec.overlay.language) {
      filters.push(
        `drawtext=text='  ${escapeDrawtext(spec.overlay.language.toUpperCase())}  ':fontsize=${badgeSize}:` +
          `fontcolor=white:box=1:boxcolor=blue@0.7:boxborderw=4:x=w-${padding}-text_w:y=${padding}:alpha='${alpha}'`
      );
    }
  }

  filters.push('setpts=PTS-STARTPTS', `fps=${profile.fps}`);

  return {
    label: spec.label,
    inputs: [{ source: spec.sourcePath, options: ['-ss', fmt(spec.startTime)] }],
    filterComplex: `[0:v]${filters.join(',')}[v];[0:a]asetpts=PTS-STARTPTS,aresample=${profile.audioSampleRate}[a]`,
    outputOptions: ['-map', '[v]', '-map', '[a]', '-t', fmt(duration), ...encodeOptions(profile), '-shortest'],
    outputPath: spec.outputPath,
  };
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

export interface TransitionTimingOptions {
  requested: number;
  minimum: number;
  /** Transition may not exceed this share of either clip */
  maxShare: number;
}

export interface TransitionTiming {
  /** Reconciled length of each clip: both of its streams are trimmed to this */
  firstDuration: number;
  secondDuration: number;
  duration: number;
  /** Point in the first clip where the second starts overlapping */
  offset: number;
}

/**
 * Both streams of each clip are cut to the shorter of the two before the
 * transition is placed, so the visual and audio crossfades share one timing.
 */
export function computeTransitionTiming(
  first: StreamDurations,
  second: StreamDurations,
  opts: TransitionTimingOptions
): TransitionTiming {
  const firstDuration = playableDuration(first);
  const secondDuration = playableDuration(second);

  const capped = Math.min(opts.requested, firstDuration * opts.maxShare, secondDuration * opts.maxShare);
  const duration = Math.max(opts.minimum, capped);
  const offset = Math.max(0, firstDuration - duration);

  return { firstDuration, secondDuration, duration, offset };
}

export interface TransitionSpec {
  label: string;
  firstPath: string;
  secondPath: string;
  style: TransitionStyle;
  timing: TransitionTiming;
  outputPath: string;
}

export function transitionCommand(spec: TransitionSpec, profile: OutputProfile): TranscodeCommand {
  const { timing } = spec;
  const d1 = fmt(timing.firstDuration);
  const d2 = fmt(timing.secondDuration);
  const t = fmt(timing.duration);
  const offset = fmt(timing.offset);
  const delayMs = Math.round(timing.offset * 1000);

  const filterComplex = [
    `[0:v]trim=0:${d1},setpts=PTS-STARTPTS,fps=${profile.fps}[v0]`,
    `[1:v]trim=0:${d2},setpts=PTS-STARTPTS,fps=${profile.fps}[v1]`,
    `[0:a]atrim=0:${d1},asetpts=PTS-STARTPTS[a0]`,
    `[1:a]atrim=0:${d2},asetpts=PTS-STARTPTS[a1]`,
    `[v0][v1]xfade=transition=${spec.style}:duration=${t}:offset=${offset}[v]`,
    `[a0]afade=t=out:st=${offset}:d=${t}[a0f]`,
    `[a1]adelay=${delayMs}|${delayMs},afade=t=in:st=${offset}:d=${t}[a1f]`,
    '[a0f][a1f]amix=inputs=2:duration=longest:dropout_transition=0:normalize=0[a]',
  ].join(';');

  return {
    label: spec.label,
    inputs: [{ source: spec.firstPath }, { source: spec.secondPath }],
    filterComplex,
    outputOptions: ['-map', '[v]', '-map', '[a]', ...encodeOptions(profile)],
    outputPath: spec.outputPath,
  };
}

/** Transition style for the join at `index`; "random" walks the palette round-robin. */
export function pickTransition(
  requested: TransitionStyle | 'random',
  index: number,
  palette: readonly TransitionStyle[]
): TransitionStyle {
  if (requested !== 'random') return requested;
  return palette[index % palette.length];
}

// ---------------------------------------------------------------------------
// Plain concatenation and sync repair
// ---------------------------------------------------------------------------

/** Re-cut both streams of a clip to `duration` seconds. */
export function syncFixCommand(
  label: string,
  inputPath: string,
  duration: number,
  outputPath: string,
  profile: OutputProfile
): TranscodeCommand {
  return {
    label,
    inputs: [{ source: inputPath }],
    outputOptions: ['-t', fmt(duration), ...encodeOptions(profile)],
    outputPath,
  };
}

/** Contents of an ffmpeg concat-demuxer list file. */
export function concatListContent(paths: string[]): string {
  return paths.map((p) => `file '${p.replace(/'/g, "'\\''")}'\n`).join('');
}

export function concatCommand(
  label: string,
  listPath: string,
  outputPath: string,
  profile: OutputProfile
): TranscodeCommand {
  return {
    label,
    inputs: [{ source: listPath, options: ['-f', 'concat', '-safe', '0'] }],
    outputOptions: encodeOptions(profile),
    outputPath,
  };
}

// ---------------------------------------------------------------------------
// Commentary overlay
// ---------------------------------------------------------------------------

export interface PlacedClip {
  path: string;
  /** Seconds from the start of the mix */
  start: number;
  duration: number;
}

export interface CommentaryMixOptions {
  /** Music gain while a voice clip plays, 0-1 */
  duckLevel: number;
  /** Voice gain multiplier */
  voiceBoost: number;
}

export function duckingExpression(clips: PlacedClip[], duckLevel: number): string {
  const windows = clips.map((c) => `between(t,${fmt(c.start)},${fmt(c.start + c.duration)})`);
  return `if(${windows.join('+')},${duckLevel},1)`;
}

export function commentaryMixCommand(
  videoPath: string,
  clips: PlacedClip[],
  opts: CommentaryMixOptions,
  outputPath: string,
  profile: OutputProfile
): TranscodeCommand {
  const parts = [`[0:a]volume='${duckingExpression(clips, opts.duckLevel)}':eval=frame[music]`];
  const labels = ['[music]'];

  clips.forEach((clip, i) => {
    const delayMs = Math.round(clip.start * 1000);
    parts.push(`[${i + 1}:a]aresample=${profile.audioSampleRate},adelay=${delayMs}|${delayMs},volume=${opts.voiceBoost}[vo${i}]`);
    labels.push(`[vo${i}]`);
  });

  // duration=first: the mix never outlasts the music bed
  parts.push(`${labels.join('')}amix=inputs=${labels.length}:duration=first:dropout_transition=0:normalize=0[aout]`);

  return {
    label: 'commentary',
    inputs: [{ source: videoPath }, ...clips.map((c) => ({ source: c.path }))],
    filterComplex: parts.join(';'),
    outputOptions: ['-map', '0:v', '-map', '[aout]', ...encodeOptions(profile), '-shortest'],
    outputPath,
  };
}

// ---------------------------------------------------------------------------
// Voice clips
// ---------------------------------------------------------------------------

/** Light room echo, a low-end lift and loudness normalisation */
export const VOICE_POLISH_FILTER = 'aecho=0.8:0.7:40:0.3,equalizer=f=100:width_type=o:width=2:g=3,loudnorm';

export function voicePolishCommand(label: string, inputPath: string, outputPath: string, sampleRate: number): TranscodeCommand {
  return {
    label,
    inputs: [{ source: inputPath }],
    outputOptions: ['-af', VOICE_POLISH_FILTER, '-ar', String(sampleRate)],
    outputPath,
  };
}
