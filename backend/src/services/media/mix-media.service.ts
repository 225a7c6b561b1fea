/**
 * Mix Media Service
 *
 * Turns the pure command builders in filter-graphs.ts into files on disk for
 * one export. Every transcoder call is bracketed by the job's cancellation
 * checkpoint, and every failure is converted into a CompositionError so the
 * pipeline can decide whether it is fatal.
 */

import fs from 'fs';
import path from 'path';
import type winston from 'winston';
import { errorMessage } from '../../config/logger';
import type { TransitionStyle } from '../../types/mix.types';
import { CompositionError } from '../composition/errors';
import { describeFailures, runFallbackChain } from '../composition/fallback-chain';
import {
  commentaryMixCommand,
  computeTransitionTiming,
  concatCommand,
  concatListContent,
  pickTransition,
  segmentCommand,
  syncFixCommand,
  titleCardCommand,
  transitionCommand,
  type OutputProfile,
  type PlacedClip,
  type SegmentSpec,
  type TitleCardSpec,
  type TransitionTiming,
} from './filter-graphs';
import type { MediaTranscoder, StreamDurations, TranscodeCommand } from './transcoder.interface';

export interface MixMediaOptions {
  transcoder: MediaTranscoder;
  profile: OutputProfile;
  /** Directory for intermediate files; owned by the job workspace */
  workDir: string;
  transition: {
    requested: number;
    minimum: number;
    maxShare: number;
  };
  /** Stream-duration disagreement (s) above which a clip is re-cut */
  syncTolerance: number;
  /** Throws when the job has been cancelled */
  checkpoint: () => void;
  logger: winston.Logger;
}

export type JoinMethod = 'transition' | 'concat';

export interface JoinResult {
  path: string;
  /** Start of each input clip on the joined timeline, in seconds */
  clipStarts: number[];
  methods: JoinMethod[];
  warnings: string[];
}

export interface CommentaryMixResult {
  path: string;
  durations: StreamDurations;
}

const SYNC_WARNING_THRESHOLD = 0.5;

export class MixMediaService {
  private tempCounter = 0;

  constructor(private readonly opts: MixMediaOptions) {}

  // ==========================================================================
  // Transcoder access
  // ==========================================================================

  private async run(command: TranscodeCommand, stage: string): Promise<void> {
    this.opts.checkpoint();
    const result = await this.opts.transcoder.run(command);
    this.opts.checkpoint();

    if (!result.ok) {
      const kind = result.resource ? 'resource' : 'stage';
      throw new CompositionError(kind, stage, `${command.label}: ${result.message}`);
    }
    if (!fs.existsSync(command.outputPath)) {
      throw new CompositionError('stage', stage, `${command.label}: transcoder produced no output`);
    }
  }

  async probe(filePath: string): Promise<StreamDurations> {
    this.opts.checkpoint();
    try {
      return await this.opts.transcoder.probe(filePath);
    } catch (error) {
      throw new CompositionError('stage', 'probe', errorMessage(error));
    }
  }

  private tempPath(prefix: string, ext = '.mp4'): string {
    this.tempCounter += 1;
    return path.join(this.opts.workDir, `${prefix}_${this.tempCounter}${ext}`);
  }

  // ==========================================================================
  // Clips
  // ==========================================================================

  async renderTitleCard(spec: TitleCardSpec): Promise<string> {
    await this.run(titleCardCommand(spec, this.opts.profile), spec.kind);
    return spec.outputPath;
  }

  async materializeSegment(spec: SegmentSpec): Promise<string> {
    if (!(spec.endTime > spec.startTime)) {
      throw new CompositionError('stage', 'processing', `${spec.label}: empty time window`);
    }
    await this.run(segmentCommand(spec, this.opts.profile), 'processing');
    return spec.outputPath;
  }

  // ==========================================================================
  // Joining
  // ==========================================================================

  /** Re-cut a clip whose streams disagree by more than the tolerance. */
  async normalizeSync(clipPath: string, stage: string): Promise<string> {
    const d = await this.probe(clipPath);
    if (!(d.video > 0 && d.audio > 0) || Math.abs(d.video - d.audio) <= this.opts.syncTolerance) {
      return clipPath;
    }

    const fixed = this.tempPath('sync');
    this.opts.logger.info('Fixing A/V sync', { clip: path.basename(clipPath), video: d.video, audio: d.audio });
    await this.run(syncFixCommand(`sync-${path.basename(clipPath)}`, clipPath, Math.min(d.video, d.audio), fixed, this.opts.profile), stage);
    return fixed;
  }

  /** Straight re-encoded concatenation through the concat demuxer. */
  async plainConcat(clips: string[], outputPath: string): Promise<void> {
    const normalized: string[] = [];
    for (const clip of clips) {
      normalized.push(await this.normalizeSync(clip, 'concatenating'));
    }

    const listPath = this.tempPath('concat', '.txt');
    await fs.promises.writeFile(listPath, concatListContent(normalized));
    await this.run(concatCommand(`concat-${path.basename(outputPath)}`, listPath, outputPath, this.opts.profile), 'concatenating');
  }

  /**
   * Join two clips with a visual transition and matching audio crossfade,
   * degrading to a plain concatenation of the same pair.
   */
  async joinPair(
    firstPath: string,
    secondPath: string,
    style: TransitionStyle,
    index: number,
    outputPath: string
  ): Promise<{ method: JoinMethod; timing: TransitionTiming; firstDuration: number; warnings: string[] }> {
    const [first, second] = [await this.probe(firstPath), await this.probe(secondPath)];
    const timing = computeTransitionTiming(first, second, this.opts.transition);

    const outcome = await runFallbackChain<JoinMethod>([
      {
        name: `transition:${style}`,
        attempt: async () => {
          await this.run(
            transitionCommand(
              { label: `transition-${index}`, firstPath, secondPath, style, timing, outputPath },
              this.opts.profile
            ),
            'concatenating'
          );
          return 'transition';
        },
      },
      {
        name: 'plain-concat',
        attempt: async () => {
          await this.plainConcat([firstPath, secondPath], outputPath);
          return 'concat';
        },
      },
    ]);

    if (!outcome.ok) {
      throw new CompositionError('input', 'concatenating', `Could not join clips: ${describeFailures(outcome.failures)}`);
    }

    const warnings = outcome.failures.map((f) => `Join ${index} fell back to plain concatenation (${f.strategy}: ${f.message})`);
    return { method: outcome.value, timing, firstDuration: timing.firstDuration, warnings };
  }

  /**
   * Join clips left to right. The running result is the left input of every
   * join, so each boundary sees the real, already-encoded durations.
   */
  async joinAll(
    clips: string[],
    requested: TransitionStyle | 'random',
    palette: readonly TransitionStyle[],
    outputPath: string
  ): Promise<JoinResult> {
    if (clips.length === 0) {
      throw new CompositionError('input', 'concatenating', 'Nothing to join');
    }
    if (clips.length === 1) {
      await fs.promises.copyFile(clips[0], outputPath);
      return { path: outputPath, clipStarts: [0], methods: [], warnings: [] };
    }

    const clipStarts = [0];
    const methods: JoinMethod[] = [];
    const warnings: string[] = [];
    let current = clips[0];

    for (let i = 1; i < clips.length; i++) {
      const style = pickTransition(requested, i - 1, palette);
      const target = i === clips.length - 1 ? outputPath : this.tempPath('joined');
      this.opts.logger.info(`Creating transition ${i}/${clips.length - 1}: ${style}`);

      const joined = await this.joinPair(current, clips[i], style, i, target);
      clipStarts.push(joined.method === 'transition' ? joined.timing.offset : joined.firstDuration);
      methods.push(joined.method);
      warnings.push(...joined.warnings);
      current = target;
    }

    const final = await this.probe(outputPath);
    if (Math.abs(final.video - final.audio) > SYNC_WARNING_THRESHOLD) {
      this.opts.logger.warn('A/V sync issue in joined output', { video: final.video, audio: final.audio });
    }

    return { path: outputPath, clipStarts, methods, warnings };
  }

  // ==========================================================================
  // Commentary
  // ==========================================================================

  async overlayCommentary(videoPath: string, clips: PlacedClip[], duckLevel: number, voiceBoost: number, outputPath: string): Promise<CommentaryMixResult> {
    if (clips.length === 0) {
      throw new CompositionError('stage', 'commentary', 'No voice clips to mix');
    }
    const input = await this.normalizeSync(videoPath, 'commentary');
    await this.run(commentaryMixCommand(input, clips, { duckLevel, voiceBoost }, outputPath, this.opts.profile), 'commentary');
    const durations = await this.probe(outputPath);
    return { path: outputPath, durations };
  }
}
