import fs from 'fs';
import path from 'path';
import type winston from 'winston';
import { RESOLUTIONS, type MixSettings } from '../../config/env';
import { errorMessage, jobLogger } from '../../config/logger';
import {
  TRANSITION_STYLES,
  type CommentaryCue,
  type CompositionResult,
  type ExportOptions,
  type MixExportRequest,
  type SequencerItem,
} from '../../types/mix.types';
import { planCommentaryCues, scheduleCues, type MixTimeline } from '../commentary/commentary-planner.service';
import type { VoiceManager } from '../commentary/voice-manager.service';
import type { OutputProfile } from '../media/filter-graphs';
import { MixMediaService } from '../media/mix-media.service';
import { playableDuration, type MediaTranscoder } from '../media/transcoder.interface';
import type { SourceCache } from '../sources/source-cache';
import { CompositionError, JobCancelledError, isFatal } from './errors';
import type { JobHandle } from './job-registry';
import { isTerminal } from './job-state-machine';
import { JobWorkspace } from './workspace';

// ===========================================================================
// Composition Pipeline
//
//   intro ──▶ segments (fetch + cut, per segment) ──▶ outro
//         ──▶ transition-joined concatenation ──▶ commentary ──▶ finalize
//
// Intro, outro, single segments, single transitions and commentary are
// best-effort: their failures become warnings on the job. Too few usable
// segments, resource exhaustion and cancellation end the job.
// ===========================================================================

export interface PipelineDeps {
  settings: MixSettings;
  transcoder: MediaTranscoder;
  sources: SourceCache;
  voices: VoiceManager;
}

interface PreparedSegment {
  path: string;
  entry: SequencerItem;
}

interface RunContext {
  handle: JobHandle;
  log: winston.Logger;
  workspace: JobWorkspace;
  media: MixMediaService;
  options: ExportOptions;
}

const PROGRESS = {
  intro: 5,
  segmentsStart: 10,
  segmentsSpan: 70,
  processingStep: 3,
  outro: 82,
  concatenate: 84,
  commentary: 88,
  voicesStart: 90,
  voicesSpan: 6,
  commentaryMix: 97,
  finalize: 98,
} as const;

export const MIN_SEGMENTS = 2;

export function outputFileName(name: string): string {
  const safe = name.trim().replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return safe || 'mix';
}

export class CompositionPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Run one export to its terminal state. Never throws: the outcome is on
   * the job record, and the result is returned only when the job completed.
   */
  async run(handle: JobHandle, request: MixExportRequest): Promise<CompositionResult | undefined> {
    const log = jobLogger(handle.id);
    let workspace: JobWorkspace | undefined;

    log.info('Composition started', { name: request.name, segments: request.entries.length });

    try {
      if (request.entries.length < MIN_SEGMENTS) {
        throw new CompositionError('input', 'pending', `At least ${MIN_SEGMENTS} segments are required, got ${request.entries.length}`);
      }
      handle.checkpoint();

      workspace = await JobWorkspace.create(this.deps.settings.paths.workDir, handle.id);
      const ctx: RunContext = {
        handle,
        log,
        workspace,
        media: this.createMedia(handle, request.options, workspace, log),
        options: request.options,
      };

      const result = await this.compose(ctx, request);
      log.info('Composition complete', { outputPath: result.outputPath, duration: result.durationSeconds });
      return result;
    } catch (error) {
      this.settle(handle, log, error);
      return undefined;
    } finally {
      await workspace?.dispose();
    }
  }

  private createMedia(handle: JobHandle, options: ExportOptions, workspace: JobWorkspace, log: winston.Logger): MixMediaService {
    const c = this.deps.settings.composition;
    const profile: OutputProfile = { ...RESOLUTIONS[options.quality], fps: c.fps, audioSampleRate: c.audioSampleRate };
    return new MixMediaService({
      transcoder: this.deps.transcoder,
      profile,
      workDir: workspace.dir,
      transition: {
        requested: options.transitionDuration,
        minimum: c.minTransitionDuration,
        maxShare: c.maxTransitionShare,
      },
      syncTolerance: c.syncTolerance,
      checkpoint: () => handle.checkpoint(),
      logger: log,
    });
  }

  private settle(handle: JobHandle, log: winston.Logger, error: unknown): void {
    if (isTerminal(handle.snapshot().status)) {
      log.error('Error after job reached a terminal state', { error: errorMessage(error) });
      return;
    }
    if (error instanceof JobCancelledError) {
      log.info('Composition cancelled');
      handle.cancel();
      return;
    }
    const stage = error instanceof CompositionError ? error.stage : handle.snapshot().status;
    log.error('Composition failed', { stage, error: errorMessage(error) });
    handle.fail({ stage, message: errorMessage(error) });
  }

  private warn(ctx: RunContext, message: string): void {
    ctx.log.warn(message);
    ctx.handle.warn(message);
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async compose(ctx: RunContext, request: MixExportRequest): Promise<CompositionResult> {
    const { handle, media, options } = ctx;
    const c = this.deps.settings.composition;
    const total = request.entries.length;

    // ── 1. Intro ──
    let introPath: string | undefined;
    if (options.intro) {
      handle.update({ status: 'processing', progress: PROGRESS.intro, currentStage: 'Creating intro' });
      introPath = await this.bestEffort(ctx, 'intro', () =>
        media.renderTitleCard({
          kind: 'intro',
          text: options.introTitle,
          subtitle: `${total} tracks`,
          duration: c.introDuration,
          outputPath: ctx.workspace.file('intro.mp4'),
        })
      );
    }

    // ── 2. Segments ──
    const segments: PreparedSegment[] = [];
    for (const [i, entry] of request.entries.entries()) {
      const prepared = await this.prepareSegment(ctx, entry, i, total);
      if (prepared) segments.push(prepared);
    }
    if (segments.length < MIN_SEGMENTS) {
      throw new CompositionError(
        'input',
        'processing',
        `Only ${segments.length} of ${total} segments could be prepared; at least ${MIN_SEGMENTS} are required`
      );
    }

    // ── 3. Outro ──
    let outroPath: string | undefined;
    if (options.outro) {
      handle.update({ status: 'processing', progress: PROGRESS.outro, currentStage: 'Creating outro' });
      outroPath = await this.bestEffort(ctx, 'outro', () =>
        media.renderTitleCard({
          kind: 'outro',
          text: options.outroMessage,
          duration: c.outroDuration,
          outputPath: ctx.workspace.file('outro.mp4'),
        })
      );
    }

    // ── 4. Concatenation ──
    handle.update({ status: 'concatenating', progress: PROGRESS.concatenate, currentStage: 'Joining clips with transitions' });
    const clips = [...(introPath ? [introPath] : []), ...segments.map((s) => s.path), ...(outroPath ? [outroPath] : [])];
    const joined = await media.joinAll(clips, options.transition, TRANSITION_STYLES, ctx.workspace.file('joined.mp4'));
    joined.warnings.forEach((w) => this.warn(ctx, w));

    let finalPath = joined.path;
    let cues: CommentaryCue[] = [];

    // ── 5. Commentary ──
    if (options.commentary?.enabled) {
      const commentary = await this.bestEffort(ctx, 'commentary', async () => {
        const timeline = await this.buildTimeline(ctx, joined.path, joined.clipStarts, segments, introPath !== undefined);
        return this.addCommentary(ctx, joined.path, timeline);
      });
      if (commentary) {
        finalPath = commentary.path;
        cues = commentary.cues;
      }
    }

    // ── 6. Finalize ──
    return this.finalize(ctx, request, finalPath, segments.length, cues);
  }

  /** Run a non-essential stage; a non-fatal failure becomes a warning. */
  private async bestEffort<T>(ctx: RunContext, stage: string, work: () => Promise<T>): Promise<T | undefined> {
    try {
      return await work();
    } catch (error) {
      if (isFatal(error)) throw error;
      this.warn(ctx, `Skipped ${stage}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async prepareSegment(ctx: RunContext, entry: SequencerItem, i: number, total: number): Promise<PreparedSegment | undefined> {
    const { handle, media, options } = ctx;
    const base = PROGRESS.segmentsStart + (PROGRESS.segmentsSpan * i) / total;
    const label = `segment ${i + 1}/${total}`;

    handle.checkpoint();
    handle.update({ status: 'downloading', progress: base, currentStage: `Fetching ${label}: ${entry.track.title}`, segmentIndex: i });

    try {
      const source = await this.deps.sources.get(entry.sourceId);
      handle.checkpoint();
      handle.update({ status: 'processing', progress: base + PROGRESS.processingStep, currentStage: `Processing ${label}` });

      const clip = await media.materializeSegment({
        label: `segment-${i + 1}`,
        sourcePath: source.path,
        startTime: entry.segment.startTime,
        endTime: entry.segment.endTime,
        overlay: options.textOverlay
          ? { title: entry.track.title, artist: entry.track.artist, language: entry.track.language }
          : undefined,
        outputPath: ctx.workspace.file(`segment_${i}.mp4`),
      });
      return { path: clip, entry };
    } catch (error) {
      if (isFatal(error)) throw error;
      this.warn(ctx, `Skipped ${label} (${entry.track.title}): ${errorMessage(error)}`);
      return undefined;
    }
  }

  /** Where each song sits in the joined mix; a song ends where the next clip starts. */
  private async buildTimeline(
    ctx: RunContext,
    mixPath: string,
    clipStarts: number[],
    segments: PreparedSegment[],
    hasIntro: boolean
  ): Promise<MixTimeline> {
    const totalDuration = playableDuration(await ctx.media.probe(mixPath));
    return {
      totalDuration,
      slots: segments.map((s, k) => {
        const index = k + (hasIntro ? 1 : 0);
        const start = clipStarts[index];
        const end = index + 1 < clipStarts.length ? clipStarts[index + 1] : totalDuration;
        const { track } = s.entry;
        return {
          start,
          duration: end - start,
          language: track.language,
          title: track.title,
          energyScore: track.energyScore,
          tempoBpm: track.tempoBpm,
        };
      }),
    };
  }

  private async addCommentary(ctx: RunContext, mixPath: string, timeline: MixTimeline): Promise<{ path: string; cues: CommentaryCue[] }> {
    const { handle, media, options } = ctx;
    const settings = this.deps.settings.commentary;
    const commentary = options.commentary;
    const frequency = commentary?.frequency ?? settings.frequency;

    handle.update({ status: 'encoding', progress: PROGRESS.commentary, currentStage: 'Preparing commentary' });
    const planned = planCommentaryCues(timeline, commentary?.context, frequency);
    if (planned.length === 0) {
      throw new CompositionError('stage', 'commentary', 'No commentary cues planned');
    }

    handle.update({ status: 'encoding', progress: PROGRESS.voicesStart, currentStage: 'Generating voice clips' });
    const rendered = await this.deps.voices.render(planned, {
      voice: commentary?.voice ?? settings.defaultVoice,
      outputDir: ctx.workspace.dir,
      logger: ctx.log,
      checkpoint: () => handle.checkpoint(),
      onProgress: (done, total) =>
        handle.update({
          progress: PROGRESS.voicesStart + (PROGRESS.voicesSpan * done) / total,
          currentStage: `Generated voice clip ${done}/${total}`,
        }),
    });
    rendered.warnings.forEach((w) => this.warn(ctx, w));

    const { cues, dropped } = scheduleCues(rendered.cues, timeline.totalDuration);
    dropped.forEach((c) => this.warn(ctx, `Dropped ${c.kind} commentary: no room before the end of the mix`));

    const placed = cues.flatMap((c) => (c.clipPath ? [{ path: c.clipPath, start: c.scheduledTime, duration: c.clipDuration }] : []));
    if (placed.length === 0) {
      throw new CompositionError('stage', 'commentary', 'No voice clips could be placed');
    }

    handle.update({ status: 'encoding', progress: PROGRESS.commentaryMix, currentStage: 'Mixing commentary' });
    const mixed = await media.overlayCommentary(
      mixPath,
      placed,
      settings.duckLevel,
      settings.voiceBoost,
      ctx.workspace.file('with_commentary.mp4')
    );
    ctx.log.info(`Commentary mixed: ${placed.length} clips`);

    // clip paths point into the workspace, which is about to go away
    return { path: mixed.path, cues: cues.map(({ clipPath: _clipPath, ...cue }) => cue) };
  }

  private async finalize(
    ctx: RunContext,
    request: MixExportRequest,
    finalPath: string,
    segmentsUsed: number,
    cues: CommentaryCue[]
  ): Promise<CompositionResult> {
    const { handle } = ctx;
    handle.update({ status: 'encoding', progress: PROGRESS.finalize, currentStage: 'Finalizing' });
    handle.checkpoint();

    const exportsDir = this.deps.settings.paths.exportsDir;
    await fs.promises.mkdir(exportsDir, { recursive: true });
    const baseName = `${outputFileName(request.name)}_${handle.id}`;
    const outputPath = path.join(exportsDir, `${baseName}.mp4`);
    const durations = await this.deps.transcoder.probe(finalPath);
    await fs.promises.copyFile(finalPath, outputPath);
    const stat = await fs.promises.stat(outputPath);
    const result: CompositionResult = {
      outputPath,
      durationSeconds: playableDuration(durations),
      fileSizeBytes: stat.size,
      segmentsUsed,
      commentaryCues: cues,
    };

    handle.complete({ outputPath, durationSeconds: result.durationSeconds, fileSizeBytes: result.fileSizeBytes });

    const recordPath = path.join(exportsDir, `${baseName}.job.json`);
    const record = {
      job: handle.snapshot(),
      name: request.name,
      options: request.options,
      segments: request.entries.map((e) => ({
        id: e.id,
        sourceId: e.sourceId,
        title: e.track.title,
        artist: e.track.artist,
        language: e.track.language,
        startTime: e.segment.startTime,
        endTime: e.segment.endTime,
      })),
      segmentsUsed,
      commentaryCues: cues,
    };
    await fs.promises.writeFile(recordPath, JSON.stringify(record, null, 2)).catch((error: unknown) => {
      ctx.log.warn('Failed to write job status record', { recordPath, error: errorMessage(error) });
    });

    return result;
  }
}
