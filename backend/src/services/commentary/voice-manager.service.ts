import fs from 'fs';
import path from 'path';
import type winston from 'winston';
import type { CommentarySettings } from '../../config/env';
import { errorMessage } from '../../config/logger';
import type { CommentaryCue } from '../../types/mix.types';
import { CompositionError } from '../composition/errors';
import { describeFailures, runFallbackChain } from '../composition/fallback-chain';
import { voicePolishCommand } from '../media/filter-graphs';
import type { MediaTranscoder } from '../media/transcoder.interface';
import { playableDuration } from '../media/transcoder.interface';
import { resolveVoice } from './commentary-planner.service';
import { CommandVoiceProvider } from './command-voice.provider';
import { HttpVoiceProvider } from './http-voice.provider';
import type { IVoiceProvider } from './voice-provider.interface';

export interface RenderOptions {
  voice: string;
  outputDir: string;
  logger: winston.Logger;
  /** Throws when the job has been cancelled */
  checkpoint: () => void;
  /** Called after each cue with (done, total) */
  onProgress?: (done: number, total: number) => void;
}

export interface RenderResult {
  /** Cues with a rendered clip; clipPath and clipDuration are set */
  cues: CommentaryCue[];
  warnings: string[];
}

const VOICE_SAMPLE_RATE = 44100;

/**
 * Renders commentary cues to voice clips through an ordered list of
 * providers. A cue no provider can voice is dropped with a warning.
 * Every clip is then polished; when that fails the raw clip is used.
 */
export class VoiceManager {
  constructor(
    private readonly providers: IVoiceProvider[],
    private readonly transcoder: MediaTranscoder
  ) {}

  static fromSettings(settings: CommentarySettings, transcoder: MediaTranscoder): VoiceManager {
    return new VoiceManager(
      [new HttpVoiceProvider(settings.voiceApiUrl, settings.voiceApiKey), new CommandVoiceProvider(settings.voiceCommand)],
      transcoder
    );
  }

  configuredProviders(): IVoiceProvider[] {
    return this.providers.filter((p) => p.isConfigured());
  }

  async render(cues: CommentaryCue[], opts: RenderOptions): Promise<RenderResult> {
    const providers = this.configuredProviders();
    if (providers.length === 0) {
      throw new CompositionError('stage', 'commentary', 'No voice provider configured');
    }

    const voice = resolveVoice(opts.voice);
    const rendered: CommentaryCue[] = [];
    const warnings: string[] = [];
    opts.logger.info(`Rendering ${cues.length} commentary clips`, { providers: providers.map((p) => p.name), voice });

    for (const [i, cue] of cues.entries()) {
      opts.checkpoint();
      const rawPath = path.join(opts.outputDir, `voice_${i}_raw.mp3`);
      const clipPath = path.join(opts.outputDir, `voice_${i}.mp3`);

      const outcome = await runFallbackChain(
        providers.map((provider) => ({
          name: provider.name,
          attempt: async () => {
            const raw = await provider.synthesize(cue.text, voice, rawPath);
            opts.checkpoint();
            const written = await this.polish(raw, clipPath, `voice-polish-${i}`, opts.logger);
            const duration = playableDuration(await this.transcoder.probe(written));
            if (!(duration > 0)) throw new Error('voice clip is empty');
            return { path: written, duration };
          },
        }))
      );

      if (outcome.ok) {
        rendered.push({ ...cue, clipPath: outcome.value.path, clipDuration: outcome.value.duration });
      } else {
        const message = `Dropped ${cue.kind} commentary: ${describeFailures(outcome.failures)}`;
        opts.logger.warn(message);
        warnings.push(message);
      }
      opts.onProgress?.(i + 1, cues.length);
    }

    return { cues: rendered, warnings };
  }

  /** Polished clip path, or the raw one when polishing fails */
  private async polish(rawPath: string, polishedPath: string, label: string, log: winston.Logger): Promise<string> {
    const outcome = await runFallbackChain<string>([
      {
        name: 'polish',
        attempt: async () => {
          const result = await this.transcoder.run(voicePolishCommand(label, rawPath, polishedPath, VOICE_SAMPLE_RATE));
          if (!result.ok) throw new Error(result.message);
          return polishedPath;
        },
      },
      { name: 'raw', attempt: async () => rawPath },
    ]);

    if (outcome.failures.length > 0) {
      log.warn(`Using unpolished voice clip: ${describeFailures(outcome.failures)}`, { clip: path.basename(rawPath) });
    }
    const chosen = outcome.ok ? outcome.value : rawPath;
    if (chosen !== rawPath) {
      await fs.promises.rm(rawPath, { force: true }).catch((error: unknown) => {
        log.warn('Failed to remove raw voice clip', { clip: rawPath, error: errorMessage(error) });
      });
    }
    return chosen;
  }
}
