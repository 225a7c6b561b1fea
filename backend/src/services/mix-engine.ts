import type { MixSettings } from '../config/env';
import { logger } from '../config/logger';
import { closeRedis, getMixExportQueue } from '../config/redis';
import { createMixExportProcessor, createMixExportWorker } from '../jobs/mixExport.worker';
import type { AudioDecoder } from './analysis/audio-decoder.service';
import { EnergyAnalyzerService } from './analysis/energy-analyzer.service';
import { VoiceManager } from './commentary/voice-manager.service';
import { CompositionPipeline } from './composition/composition.pipeline';
import { InlineDispatcher, QueueDispatcher, type ExportDispatcher } from './composition/dispatcher';
import { JobRegistry } from './composition/job-registry';
import defaultTranscoder from './media/ffmpeg-transcoder';
import type { MediaTranscoder } from './media/transcoder.interface';
import { LocalLibraryFetcher } from './sources/local-library.fetcher';
import { SourceCache } from './sources/source-cache';
import type { SourceFetcher } from './sources/source-fetcher.interface';
import { YtDlpFetcher } from './sources/ytdlp.fetcher';

/**
 * Everything the HTTP layer talks to, built once from settings.
 */
export interface MixEngine {
  settings: MixSettings;
  registry: JobRegistry;
  /** Fetched source media, shared by analysis and export */
  sources: SourceCache;
  analyzer: EnergyAnalyzerService;
  dispatcher: ExportDispatcher;
}

export interface MixEngineOverrides {
  transcoder?: MediaTranscoder;
  decoder?: AudioDecoder;
  fetcher?: SourceFetcher;
  voices?: VoiceManager;
  registry?: JobRegistry;
}

function createFetcher(settings: MixSettings, transcoder: MediaTranscoder): SourceFetcher {
  return settings.fetcher.kind === 'yt-dlp'
    ? new YtDlpFetcher(settings.fetcher.ytDlpPath)
    : new LocalLibraryFetcher(settings.paths.libraryDir, transcoder);
}

export function createMixEngine(settings: MixSettings, overrides: MixEngineOverrides = {}): MixEngine {
  const transcoder = overrides.transcoder ?? defaultTranscoder;
  const registry = overrides.registry ?? new JobRegistry(settings.jobs);
  const fetcher = overrides.fetcher ?? createFetcher(settings, transcoder);

  const sources = new SourceCache(settings.paths.cacheDir, fetcher);
  const pipeline = new CompositionPipeline({
    settings,
    transcoder,
    sources,
    voices: overrides.voices ?? VoiceManager.fromSettings(settings.commentary, transcoder),
  });

  let dispatcher: ExportDispatcher;
  if (settings.queue.mode === 'queue') {
    const queue = getMixExportQueue(settings.queue.redisUrl);
    const queued: QueueDispatcher = new QueueDispatcher(queue, async () => {
      await worker.close();
      await closeRedis();
    });
    const worker = createMixExportWorker(
      createMixExportProcessor(pipeline, registry, (jobId) => queued.claim(jobId)),
      settings.queue
    );
    dispatcher = queued;
  } else {
    dispatcher = new InlineDispatcher(pipeline);
  }

  logger.info('Mix engine ready', {
    dispatch: dispatcher.mode,
    fetcher: fetcher.name,
    voices: settings.commentary.voiceApiUrl || settings.commentary.voiceCommand ? 'configured' : 'none',
  });

  return {
    settings,
    registry,
    sources,
    analyzer: new EnergyAnalyzerService(settings.analysis, overrides.decoder),
    dispatcher,
  };
}
