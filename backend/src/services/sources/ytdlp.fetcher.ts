import { execFile } from 'child_process';
import { promisify } from 'util';
import fs from 'fs';
import { z } from 'zod';
import { logger, errorMessage } from '../../config/logger';
import type { PopularitySample } from '../../types/mix.types';
import { SourceUnavailableError, type FetchedSource, type SourceFetcher } from './source-fetcher.interface';

const execFileAsync = promisify(execFile);

const VIDEO_FORMAT = 'bestvideo[ext=mp4][height<=1080]+bestaudio[ext=m4a]/best[ext=mp4]/best';
const MAX_METADATA_BYTES = 64 * 1024 * 1024;

// Subset of `yt-dlp --dump-json` output
const metadataSchema = z.object({
  id: z.string().optional(),
  duration: z.number().nonnegative().optional(),
  heatmap: z
    .array(
      z.object({
        start_time: z.number(),
        end_time: z.number(),
        value: z.number(),
      })
    )
    .nullable()
    .optional(),
});

export type YtDlpMetadata = z.infer<typeof metadataSchema>;

export function sourceUrl(sourceId: string): string {
  return /^https?:\/\//.test(sourceId) ? sourceId : `https://www.youtube.com/watch?v=${sourceId}`;
}

/** The last JSON line yt-dlp prints is the info dict of the downloaded item. */
export function parseMetadata(stdout: string): YtDlpMetadata {
  const line = stdout
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.startsWith('{'))
    .pop();
  if (!line) {
    throw new Error('yt-dlp printed no metadata');
  }
  const parsed = metadataSchema.safeParse(JSON.parse(line));
  if (!parsed.success) {
    throw new Error(`Unexpected yt-dlp metadata: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function popularityFromHeatmap(metadata: YtDlpMetadata): PopularitySample[] | undefined {
  if (!metadata.heatmap || metadata.heatmap.length === 0) return undefined;
  return metadata.heatmap.map((h) => ({
    startTime: h.start_time,
    endTime: h.end_time,
    value: Math.max(0, Math.min(1, h.value)),
  }));
}

/**
 * Downloads sources with the yt-dlp executable. Metadata (duration and the
 * "most replayed" heatmap, when the site has one) is read from the same run.
 */
export class YtDlpFetcher implements SourceFetcher {
  readonly name = 'yt-dlp';

  constructor(private readonly binary: string = 'yt-dlp') {}

  async fetch(sourceId: string, destination: string): Promise<FetchedSource> {
    const args = [
      '--no-playlist',
      '--no-warnings',
      '--dump-json',
      '--no-simulate',
      '-f', VIDEO_FORMAT,
      '--merge-output-format', 'mp4',
      '-o', destination,
      sourceUrl(sourceId),
    ];

    logger.info('Downloading source', { sourceId });
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.binary, args, { maxBuffer: MAX_METADATA_BYTES }));
    } catch (error) {
      throw new SourceUnavailableError(sourceId, `yt-dlp failed for "${sourceId}": ${errorMessage(error)}`);
    }

    if (!fs.existsSync(destination)) {
      throw new SourceUnavailableError(sourceId, `yt-dlp produced no file for "${sourceId}"`);
    }

    const metadata = parseMetadata(stdout);
    const popularity = popularityFromHeatmap(metadata);
    logger.info('Source downloaded', { sourceId, duration: metadata.duration, heatmapSamples: popularity?.length ?? 0 });

    return {
      path: destination,
      durationSeconds: metadata.duration ?? 0,
      ...(popularity ? { popularity } : {}),
    };
  }
}
