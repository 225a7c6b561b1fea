import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger, errorMessage } from '../../config/logger';
import type { FetchedSource, SourceFetcher } from './source-fetcher.interface';

export interface CachedSource extends FetchedSource {
  /** True when served from disk without fetching */
  hit: boolean;
}

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

/** What a fetch reported besides the file, kept beside the cached media */
const CacheMetaSchema = z.object({
  durationSeconds: z.number().min(0),
  popularity: z
    .array(z.object({ startTime: z.number(), endTime: z.number(), value: z.number() }))
    .optional(),
});

type CacheMeta = z.infer<typeof CacheMetaSchema>;

const metaPathFor = (mediaPath: string): string => mediaPath.replace(/\.mp4$/, '.meta.json');

/**
 * Read-through cache of source media keyed by source id.
 *
 * Concurrent lookups of one id share a single in-flight fetch, and a fetch
 * lands under a temporary name that is renamed into place only once it is
 * complete, so a reader never sees a partial file.
 */
export class SourceCache {
  private readonly inFlight = new Map<string, Promise<CachedSource>>();

  constructor(
    private readonly cacheDir: string,
    private readonly fetcher: SourceFetcher
  ) {}

  pathFor(sourceId: string): string {
    if (SAFE_ID.test(sourceId)) {
      return path.join(this.cacheDir, `${sourceId}.mp4`);
    }
    const slug = sourceId.replace(/[^A-Za-z0-9_-]+/g, '_').slice(0, 60);
    const hash = crypto.createHash('sha1').update(sourceId).digest('hex').slice(0, 10);
    return path.join(this.cacheDir, `${slug}-${hash}.mp4`);
  }

  async get(sourceId: string): Promise<CachedSource> {
    const target = this.pathFor(sourceId);
    if (fs.existsSync(target)) {
      logger.debug('Source cache hit', { sourceId });
      const meta = await this.readMeta(sourceId, target);
      return { path: target, ...meta, hit: true };
    }

    const pending = this.inFlight.get(sourceId);
    if (pending) return pending;

    const fill = this.fill(sourceId, target).finally(() => {
      this.inFlight.delete(sourceId);
    });
    this.inFlight.set(sourceId, fill);
    return fill;
  }

  private async fill(sourceId: string, target: string): Promise<CachedSource> {
    await fs.promises.mkdir(this.cacheDir, { recursive: true });
    const temp = `${target}.${uuidv4()}.part.mp4`;
    const metaPath = metaPathFor(target);
    const metaTemp = `${metaPath}.${uuidv4()}.part`;

    try {
      const fetched = await this.fetcher.fetch(sourceId, temp);
      const meta: CacheMeta = {
        durationSeconds: fetched.durationSeconds,
        ...(fetched.popularity ? { popularity: fetched.popularity } : {}),
      };
      // metadata lands first: once the media is visible, a hit can read it
      await fs.promises.writeFile(metaTemp, JSON.stringify(meta));
      await fs.promises.rename(metaTemp, metaPath);
      await fs.promises.rename(fetched.path, target);
      logger.info('Source cached', { sourceId, fetcher: this.fetcher.name });
      return { ...fetched, path: target, hit: false };
    } catch (error) {
      for (const leftover of [temp, metaTemp]) {
        await fs.promises.rm(leftover, { force: true }).catch((cleanupError: unknown) => {
          logger.warn('Failed to remove partial download', { temp: leftover, error: errorMessage(cleanupError) });
        });
      }
      throw error;
    }
  }

  /** Entries cached without readable metadata report an unknown (zero) duration */
  private async readMeta(sourceId: string, mediaPath: string): Promise<CacheMeta> {
    const metaPath = metaPathFor(mediaPath);
    try {
      const parsed = CacheMetaSchema.safeParse(JSON.parse(await fs.promises.readFile(metaPath, 'utf8')));
      if (parsed.success) return parsed.data;
      logger.warn('Ignoring malformed source metadata', { sourceId, metaPath });
    } catch (error) {
      logger.warn('Source metadata unavailable', { sourceId, metaPath, error: errorMessage(error) });
    }
    return { durationSeconds: 0 };
  }
}
