import fs from 'fs';
import path from 'path';
import { logger } from '../../config/logger';
import type { MediaTranscoder } from '../media/transcoder.interface';
import { playableDuration } from '../media/transcoder.interface';
import { SourceUnavailableError, type FetchedSource, type SourceFetcher } from './source-fetcher.interface';

/**
 * Resolve a path relative to the media library, refusing anything that
 * escapes it.
 */
export function resolveLibraryPath(libraryDir: string, relative: string): string {
  const root = path.resolve(libraryDir);
  const resolved = path.resolve(root, relative);
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new SourceUnavailableError(relative, `Source "${relative}" is outside the media library`);
  }
  return resolved;
}

/**
 * Serves source ids as paths relative to a local media directory.
 */
export class LocalLibraryFetcher implements SourceFetcher {
  readonly name = 'local-library';

  constructor(
    private readonly libraryDir: string,
    private readonly transcoder: MediaTranscoder
  ) {}

  async fetch(sourceId: string, destination: string): Promise<FetchedSource> {
    const source = resolveLibraryPath(this.libraryDir, sourceId);
    if (!fs.existsSync(source)) {
      throw new SourceUnavailableError(sourceId, `Source "${sourceId}" not found in media library`);
    }

    await fs.promises.copyFile(source, destination);
    const durations = await this.transcoder.probe(destination);
    logger.debug('Copied library source', { sourceId, destination });

    return { path: destination, durationSeconds: playableDuration(durations) };
  }
}
