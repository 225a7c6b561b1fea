import type { PopularitySample } from '../../types/mix.types';

export interface FetchedSource {
  /** Where the media ended up; usually `destination`, but a fetcher may pick its own extension */
  path: string;
  durationSeconds: number;
  /** Replay-intensity curve when the source exposes one */
  popularity?: PopularitySample[];
}

/**
 * Anything that can materialise a source id as a local media file.
 */
export interface SourceFetcher {
  readonly name: string;
  fetch(sourceId: string, destination: string): Promise<FetchedSource>;
}

export class SourceUnavailableError extends Error {
  constructor(
    public readonly sourceId: string,
    message: string
  ) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}
