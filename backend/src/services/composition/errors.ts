/**
 * Error taxonomy of the composition pipeline.
 *
 *   input     unusable source media, too few segments left      -> job fails
 *   resource  spawn failure, disk full                           -> job fails
 *   stage     one clip, transition or commentary pass failed     -> skipped / degraded
 *
 * Cancellation is not an error and has its own type.
 */

export type CompositionErrorKind = 'input' | 'resource' | 'stage';

export class CompositionError extends Error {
  constructor(
    public readonly kind: CompositionErrorKind,
    public readonly stage: string,
    message: string
  ) {
    super(message);
    this.name = 'CompositionError';
  }

  get fatal(): boolean {
    return this.kind !== 'stage';
  }
}

export class JobCancelledError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} was cancelled`);
    this.name = 'JobCancelledError';
  }
}

/** Errors that must escape any fallback and end the job. */
export function isFatal(error: unknown): boolean {
  if (error instanceof JobCancelledError) return true;
  return error instanceof CompositionError && error.fatal;
}
