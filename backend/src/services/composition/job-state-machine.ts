import type { JobStatus } from '../../types/mix.types';

/**
 * Valid status changes of a composition job.
 *
 * - The segment loop alternates downloading → processing for every segment
 * - Intro and outro rendering run as processing
 * - Any non-terminal state → failed | cancelled
 * - complete, failed and cancelled are absorbing
 */
export const VALID_TRANSITIONS: Readonly<Record<JobStatus, ReadonlyArray<JobStatus>>> = {
  pending: ['downloading', 'processing', 'failed', 'cancelled'],
  downloading: ['downloading', 'processing', 'failed', 'cancelled'],
  processing: ['processing', 'downloading', 'concatenating', 'failed', 'cancelled'],
  concatenating: ['concatenating', 'encoding', 'complete', 'failed', 'cancelled'],
  encoding: ['encoding', 'complete', 'failed', 'cancelled'],
  complete: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: JobStatus,
    public readonly to: JobStatus
  ) {
    super(`Invalid job status transition: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
  }
}
