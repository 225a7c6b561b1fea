import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import type { CompositionJob, JobError, JobStatus, ProgressEvent } from '../../types/mix.types';
import { JobCancelledError } from './errors';
import { InvalidTransitionError, canTransition, isTerminal } from './job-state-machine';

export type ProgressListener = (event: ProgressEvent) => void;

export interface JobUpdate {
  status?: JobStatus;
  progress?: number;
  currentStage?: string;
  segmentIndex?: number;
}

export interface JobCompletion {
  outputPath: string;
  durationSeconds: number;
  fileSizeBytes: number;
}

interface JobEntry {
  job: CompositionJob;
  cancelRequested: boolean;
  /** Epoch ms at which the job reached a terminal state */
  finishedAt?: number;
}

export interface JobRegistryOptions {
  /** How long a finished job stays readable; its `.job.json` record outlives it */
  retentionMs?: number;
  /** Finished jobs kept at most; the oldest go first */
  maxFinished?: number;
  now?: () => number;
}

const clampProgress = (value: number): number => Math.max(0, Math.min(100, Math.round(value)));

function snapshotOf(job: CompositionJob): Readonly<CompositionJob> {
  return Object.freeze({
    ...job,
    warnings: [...job.warnings],
    ...(job.error ? { error: { ...job.error } } : {}),
  });
}

/**
 * Writer side of one job. Only the pipeline running the job holds a handle;
 * everyone else reads snapshots through the registry.
 */
export class JobHandle {
  constructor(
    private readonly registry: JobRegistry,
    readonly id: string
  ) {}

  get cancelRequested(): boolean {
    return this.registry.isCancelRequested(this.id);
  }

  /** Throws JobCancelledError once cancellation has been requested. */
  checkpoint(): void {
    if (this.cancelRequested) throw new JobCancelledError(this.id);
  }

  snapshot(): Readonly<CompositionJob> {
    return this.registry.getOrThrow(this.id);
  }

  update(update: JobUpdate): void {
    this.registry.apply(this.id, update);
  }

  warn(message: string): void {
    this.registry.addWarning(this.id, message);
  }

  complete(result: JobCompletion): void {
    this.registry.apply(this.id, { status: 'complete', progress: 100, currentStage: 'Complete' }, result);
  }

  fail(error: JobError): void {
    this.registry.apply(this.id, { status: 'failed', currentStage: `Failed: ${error.stage}` }, { error });
  }

  cancel(): void {
    this.registry.apply(this.id, { status: 'cancelled', currentStage: 'Cancelled' });
  }
}

/**
 * Process-wide table of composition jobs. Finished jobs are evicted once
 * they are older than the retention window or exceed the retained count.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly events = new EventEmitter();
  private readonly retentionMs: number;
  private readonly maxFinished: number;
  private readonly now: () => number;

  constructor(options: JobRegistryOptions = {}) {
    this.retentionMs = options.retentionMs ?? 60 * 60 * 1000;
    this.maxFinished = options.maxFinished ?? 200;
    this.now = options.now ?? Date.now;
    // one listener per observing client
    this.events.setMaxListeners(0);
  }

  get size(): number {
    return this.jobs.size;
  }

  create(totalSegments: number, id: string = uuidv4()): JobHandle {
    this.evictFinished();
    if (this.jobs.has(id)) {
      throw new Error(`Job ${id} already exists`);
    }
    const now = new Date().toISOString();
    this.jobs.set(id, {
      job: {
        id,
        status: 'pending',
        progress: 0,
        currentStage: 'Queued',
        segmentIndex: 0,
        totalSegments,
        warnings: [],
        createdAt: now,
        updatedAt: now,
      },
      cancelRequested: false,
    });
    return new JobHandle(this, id);
  }

  get(id: string): Readonly<CompositionJob> | undefined {
    const entry = this.jobs.get(id);
    return entry ? snapshotOf(entry.job) : undefined;
  }

  getOrThrow(id: string): Readonly<CompositionJob> {
    const job = this.get(id);
    if (!job) throw new Error(`Unknown job ${id}`);
    return job;
  }

  subscribe(id: string, listener: ProgressListener): () => void {
    const channel = `job:${id}`;
    this.events.on(channel, listener);
    return () => {
      this.events.off(channel, listener);
    };
  }

  /**
   * Ask a running job to stop at its next checkpoint. Returns false for
   * unknown or already finished jobs.
   */
  requestCancel(id: string): boolean {
    const entry = this.jobs.get(id);
    if (!entry || isTerminal(entry.job.status)) return false;
    entry.cancelRequested = true;
    return true;
  }

  isCancelRequested(id: string): boolean {
    return this.jobs.get(id)?.cancelRequested ?? false;
  }

  // --------------------------------------------------------------------------
  // Writer operations (reached through JobHandle)
  // --------------------------------------------------------------------------

  apply(id: string, update: JobUpdate, extra: Partial<Pick<CompositionJob, 'outputPath' | 'durationSeconds' | 'fileSizeBytes' | 'error'>> = {}): void {
    const entry = this.entry(id);
    const job = entry.job;

    if (update.status && update.status !== job.status) {
      if (!canTransition(job.status, update.status)) {
        throw new InvalidTransitionError(job.status, update.status);
      }
      job.status = update.status;
    } else if (isTerminal(job.status)) {
      throw new InvalidTransitionError(job.status, update.status ?? job.status);
    }

    if (update.progress !== undefined) job.progress = clampProgress(update.progress);
    if (update.currentStage !== undefined) job.currentStage = update.currentStage;
    if (update.segmentIndex !== undefined) job.segmentIndex = update.segmentIndex;
    Object.assign(job, extra);
    job.updatedAt = new Date().toISOString();

    if (isTerminal(job.status) && entry.finishedAt === undefined) {
      entry.finishedAt = this.now();
    }

    this.publish(job);
  }

  /**
   * Drop finished jobs past the retention window, then the oldest finished
   * ones beyond the retained count. Running jobs are never touched.
   */
  evictFinished(): number {
    const cutoff = this.now() - this.retentionMs;
    const finished = [...this.jobs.values()]
      .filter((e): e is JobEntry & { finishedAt: number } => e.finishedAt !== undefined)
      .sort((a, b) => a.finishedAt - b.finishedAt);

    const excess = finished.length - this.maxFinished;
    const evicted = finished.filter((e, index) => e.finishedAt <= cutoff || index < excess);
    for (const entry of evicted) {
      this.jobs.delete(entry.job.id);
      this.events.removeAllListeners(`job:${entry.job.id}`);
    }
    return evicted.length;
  }

  addWarning(id: string, message: string): void {
    const job = this.entry(id).job;
    job.warnings.push(message);
    job.updatedAt = new Date().toISOString();
  }

  private entry(id: string): JobEntry {
    const entry = this.jobs.get(id);
    if (!entry) throw new Error(`Unknown job ${id}`);
    return entry;
  }

  private publish(job: CompositionJob): void {
    const event: ProgressEvent = {
      jobId: job.id,
      status: job.status,
      progress: job.progress,
      currentStage: job.currentStage,
      segmentIndex: job.segmentIndex,
      totalSegments: job.totalSegments,
      ...(job.error ? { error: { ...job.error } } : {}),
    };
    this.events.emit(`job:${job.id}`, event);
  }
}
