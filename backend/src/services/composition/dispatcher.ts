import type { JobsOptions } from 'bullmq';
import { logger } from '../../config/logger';
import type { MixExportRequest } from '../../types/mix.types';
import type { CompositionPipeline } from './composition.pipeline';
import type { JobHandle } from './job-registry';

export interface MixExportJobData {
  jobId: string;
  request: MixExportRequest;
}

/**
 * Hands a created job to whatever runs it. Either way the caller returns
 * immediately and follows the job through the registry.
 */
export interface ExportDispatcher {
  readonly mode: 'queue' | 'inline';
  dispatch(handle: JobHandle, request: MixExportRequest): Promise<void>;
  close(): Promise<void>;
}

type PipelineRunner = Pick<CompositionPipeline, 'run'>;

/** Runs exports in-process, without Redis. */
export class InlineDispatcher implements ExportDispatcher {
  readonly mode = 'inline' as const;
  private readonly running = new Set<Promise<unknown>>();

  constructor(private readonly pipeline: PipelineRunner) {}

  async dispatch(handle: JobHandle, request: MixExportRequest): Promise<void> {
    // run() settles the job itself and never rejects
    const run: Promise<unknown> = this.pipeline.run(handle, request).finally(() => {
      this.running.delete(run);
    });
    this.running.add(run);
  }

  get activeCount(): number {
    return this.running.size;
  }

  async close(): Promise<void> {
    await Promise.allSettled([...this.running]);
  }
}

export interface ExportQueue {
  add(name: string, data: MixExportJobData, opts?: JobsOptions): Promise<unknown>;
}

/**
 * Enqueues exports on the BullMQ queue. The worker runs in this process and
 * claims the job's handle by id when it picks the job up.
 */
export class QueueDispatcher implements ExportDispatcher {
  readonly mode = 'queue' as const;
  private readonly handles = new Map<string, JobHandle>();

  constructor(
    private readonly queue: ExportQueue,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {}

  async dispatch(handle: JobHandle, request: MixExportRequest): Promise<void> {
    this.handles.set(handle.id, handle);
    try {
      await this.queue.add('export', { jobId: handle.id, request }, { jobId: handle.id });
      logger.info('Mix export queued', { jobId: handle.id, segments: request.entries.length });
    } catch (error) {
      this.handles.delete(handle.id);
      throw error;
    }
  }

  /** Take ownership of a queued job's handle; undefined when this process did not queue it. */
  claim(jobId: string): JobHandle | undefined {
    const handle = this.handles.get(jobId);
    this.handles.delete(jobId);
    return handle;
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
