import { Worker, type Job } from 'bullmq';
import { logger, errorMessage } from '../config/logger';
import { QUEUE_NAMES, getRedisConnection } from '../config/redis';
import type { CompositionPipeline } from '../services/composition/composition.pipeline';
import type { MixExportJobData } from '../services/composition/dispatcher';
import type { JobHandle, JobRegistry } from '../services/composition/job-registry';
import type { CompositionResult } from '../types/mix.types';

export type MixExportJob = Pick<Job<MixExportJobData>, 'id' | 'data' | 'updateProgress'>;

export interface MixExportJobResult {
  status: 'complete' | 'cancelled';
  result?: CompositionResult;
}

/**
 * Process mix export jobs: run the pipeline for the claimed handle and
 * mirror its progress onto the queue job.
 */
export const createMixExportProcessor =
  (pipeline: Pick<CompositionPipeline, 'run'>, registry: JobRegistry, claim: (jobId: string) => JobHandle | undefined) =>
  async (job: MixExportJob): Promise<MixExportJobResult> => {
    const { jobId, request } = job.data;
    const handle = claim(jobId);
    if (!handle) {
      throw new Error(`Mix export ${jobId} is not registered in this process`);
    }

    logger.info(`Processing mix export job ${job.id}`, { jobId, segments: request.entries.length });

    const unsubscribe = registry.subscribe(jobId, (event) => {
      job.updateProgress(event.progress).catch((err: unknown) => {
        logger.warn('Failed to report mix export progress', { jobId, error: errorMessage(err) });
      });
    });

    try {
      const result = await pipeline.run(handle, request);
      const final = handle.snapshot();

      if (final.status === 'failed') {
        throw new Error(final.error ? `${final.error.stage}: ${final.error.message}` : 'Mix export failed');
      }
      if (final.status === 'cancelled') {
        return { status: 'cancelled' };
      }
      return { status: 'complete', result };
    } finally {
      unsubscribe();
    }
  };

/**
 * Create and start the mix export worker
 */
export const createMixExportWorker = (
  processor: (job: MixExportJob) => Promise<MixExportJobResult>,
  options: { redisUrl: string; concurrency: number }
) => {
  const worker = new Worker<MixExportJobData, MixExportJobResult>(QUEUE_NAMES.MIX_EXPORT, processor, {
    connection: getRedisConnection(options.redisUrl),
    concurrency: options.concurrency,
  });

  worker.on('completed', (job) => {
    logger.info(`Mix export job ${job.id} finished`, { status: job.returnvalue.status });
  });

  worker.on('failed', (job, err) => {
    logger.error(`Mix export job ${job?.id} failed:`, { error: err.message });
  });

  worker.on('error', (err) => {
    logger.error('Mix export worker error:', { error: err.message });
  });

  logger.info('Mix export worker started', { concurrency: options.concurrency });

  return worker;
};

export default createMixExportWorker;
