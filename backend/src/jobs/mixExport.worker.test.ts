import { describe, expect, it, vi } from 'vitest';
import { JobRegistry, type JobHandle } from '../services/composition/job-registry';
import type { CompositionResult, MixExportRequest } from '../types/mix.types';
import { createMixExportProcessor, type MixExportJob } from './mixExport.worker';

const request: MixExportRequest = {
  name: 'Queued Mix',
  entries: [],
  options: {
    transition: 'fade',
    transitionDuration: 3.5,
    textOverlay: false,
    quality: '480p',
    intro: false,
    outro: false,
    introTitle: 'DJ MIX',
    outroMessage: 'Bye',
  },
};

const result: CompositionResult = {
  outputPath: '/exports/Queued_Mix.mp4',
  durationSeconds: 60,
  fileSizeBytes: 1024,
  segmentsUsed: 2,
  commentaryCues: [],
};

const queueJob = (jobId: string) => {
  const updateProgress = vi.fn(async () => undefined);
  const job: MixExportJob = { id: '7', data: { jobId, request }, updateProgress };
  return { job, updateProgress };
};

describe('mix export processor', () => {
  it('mirrors job progress onto the queue job', async () => {
    const registry = new JobRegistry();
    const handle = registry.create(2, 'job-1');
    const pipeline = {
      run: vi.fn(async (h: JobHandle) => {
        h.update({ status: 'processing', progress: 40 });
        h.update({ status: 'concatenating', progress: 84 });
        h.complete({ outputPath: result.outputPath, durationSeconds: 60, fileSizeBytes: 1024 });
        return result;
      }),
    };
    const { job, updateProgress } = queueJob('job-1');

    const outcome = await createMixExportProcessor(pipeline, registry, () => handle)(job);

    expect(outcome).toEqual({ status: 'complete', result });
    expect(updateProgress.mock.calls).toEqual([[40], [84], [100]]);
    expect(pipeline.run).toHaveBeenCalledWith(handle, request);
  });

  it('fails the queue job when the export failed', async () => {
    const registry = new JobRegistry();
    const handle = registry.create(2, 'job-2');
    const pipeline = {
      run: vi.fn(async (h: JobHandle) => {
        h.fail({ stage: 'processing', message: 'boom' });
        return undefined;
      }),
    };

    await expect(createMixExportProcessor(pipeline, registry, () => handle)(queueJob('job-2').job)).rejects.toThrow(
      'processing: boom'
    );
  });

  it('reports a cancelled export without failing', async () => {
    const registry = new JobRegistry();
    const handle = registry.create(2, 'job-3');
    const pipeline = {
      run: vi.fn(async (h: JobHandle) => {
        h.cancel();
        return undefined;
      }),
    };

    const outcome = await createMixExportProcessor(pipeline, registry, () => handle)(queueJob('job-3').job);

    expect(outcome).toEqual({ status: 'cancelled' });
  });

  it('rejects jobs this process did not queue', async () => {
    const pipeline = { run: vi.fn(async () => undefined) };

    await expect(createMixExportProcessor(pipeline, new JobRegistry(), () => undefined)(queueJob('job-x').job)).rejects.toThrow(
      'Mix export job-x is not registered in this process'
    );
    expect(pipeline.run).not.toHaveBeenCalled();
  });
});
