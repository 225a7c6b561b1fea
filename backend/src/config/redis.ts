import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { logger } from './logger';

// Queue names
export const QUEUE_NAMES = {
  MIX_EXPORT: 'mix-export',
} as const;

let redisConnection: Redis | null = null;
let mixExportQueue: Queue | null = null;
let mixExportEvents: QueueEvents | null = null;

/**
 * Shared Redis connection. Created on first use so inline mode and tests
 * never open a socket.
 */
export function getRedisConnection(redisUrl: string): Redis {
  if (redisConnection) return redisConnection;

  redisConnection = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });

  redisConnection.on('connect', () => {
    logger.info('Redis connected successfully');
  });

  redisConnection.on('error', (error) => {
    logger.error('Redis connection error:', { error: error.message });
  });

  return redisConnection;
}

export function getMixExportQueue(redisUrl: string): Queue {
  if (mixExportQueue) return mixExportQueue;

  const connection = getRedisConnection(redisUrl);
  mixExportQueue = new Queue(QUEUE_NAMES.MIX_EXPORT, {
    connection,
    defaultJobOptions: {
      // The pipeline reports its own terminal state; a retry would start a second
      // export under the same job id.
      attempts: 1,
      removeOnComplete: {
        count: 100,
        age: 24 * 3600,
      },
      removeOnFail: {
        count: 200,
      },
    },
  });

  mixExportEvents = new QueueEvents(QUEUE_NAMES.MIX_EXPORT, { connection });
  mixExportEvents.on('completed', ({ jobId }) => {
    logger.info(`Job ${jobId} in queue ${QUEUE_NAMES.MIX_EXPORT} completed`);
  });
  mixExportEvents.on('failed', ({ jobId, failedReason }) => {
    logger.error(`Job ${jobId} in queue ${QUEUE_NAMES.MIX_EXPORT} failed:`, { failedReason });
  });
  mixExportEvents.on('progress', ({ jobId, data }) => {
    logger.debug(`Job ${jobId} in queue ${QUEUE_NAMES.MIX_EXPORT} progress:`, { data });
  });

  return mixExportQueue;
}

export async function closeRedis(): Promise<void> {
  if (mixExportEvents) await mixExportEvents.close();
  if (mixExportQueue) await mixExportQueue.close();
  if (redisConnection) await redisConnection.quit();
  mixExportEvents = null;
  mixExportQueue = null;
  redisConnection = null;
}
