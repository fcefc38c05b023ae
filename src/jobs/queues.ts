import { Queue } from 'bullmq';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import type { FeedbackJobData } from './feedback.job.js';
import type { SnapshotJobData } from './pulse-snapshot.job.js';

export const connection = { url: env.REDIS_URL };

export const QUEUE_NAMES = ['pulse-snapshot', 'feedback'] as const;
export type QueueName = (typeof QUEUE_NAMES)[number];

interface JobDataByQueue {
  'pulse-snapshot': SnapshotJobData;
  feedback: FeedbackJobData;
}

export const queues = {
  'pulse-snapshot': new Queue('pulse-snapshot', { connection }),
  feedback: new Queue('feedback', { connection }),
};

const HOURLY_JOB_ID = 'pulse-snapshot-hourly';

export async function addJob<N extends QueueName>(
  queueName: N,
  data: JobDataByQueue[N],
  opts?: { delay?: number; priority?: number; jobId?: string },
) {
  const job = await queues[queueName].add(queueName, data, {
    attempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: 100,
    removeOnFail: 1000,
    ...opts,
  });

  logger.debug({ jobId: job.id, queue: queueName }, 'Job added');
  return job;
}

/** Registers the repeatable hourly generation job. Re-registering is a no-op. */
export async function scheduleHourlySnapshot(pattern: string = env.PULSE_SNAPSHOT_CRON) {
  await queues['pulse-snapshot'].add(
    'pulse-snapshot',
    { heuristicsOnly: false, onlyIfMissing: false } satisfies SnapshotJobData,
    {
      repeat: { pattern, tz: env.PULSE_TIMEZONE },
      jobId: HOURLY_JOB_ID,
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
      removeOnComplete: 100,
      removeOnFail: 1000,
    },
  );
  logger.info({ pattern, tz: env.PULSE_TIMEZONE }, 'Hourly snapshot job scheduled');
}

export async function closeQueues() {
  await Promise.all(Object.values(queues).map((q) => q.close()));
}
