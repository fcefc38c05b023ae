import { Worker } from 'bullmq';
import { connection, closeQueues, scheduleHourlySnapshot } from './queues.js';
import { processPulseSnapshot } from './pulse-snapshot.job.js';
import { processFeedback } from './feedback.job.js';
import { logger } from '../utils/logger.js';

// One generation at a time: snapshots are whole-hour writes.
const workers = [
  new Worker('pulse-snapshot', processPulseSnapshot, { connection, concurrency: 1 }),
  new Worker('feedback', processFeedback, { connection, concurrency: 4 }),
];

for (const worker of workers) {
  worker.on('completed', (job) => {
    logger.debug({ queue: worker.name, jobId: job.id }, 'Job completed');
  });
  worker.on('failed', (job, err) => {
    logger.error({ queue: worker.name, jobId: job?.id, err }, 'Job failed');
  });
}

async function shutdown(signal: string) {
  logger.info({ signal }, 'Worker shutting down');
  await Promise.all(workers.map((w) => w.close()));
  await closeQueues();
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Worker shutdown failed');
      process.exit(1);
    });
  });
}

scheduleHourlySnapshot()
  .then(() => logger.info({ queues: workers.map((w) => w.name) }, 'Workers started'))
  .catch((err: unknown) => {
    logger.error({ err }, 'Failed to schedule hourly snapshot');
    process.exit(1);
  });
