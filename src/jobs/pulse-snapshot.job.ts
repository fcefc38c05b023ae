import { Job } from 'bullmq';
import { container } from '../container.js';
import { logger } from '../utils/logger.js';

export interface SnapshotJobData {
  heuristicsOnly?: boolean;
  onlyIfMissing?: boolean;
  take?: number;
}

export async function processPulseSnapshot(job: Job<SnapshotJobData>) {
  const { heuristicsOnly = false, onlyIfMissing = false, take } = job.data;

  logger.info({ jobId: job.id, heuristicsOnly, onlyIfMissing }, 'Generating hourly snapshot');

  const result = await container.pulseService.generateHour({
    heuristicsOnly,
    onlyIfMissing,
    take,
    requestId: job.id ? `job-${job.id}` : undefined,
  });

  return { success: true, ...result };
}
