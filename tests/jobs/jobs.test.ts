import { vi, describe, it, expect, beforeEach } from 'vitest';
import type { Job } from 'bullmq';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../src/container.js', () => ({
  container: {
    pulseService: { generateHour: vi.fn() },
    feedbackService: { recordFeedback: vi.fn() },
  },
}));

import { processPulseSnapshot } from '../../src/jobs/pulse-snapshot.job.js';
import type { SnapshotJobData } from '../../src/jobs/pulse-snapshot.job.js';
import { processFeedback } from '../../src/jobs/feedback.job.js';
import type { FeedbackJobData } from '../../src/jobs/feedback.job.js';
import { container } from '../../src/container.js';

function makeJob<T>(id: string, data: T): Job<T> {
  return { id, data } as unknown as Job<T>;
}

describe('processPulseSnapshot', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('runs a full generation by default', async () => {
    vi.mocked(container.pulseService.generateHour).mockResolvedValue({
      date: '2025-03-10',
      hour: 16,
      skipped: false,
      count: 60,
    });

    const result = await processPulseSnapshot(makeJob<SnapshotJobData>('7', {}));

    expect(container.pulseService.generateHour).toHaveBeenCalledWith({
      heuristicsOnly: false,
      onlyIfMissing: false,
      take: undefined,
      requestId: 'job-7',
    });
    expect(result).toEqual({ success: true, date: '2025-03-10', hour: 16, skipped: false, count: 60 });
  });

  it('lets a failed run reach the queue for retry', async () => {
    vi.mocked(container.pulseService.generateHour).mockRejectedValue(new Error('articles unavailable'));

    await expect(processPulseSnapshot(makeJob<SnapshotJobData>('8', { heuristicsOnly: true }))).rejects.toThrow(
      'articles unavailable',
    );
  });
});

describe('processFeedback', () => {
  it('records the event through the feedback service', async () => {
    vi.mocked(container.feedbackService.recordFeedback).mockResolvedValue(true);
    const data: FeedbackJobData = {
      eventId: 'evt-9',
      userId: 'user-1',
      articleId: 'art-1',
      mood: 'Calm',
      action: 'TooIntense',
    };

    const result = await processFeedback(makeJob('9', data));

    expect(container.feedbackService.recordFeedback).toHaveBeenCalledWith(data);
    expect(result).toEqual({ success: true, recorded: true });
  });
});
