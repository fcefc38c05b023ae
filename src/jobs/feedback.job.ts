import { Job } from 'bullmq';
import { container } from '../container.js';
import type { FeedbackAction, Mood } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface FeedbackJobData {
  eventId: string;
  userId: string;
  articleId: string;
  mood: Mood;
  action: FeedbackAction;
}

export async function processFeedback(job: Job<FeedbackJobData>) {
  const { eventId, userId, articleId, mood, action } = job.data;

  logger.debug({ jobId: job.id, eventId, userId, articleId, action, attempt: job.attemptsMade }, 'Processing feedback');

  const recorded = await container.feedbackService.recordFeedback({ eventId, userId, articleId, mood, action });
  return { success: true, recorded };
}
