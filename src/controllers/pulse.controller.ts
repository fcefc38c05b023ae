import { randomUUID } from 'crypto';
import type { Request, Response } from 'express';
import { container } from '../container.js';
import { addJob } from '../jobs/queues.js';
import type {
  FeedbackBody,
  GenerateInput,
  GlobalQueryInput,
  PersonalQueryInput,
} from '../middleware/validation.js';
import { AppError } from '../middleware/errorHandler.js';
import { logger } from '../utils/logger.js';

function userIdParam(req: Request): string {
  const userId = req.params.userId?.trim();
  if (!userId) {
    throw new AppError(400, 'VALIDATION_ERROR', 'userId is required');
  }
  return userId;
}

export const pulseController = {
  async getGlobal(_req: Request, res: Response) {
    const query: GlobalQueryInput = res.locals.query;
    const items = await container.pulseService.getGlobal({ date: query.date, take: query.take });
    res.json({ success: true, data: { items } });
  },

  async getPersonal(req: Request, res: Response) {
    const userId = userIdParam(req);
    const query: PersonalQueryInput = res.locals.query;
    const items = await container.pulseService.getPersonal(userId, query);
    res.json({ success: true, data: { items } });
  },

  async getToday(req: Request, res: Response) {
    const userId = userIdParam(req);
    const query: PersonalQueryInput = res.locals.query;
    const today = await container.pulseService.getToday(userId, query);
    res.json({ success: true, data: today });
  },

  /** Learning runs in the worker; the request only enqueues. */
  async submitFeedback(req: Request, res: Response) {
    const userId = userIdParam(req);
    const body: FeedbackBody = req.body;
    const eventId = randomUUID();

    // The event id doubles as the job id, so a retried job replays the same event.
    const job = await addJob(
      'feedback',
      { eventId, userId, articleId: body.articleId, mood: body.mood, action: body.action },
      { jobId: eventId },
    );

    logger.info({ eventId, userId, articleId: body.articleId, action: body.action }, 'Feedback queued');
    res.status(202).json({ success: true, data: { queued: true, jobId: job.id ?? null } });
  },

  async generate(req: Request, res: Response) {
    const body: GenerateInput = req.body;
    const job = await addJob('pulse-snapshot', {
      heuristicsOnly: body.heuristicsOnly,
      onlyIfMissing: body.onlyIfMissing,
      take: body.take,
    });

    logger.info({ jobId: job.id, ...body }, 'Snapshot generation queued');
    res.status(202).json({ success: true, data: { queued: true, jobId: job.id ?? null } });
  },
};
