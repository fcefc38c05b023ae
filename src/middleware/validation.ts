import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { FEEDBACK_ACTIONS, MOODS } from '../types/index.js';
import { normalizeMood } from '../pipeline/mood.js';
import { AppError } from './errorHandler.js';

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
}

export function validateBody(schema: z.ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(new AppError(400, 'VALIDATION_ERROR', formatIssues(result.error)));
      return;
    }
    req.body = result.data;
    next();
  };
}

/** Validates the query string and stores the parsed value on res.locals.query. */
export function validateQuery(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      next(new AppError(400, 'VALIDATION_ERROR', formatIssues(result.error)));
      return;
    }
    res.locals.query = result.data;
    next();
  };
}

const mood = z.string().trim().min(1).max(32);
const blend = z.coerce.number().min(0).max(1);
const take = z.coerce.number().int().min(1).max(50);

const knownMood = mood
  .refine((v) => MOODS.some((m) => m.toLowerCase() === v.toLowerCase()), 'unknown mood')
  .transform(normalizeMood);

export const schemas = {
  globalQuery: z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
    take: take.optional(),
  }),

  personalQuery: z.object({
    mood: mood.optional(),
    blend: blend.optional(),
    take: take.optional(),
  }),

  feedback: z.object({
    articleId: z.string().trim().min(1),
    mood: knownMood,
    action: z.enum(FEEDBACK_ACTIONS),
  }),

  generate: z.object({
    heuristicsOnly: z.boolean().default(false),
    onlyIfMissing: z.boolean().default(false),
    take: take.optional(),
  }),
};

export type GlobalQueryInput = z.infer<typeof schemas.globalQuery>;
export type PersonalQueryInput = z.infer<typeof schemas.personalQuery>;
export type FeedbackBody = z.infer<typeof schemas.feedback>;
export type GenerateInput = z.infer<typeof schemas.generate>;
