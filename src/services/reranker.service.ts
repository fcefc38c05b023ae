import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import { z } from 'zod';
import type { RerankerClient, RerankInput, RerankPick } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { RetryableError, RetryPolicy, rerankerRetryPolicy } from '../utils/retry.js';
import { clamp } from '../utils/helpers.js';

const MIN_TIMEOUT_SECONDS = 4;
const MAX_TAGS = 8;
const MAX_REASONS = 3;

interface RerankRequest {
  model: string;
  temperature: number;
  response_format: { type: 'json_object' };
  messages: Array<{ role: 'system' | 'user'; content: string }>;
}

/** The slice of the OpenAI client the reranker calls. */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: RerankRequest, options?: { signal?: AbortSignal; timeout?: number }): Promise<unknown>;
    };
  };
}

export interface OpenAiRerankerOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutSeconds: number;
  retryPolicy?: RetryPolicy;
  client?: ChatCompletionsApi;
}

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const pickSchema = z.object({
  id: z.unknown(),
  score: z.unknown().optional(),
  reasons: z.unknown().optional(),
});

function trimTo(s: string | null, max: number): string {
  if (!s) return '';
  return s.length <= max ? s : s.slice(0, max);
}

export function buildSystemPrompt(topK: number): string {
  return (
    'You are a front-page editor. Rank the MOST important stories for a general audience TODAY. ' +
    'Prioritize: policy/geopolitics, major corporate actions, disasters, war/ceasefire, security, ' +
    'macro/markets, public health. Deprioritize: deals/discounts, product reviews, shopping guides, ' +
    'minor app updates, gossip. Prefer stories corroborated by reputable outlets and with wider impact. ' +
    'Return strict JSON: {"top":[{"id":"...","score":0..1,"reasons":["..."]}]} ' +
    `Limit to top ${topK}. Keep scores monotonic (desc).`
  );
}

export function toCompactRecord(item: RerankInput) {
  return {
    id: item.id,
    t: trimTo(item.title, 240),
    s: item.sourceId,
    p: item.publishedAt.toISOString(),
    sum: trimTo(item.summary, 320),
    tags: item.tags.slice(0, MAX_TAGS),
  };
}

/**
 * Parse the model's JSON content into picks. Anything that is not an object
 * with a `top` array yields no picks; entries without a usable id are skipped.
 */
export function parseRerankContent(content: string, topK: number): RerankPick[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    logger.warn({ length: content.length }, 'Reranker returned malformed JSON');
    return [];
  }

  const top = z.object({ top: z.array(z.unknown()) }).safeParse(parsed);
  if (!top.success) return [];

  const picks: RerankPick[] = [];
  for (const entry of top.data.top) {
    const el = pickSchema.safeParse(entry);
    if (!el.success) continue;
    const { id, score, reasons } = el.data;
    if (typeof id !== 'string' || id.trim().length === 0) continue;

    const numeric = typeof score === 'number' && Number.isFinite(score) ? clamp(score, 0, 1) : 0.5;
    const why = Array.isArray(reasons)
      ? reasons.filter((r): r is string => typeof r === 'string' && r.length > 0).slice(0, MAX_REASONS)
      : [];
    picks.push({ id, score: numeric, reasons: why });
    if (picks.length >= topK) break;
  }
  return picks;
}

/**
 * Reranking oracle over an OpenAI-compatible chat completions endpoint.
 *
 * The SDK's own retries are off so RetryPolicy decides: 429 and 5xx retry,
 * other HTTP errors and timeouts give up at once. Fail-soft: every failure
 * resolves to []. Only caller cancellation rejects.
 */
export class OpenAiReranker implements RerankerClient {
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly client: ChatCompletionsApi;

  constructor(private readonly options: OpenAiRerankerOptions) {
    this.timeoutMs = Math.max(MIN_TIMEOUT_SECONDS, options.timeoutSeconds) * 1000;
    this.retryPolicy = options.retryPolicy ?? rerankerRetryPolicy;
    this.client =
      options.client ??
      new OpenAI({
        baseURL: `${options.baseUrl.replace(/\/+$/, '')}/v1`,
        apiKey: options.apiKey,
        maxRetries: 0,
        timeout: this.timeoutMs,
      });
  }

  async rerank(items: RerankInput[], topK: number, signal?: AbortSignal): Promise<RerankPick[]> {
    if (items.length === 0 || topK <= 0) return [];

    const request: RerankRequest = {
      model: this.options.model,
      temperature: 0.1,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: buildSystemPrompt(topK) },
        { role: 'user', content: JSON.stringify({ items: items.map(toCompactRecord) }) },
      ],
    };

    try {
      return await this.retryPolicy.execute(async (attempt) => {
        const content = await this.complete(request, attempt, signal);
        return content === null ? [] : parseRerankContent(content, topK);
      }, signal);
    } catch (error) {
      if (signal?.aborted) {
        logger.debug('Reranker cancelled by caller');
        throw error;
      }
      if (error instanceof RetryableError) {
        logger.warn(
          { status: error.status, attempts: this.retryPolicy.maxAttempts },
          'Reranker giving up after retries',
        );
      } else if (error instanceof APIConnectionTimeoutError) {
        logger.warn({ timeoutMs: this.timeoutMs }, 'Reranker timed out');
      } else {
        logger.error({ error }, 'Reranker failed');
      }
      return [];
    }
  }

  /** One attempt. Returns message content, or null for a non-retryable failure. */
  private async complete(request: RerankRequest, attempt: number, signal?: AbortSignal): Promise<string | null> {
    let response: unknown;
    try {
      response = await this.client.chat.completions.create(request, { signal, timeout: this.timeoutMs });
    } catch (error) {
      if (error instanceof APIError && error.status !== undefined) {
        logger.warn({ status: error.status, attempt }, 'Reranker HTTP error');
        if (error.status === 429 || error.status >= 500) {
          throw new RetryableError(`Reranker HTTP ${error.status}`, error.status);
        }
        return null;
      }
      throw error;
    }

    const completion = completionSchema.safeParse(response);
    if (!completion.success) {
      logger.warn({ attempt }, 'Reranker response missing choices');
      return null;
    }
    return completion.data.choices[0].message.content ?? '{}';
  }
}
