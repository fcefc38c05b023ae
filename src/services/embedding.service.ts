import OpenAI from 'openai';
import { z } from 'zod';
import type { EmbeddingProvider } from '../types/index.js';
import { logger } from '../utils/logger.js';

const MAX_INPUT_CHARS = 8000;

/** The slice of the OpenAI client the embedder calls. */
export interface EmbeddingsApi {
  embeddings: {
    create(
      body: { model: string; input: string },
      options?: { signal?: AbortSignal; timeout?: number },
    ): Promise<unknown>;
  };
}

export interface OpenAiEmbedderOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutSeconds?: number;
  client?: EmbeddingsApi;
}

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

/**
 * Embeddings over an OpenAI-compatible /v1/embeddings endpoint.
 * Any failure yields an empty vector, which callers treat as "no vector".
 */
export class OpenAiEmbedder implements EmbeddingProvider {
  private readonly client: EmbeddingsApi;
  private readonly timeoutMs: number;

  constructor(private readonly options: OpenAiEmbedderOptions) {
    this.timeoutMs = (options.timeoutSeconds ?? 10) * 1000;
    this.client =
      options.client ??
      new OpenAI({
        baseURL: `${options.baseUrl.replace(/\/+$/, '')}/v1`,
        apiKey: options.apiKey,
        maxRetries: 0,
        timeout: this.timeoutMs,
      });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const input = text.trim().slice(0, MAX_INPUT_CHARS);
    if (input.length === 0) return [];

    try {
      const response = await this.client.embeddings.create(
        { model: this.options.model, input },
        { signal, timeout: this.timeoutMs },
      );

      const parsed = embeddingResponseSchema.safeParse(response);
      if (!parsed.success) {
        logger.warn('Embedding response missing data');
        return [];
      }
      return parsed.data.data[0].embedding;
    } catch (error) {
      if (signal?.aborted) throw error;
      logger.warn({ error }, 'Embedding request failed');
      return [];
    }
  }
}
