import { vi } from 'vitest';
import { supabase } from '../../src/config/supabase.js';

export interface QueryResult {
  data?: unknown;
  count?: number | null;
  error?: unknown;
}

/**
 * Chainable stand-in for a Supabase query builder. Every builder method
 * returns the chain; awaiting it (or `maybeSingle`) yields `result`.
 * Callers must `vi.mock` the supabase config module first.
 */
export function createChain(result: QueryResult) {
  const chain = {
    select: vi.fn(),
    eq: vi.fn(),
    in: vi.fn(),
    gte: vi.fn(),
    lte: vi.fn(),
    order: vi.fn(),
    limit: vi.fn(),
    upsert: vi.fn(),
    insert: vi.fn(),
    maybeSingle: vi.fn(async () => result),
    then: (resolve: (value: QueryResult) => unknown) => resolve(result),
  };
  for (const method of [chain.select, chain.eq, chain.in, chain.gte, chain.lte, chain.order, chain.limit, chain.upsert, chain.insert]) {
    method.mockReturnValue(chain);
  }
  vi.mocked(supabase.from).mockReturnValue(chain as unknown as ReturnType<typeof supabase.from>);
  return chain;
}
