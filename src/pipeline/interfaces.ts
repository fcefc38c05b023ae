/**
 * Pipeline component interfaces.
 *
 * A ranking pipeline is assembled from these pieces:
 *   QueryHydrator -> Source -> Hydrator -> Filter -> Scorer -> Selector
 *   -> post-selection Filter -> SideEffect
 */

import type { FilterResult } from './types.js';

/**
 * QueryHydrator enriches the query with context (user state, prior ranks).
 * Query hydrators run in parallel; a failure leaves the query unchanged.
 */
export interface QueryHydrator<Q> {
  name: string;
  enable(query: Q): boolean;
  hydrate(query: Q): Promise<Partial<Q>>;
}

/**
 * Source fetches raw candidates. Multiple sources run in parallel and their
 * results are merged. A `required` source aborts the run when it fails
 * instead of contributing nothing.
 */
export interface Source<Q, C> {
  name: string;
  required?: boolean;
  enable(query: Q): boolean;
  getCandidates(query: Q): Promise<C[]>;
}

/**
 * Hydrator enriches candidates after sourcing.
 * Must return the same number of candidates in the same order.
 */
export interface Hydrator<Q, C> {
  name: string;
  enable(query: Q): boolean;
  hydrate(query: Q, candidates: C[]): Promise<C[]>;
}

/**
 * Filter partitions candidates into kept and removed sets.
 * Filters run sequentially: each sees the output of the previous.
 */
export interface Filter<Q, C> {
  name: string;
  enable(query: Q): boolean;
  filter(query: Q, candidates: C[]): Promise<FilterResult<C>>;
}

/**
 * Scorer assigns scores to candidates. Runs sequentially so scorers can
 * depend on earlier scorers' results (heat depends on the reranked score).
 *
 * Must return the same candidates in the same order.
 * Dropping candidates in a scorer is not allowed: use a Filter instead.
 */
export interface Scorer<Q, C> {
  name: string;
  enable(query: Q): boolean;
  score(query: Q, candidates: C[]): Promise<C[]>;
}

/** Selector orders scored candidates and picks the output list. */
export interface Selector<Q, C> {
  name: string;
  enable(query: Q): boolean;
  select(query: Q, candidates: C[]): C[];
}

/**
 * SideEffect runs after selection (metrics, logging).
 * Fire-and-forget: does not block the response.
 */
export interface SideEffect<Q, C> {
  name: string;
  enable(query: Q): boolean;
  run(query: Q, selectedCandidates: C[]): Promise<void>;
}
