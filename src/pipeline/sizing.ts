/** List sizes shared by the reranker, heat normalization and the diversity selector. */
export interface GlobalSizing {
  /** Items written per snapshot. */
  storeCount: number;
  /** Reranker window and ceiling on the assembled list. */
  maxCandidates: number;
}

/** Length the reranked (or heuristic) list is assembled to before diversity caps. */
export function assembleSize(storeCount: number, take: number): number {
  return Math.max(storeCount, take * 2, 12);
}

/** Number of top-scored candidates that heat is normalized over and the selector draws from. */
export function poolSize(sizing: GlobalSizing, take: number): number {
  return Math.min(sizing.maxCandidates, assembleSize(sizing.storeCount, take));
}
