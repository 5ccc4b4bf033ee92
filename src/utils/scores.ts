const MIN_K = 1;
const MAX_K = 20;

export interface RetrievalPlan {
  k: number;
  nDocs: number;
  nChunksPerDoc: number;
}

/**
 * Display-only conversion of a distance (lower is closer) to a 0-100
 * similarity figure. Not comparable across the summary and chunk stages.
 */
export function toSimilarityPercent(distance: number): number {
  if (!Number.isFinite(distance)) {
    return 0;
  }
  const percent = 100 - distance * 10;
  return Math.min(100, Math.max(0, Number(percent.toFixed(1))));
}

/** Spreads a flat result budget `k` over a few documents with several chunks each. */
export function planRetrieval(k: number): RetrievalPlan {
  const bounded = Math.max(MIN_K, Math.min(MAX_K, Math.floor(k)));
  const nDocs = Math.max(2, Math.floor(bounded / 3));
  const nChunksPerDoc = Math.max(3, Math.floor(bounded / nDocs));
  return { k: bounded, nDocs, nChunksPerDoc };
}
