import type { SimilarityMetric } from '@prism/shared/src/types/retrieval.types.js';
import { clampUnit } from '@prism/shared/src/utils/math.js';

/**
 * Maps a native index score onto the shared [0, 1] similarity scale, where 1
 * is identical. Distances assume unit-length embeddings.
 */
export function normalizeScore(metric: SimilarityMetric, score: number): number {
  switch (metric) {
    case 'cosine_similarity':
    case 'dot_product':
      return clampUnit(score);
    case 'cosine_distance':
      return clampUnit(1 - score);
    case 'euclidean_distance':
      return clampUnit(1 - (score * score) / 2);
  }
}
