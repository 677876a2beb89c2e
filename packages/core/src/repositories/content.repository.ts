import type {
  ContentModality,
  ImagePreview,
  SimilarityMetric,
} from '@prism/shared/src/types/retrieval.types.js';

export interface ContentRecord {
  readonly id: string;
  readonly modality: ContentModality;
  readonly embedding: readonly number[];
  readonly snippet?: string;
  readonly preview?: ImagePreview;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ContentMatch {
  readonly id: string;
  /** Native score of the backing index, interpreted through `metric`. */
  readonly score: number;
  readonly snippet?: string;
  readonly preview?: ImagePreview;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ContentSearchInput {
  readonly modality: ContentModality;
  readonly embedding: readonly number[];
  readonly limit: number;
}

export interface ContentSearchResult {
  readonly metric: SimilarityMetric;
  readonly matches: readonly ContentMatch[];
}

export interface ContentRepository {
  add(record: ContentRecord): Promise<void>;
  searchSimilar(input: ContentSearchInput): Promise<ContentSearchResult>;
}
