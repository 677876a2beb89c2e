/**
 * Content modalities, in tie-break priority order.
 */
export const MODALITIES = ['document', 'image', 'video_frame', 'transcript', 'chat_memory'] as const;

export type Modality = (typeof MODALITIES)[number];

/** Modalities backed by the content store (chat memory lives with conversations). */
export const CONTENT_MODALITIES = ['document', 'image', 'video_frame', 'transcript'] as const;

export type ContentModality = (typeof CONTENT_MODALITIES)[number];

export function isModality(value: string): value is Modality {
  return (MODALITIES as readonly string[]).includes(value);
}

export function modalityPriority(modality: Modality): number {
  return MODALITIES.indexOf(modality);
}

export type SimilarityMetric =
  | 'cosine_similarity'
  | 'cosine_distance'
  | 'dot_product'
  | 'euclidean_distance';

export interface ImagePreview {
  readonly mediaType: 'image/png' | 'image/jpeg' | 'image/webp' | 'image/gif';
  /** Base64 encoded bytes. */
  readonly data: string;
}

export interface RetrievalHit {
  readonly modality: Modality;
  readonly sourceId: string;
  /** Normalized to [0, 1]. */
  readonly similarity: number;
  readonly snippet?: string;
  readonly preview?: ImagePreview;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ModalityFailure {
  readonly kind: 'ModalityUnavailable';
  readonly modality: Modality;
  readonly reason: string;
}

export type FederationStatus = 'complete' | 'partial' | 'unavailable';

export interface FederationResult {
  readonly status: FederationStatus;
  readonly hits: readonly RetrievalHit[];
  readonly failures: readonly ModalityFailure[];
}

export interface FederationOptions {
  readonly limit?: number;
  readonly threshold?: number;
}
