export const EMBEDDING_DIMENSION = 768;
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-005';
export const DEFAULT_MULTIMODAL_EMBEDDING_MODEL = 'multimodalembedding@001';

/**
 * `text` models embed documents, transcripts and chat turns; `multimodal`
 * models embed a text query into the image space.
 */
export type EmbeddingModelKind = 'text' | 'multimodal';

export interface EmbeddingClient {
  readonly dimension: number;
  generateEmbedding(text: string): Promise<number[]>;
  generateEmbeddings(texts: string[]): Promise<number[][]>;
}
