import type { EmbeddingClient } from './embedding-client.js';
import { EMBEDDING_DIMENSION } from './embedding-client.js';

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const SIGN_BIT = 0x80000000;

function fnv1a(token: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Hashed bag of words: each token adds ±1 to one bucket. Texts sharing words
 * score above zero under cosine similarity; text without tokens maps to e₀.
 */
export function hashedTokenVector(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const token of tokenize(text)) {
    const hash = fnv1a(token);
    vector[hash % dimension] += hash >= SIGN_BIT ? -1 : 1;
  }

  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude === 0) {
    vector[0] = 1;
    return vector;
  }
  return vector.map((v) => v / magnitude);
}

export function createMockEmbeddingClient(dimension = EMBEDDING_DIMENSION): EmbeddingClient {
  return {
    dimension,

    generateEmbedding(text: string): Promise<number[]> {
      return Promise.resolve(hashedTokenVector(text, dimension));
    },

    generateEmbeddings(texts: string[]): Promise<number[][]> {
      return Promise.resolve(texts.map((t) => hashedTokenVector(t, dimension)));
    },
  };
}
