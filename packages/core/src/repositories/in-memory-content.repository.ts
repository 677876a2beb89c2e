import type { ContentModality } from '@prism/shared/src/types/retrieval.types.js';
import { cosineSimilarity } from '@prism/shared/src/utils/math.js';
import type {
  ContentMatch,
  ContentRecord,
  ContentRepository,
  ContentSearchInput,
  ContentSearchResult,
} from './content.repository.js';

export function createInMemoryContentRepository(): ContentRepository {
  const records = new Map<ContentModality, Map<string, ContentRecord>>();

  return {
    add(record: ContentRecord): Promise<void> {
      const byId = records.get(record.modality) ?? new Map<string, ContentRecord>();
      byId.set(record.id, record);
      records.set(record.modality, byId);
      return Promise.resolve();
    },

    searchSimilar(input: ContentSearchInput): Promise<ContentSearchResult> {
      const candidates = [...(records.get(input.modality)?.values() ?? [])];

      const matches: ContentMatch[] = candidates
        .map((record) => ({
          id: record.id,
          score: cosineSimilarity(input.embedding, record.embedding),
          snippet: record.snippet,
          preview: record.preview,
          metadata: record.metadata,
        }))
        .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
        .slice(0, input.limit);

      return Promise.resolve({ metric: 'cosine_similarity', matches });
    },
  };
}
