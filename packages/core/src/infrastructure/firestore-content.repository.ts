import type { Firestore } from '@google-cloud/firestore';
import { FieldValue } from '@google-cloud/firestore';
import type { ContentModality } from '@prism/shared/src/types/retrieval.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { PersistenceError, toError } from '@prism/shared/src/utils/errors.js';
import type {
  ContentMatch,
  ContentRecord,
  ContentRepository,
  ContentSearchInput,
  ContentSearchResult,
} from '../repositories/content.repository.js';
import { ContentDocumentSchema, DISTANCE_FIELD, parseDocument } from './firestore-converters.js';

const log = createChildLogger('firestore:content');

export const CONTENT_COLLECTIONS: Readonly<Record<ContentModality, string>> = {
  document: 'documentChunks',
  image: 'images',
  video_frame: 'videoFrames',
  transcript: 'videoSentences',
};

/**
 * One vector-indexed collection per modality. Scores are Firestore COSINE
 * distances (0 = identical, 2 = opposite).
 */
export function createFirestoreContentRepository(db: Firestore): ContentRepository {
  return {
    async add(record: ContentRecord): Promise<void> {
      try {
        await db
          .collection(CONTENT_COLLECTIONS[record.modality])
          .doc(record.id)
          .set({
            embedding: FieldValue.vector([...record.embedding]),
            snippet: record.snippet,
            preview: record.preview,
            metadata: record.metadata,
          });
      } catch (error) {
        throw new PersistenceError(`Failed to add content ${record.id}`, toError(error));
      }
    },

    async searchSimilar(input: ContentSearchInput): Promise<ContentSearchResult> {
      const snapshot = await db
        .collection(CONTENT_COLLECTIONS[input.modality])
        .findNearest({
          vectorField: 'embedding',
          queryVector: [...input.embedding],
          limit: input.limit,
          distanceMeasure: 'COSINE',
          distanceResultField: DISTANCE_FIELD,
        })
        .get();

      log.debug({ modality: input.modality, docCount: snapshot.docs.length }, 'findNearest completed');

      const matches: ContentMatch[] = snapshot.docs.map((doc) => {
        const data = parseDocument(ContentDocumentSchema, doc);
        return {
          id: doc.id,
          score: data[DISTANCE_FIELD] ?? 2,
          snippet: data.snippet,
          preview: data.preview,
          metadata: data.metadata,
        };
      });

      return { metric: 'cosine_distance', matches };
    },
  };
}
