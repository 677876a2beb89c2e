import { randomUUID } from 'node:crypto';
import type { Firestore, QueryDocumentSnapshot } from '@google-cloud/firestore';
import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type {
  ConversationSummary,
  Turn,
  TurnSearchResult,
} from '@prism/shared/src/types/conversation.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { PersistenceError, toError } from '@prism/shared/src/utils/errors.js';
import type {
  AppendTurnInput,
  ConversationRepository,
  SearchTurnsInput,
} from '../repositories/conversation.repository.js';
import {
  compareSummaries,
  summarizeConversation,
} from '../repositories/conversation.repository.js';
import {
  DISTANCE_FIELD,
  TurnDocumentSchema,
  parseDocument,
} from './firestore-converters.js';
import type { ConversationDocument, TurnDocument } from './firestore-converters.js';

const log = createChildLogger('firestore:conversations');

const CONVERSATIONS_COLLECTION = 'conversations';
const TURNS_SUBCOLLECTION = 'turns';

/** Firestore caps a transaction at 500 writes. */
export const MAX_TRANSACTION_WRITES = 500;

/** Deleting removes every turn plus the marker document in one transaction. */
export function assertDeletableInOneTransaction(conversationId: string, turnCount: number): void {
  if (turnCount + 1 > MAX_TRANSACTION_WRITES) {
    throw new PersistenceError(
      `Conversation ${conversationId} has ${String(turnCount)} turns; at most ${String(MAX_TRANSACTION_WRITES - 1)} can be deleted atomically`,
    );
  }
}

function turnFromDoc(doc: QueryDocumentSnapshot): Turn {
  const data = parseDocument(TurnDocumentSchema, doc);
  return {
    id: doc.id,
    conversationId: data.conversationId,
    sequence: data.sequence,
    role: data.role,
    content: data.content,
    userId: data.userId,
    timestamp: data.timestamp.toDate(),
    metadata: data.metadata,
  };
}

/**
 * `conversations/{id}` is a marker document; turns live in its `turns`
 * subcollection keyed by turn id. Sequence numbers are assigned inside the
 * append transaction, and turns are created, never overwritten. Atomic delete
 * is bounded by {@link MAX_TRANSACTION_WRITES}.
 */
export function createFirestoreConversationRepository(db: Firestore): ConversationRepository {
  const conversationsRef = db.collection(CONVERSATIONS_COLLECTION);

  function turnsRef(conversationId: string) {
    return conversationsRef.doc(conversationId).collection(TURNS_SUBCOLLECTION);
  }

  async function list(conversationId: string): Promise<readonly Turn[]> {
    const snapshot = await turnsRef(conversationId)
      .orderBy('timestamp', 'asc')
      .orderBy('sequence', 'asc')
      .get();
    return snapshot.docs.map(turnFromDoc);
  }

  return {
    async append(input: AppendTurnInput): Promise<Turn> {
      const id = randomUUID();
      const conversationRef = conversationsRef.doc(input.conversationId);
      const turnRef = turnsRef(input.conversationId).doc(id);
      const lastTurnQuery = turnsRef(input.conversationId).orderBy('sequence', 'desc').limit(1);

      try {
        return await db.runTransaction(async (tx) => {
          const [conversationSnap, lastTurnSnap] = await Promise.all([
            tx.get(conversationRef),
            tx.get(lastTurnQuery),
          ]);

          const lastSequence = lastTurnSnap.empty
            ? 0
            : parseDocument(TurnDocumentSchema, lastTurnSnap.docs[0]).sequence;

          const timestamp = input.timestamp ? Timestamp.fromDate(input.timestamp) : Timestamp.now();
          const sequence = lastSequence + 1;

          const turnData: TurnDocument = {
            conversationId: input.conversationId,
            sequence,
            role: input.role,
            content: input.content,
            userId: input.userId,
            timestamp,
            metadata: input.metadata,
          };

          // create() fails on an id collision instead of replacing the turn.
          tx.create(turnRef, {
            ...turnData,
            embedding: input.embedding ? FieldValue.vector([...input.embedding]) : undefined,
          });

          if (!conversationSnap.exists) {
            const marker: ConversationDocument = { userId: input.userId };
            tx.set(conversationRef, marker);
          }

          return {
            id,
            conversationId: input.conversationId,
            sequence,
            role: input.role,
            content: input.content,
            userId: input.userId,
            timestamp: timestamp.toDate(),
            metadata: input.metadata,
          };
        });
      } catch (error) {
        throw new PersistenceError(
          `Failed to append turn to conversation ${input.conversationId}`,
          toError(error),
        );
      }
    },

    list,

    async listRecent(conversationId: string, n: number): Promise<readonly Turn[]> {
      if (n <= 0) {
        return [];
      }
      const snapshot = await turnsRef(conversationId)
        .orderBy('timestamp', 'desc')
        .orderBy('sequence', 'desc')
        .limit(n)
        .get();
      return snapshot.docs.map(turnFromDoc).reverse();
    },

    async listConversations(userId?: string): Promise<readonly ConversationSummary[]> {
      const query =
        userId === undefined ? conversationsRef : conversationsRef.where('userId', '==', userId);
      const snapshot = await query.get();

      const summaries = await Promise.all(
        snapshot.docs.map(async (doc) => {
          const turns = await list(doc.id);
          return turns.length > 0 ? summarizeConversation(doc.id, turns) : undefined;
        }),
      );

      return summaries
        .filter((summary): summary is ConversationSummary => summary !== undefined)
        .sort(compareSummaries);
    },

    async delete(conversationId: string): Promise<number> {
      const conversationRef = conversationsRef.doc(conversationId);
      try {
        const removed = await db.runTransaction(async (tx) => {
          const turns = await tx.get(turnsRef(conversationId));
          assertDeletableInOneTransaction(conversationId, turns.size);
          for (const doc of turns.docs) {
            tx.delete(doc.ref);
          }
          tx.delete(conversationRef);
          return turns.size;
        });
        log.info({ conversationId, removed }, 'Conversation deleted');
        return removed;
      } catch (error) {
        if (error instanceof PersistenceError) {
          throw error;
        }
        throw new PersistenceError(
          `Failed to delete conversation ${conversationId}`,
          toError(error),
        );
      }
    },

    async searchSimilar(input: SearchTurnsInput): Promise<readonly TurnSearchResult[]> {
      const base = db.collectionGroup(TURNS_SUBCOLLECTION);
      const scoped = input.userId === undefined ? base : base.where('userId', '==', input.userId);

      const snapshot = await scoped
        .findNearest({
          vectorField: 'embedding',
          queryVector: [...input.embedding],
          limit: input.limit,
          distanceMeasure: 'COSINE',
          distanceResultField: DISTANCE_FIELD,
        })
        .get();

      return snapshot.docs.map((doc) => {
        const distance = parseDocument(TurnDocumentSchema, doc)[DISTANCE_FIELD] ?? 2;
        return { turn: turnFromDoc(doc), score: 1 - distance };
      });
    },
  };
}
