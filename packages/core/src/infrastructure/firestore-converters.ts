import { z } from 'zod';
import { Timestamp } from '@google-cloud/firestore';
import { PersistenceError } from '@prism/shared/src/utils/errors.js';

/** Field that `findNearest` writes the vector distance into. */
export const DISTANCE_FIELD = '__distance';

const TimestampSchema = z.instanceof(Timestamp);

const ImagePreviewSchema = z.object({
  mediaType: z.enum(['image/png', 'image/jpeg', 'image/webp', 'image/gif']),
  data: z.string(),
});

const TurnMetadataSchema = z.object({
  hasDocContext: z.boolean().optional(),
  hasImageContext: z.boolean().optional(),
  hasToolOutput: z.boolean().optional(),
  malformedResponse: z.boolean().optional(),
  toolName: z.string().optional(),
});

export const TurnDocumentSchema = z.object({
  conversationId: z.string(),
  sequence: z.number().int(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  userId: z.string(),
  timestamp: TimestampSchema,
  metadata: TurnMetadataSchema.optional(),
  [DISTANCE_FIELD]: z.number().optional(),
});

/** Marker only; summaries are derived from the turns. */
export const ConversationDocumentSchema = z.object({
  userId: z.string(),
});

export const ContentDocumentSchema = z.object({
  snippet: z.string().optional(),
  preview: ImagePreviewSchema.optional(),
  metadata: z.record(z.unknown()).default({}),
  [DISTANCE_FIELD]: z.number().optional(),
});

export type TurnDocument = z.infer<typeof TurnDocumentSchema>;
export type ConversationDocument = z.infer<typeof ConversationDocumentSchema>;
export type ContentDocument = z.infer<typeof ContentDocumentSchema>;

/** The part of a `DocumentSnapshot` that parsing reads. */
export interface SnapshotLike {
  data(): unknown;
  readonly ref: { readonly path: string };
}

export function parseDocument<T extends z.ZodTypeAny>(
  schema: T,
  snapshot: SnapshotLike,
): z.infer<T> {
  const result = schema.safeParse(snapshot.data());
  if (!result.success) {
    throw new PersistenceError(
      `Malformed document ${snapshot.ref.path}: ${result.error.errors.map((e) => e.message).join(', ')}`,
    );
  }
  return result.data;
}
