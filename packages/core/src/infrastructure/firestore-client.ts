import { Firestore } from '@google-cloud/firestore';
import { createChildLogger } from '@prism/shared/src/logger.js';

const log = createChildLogger('infra:firestore');

export interface FirestoreClientOptions {
  readonly projectId?: string;
  /** Named database; Firestore uses `(default)` when omitted. */
  readonly databaseId?: string;
}

export function createFirestoreClient(options: FirestoreClientOptions = {}): Firestore {
  const projectId =
    options.projectId ?? process.env['PRISM_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const databaseId = options.databaseId ?? process.env['PRISM_FIRESTORE_DATABASE'];
  const emulatorHost = process.env['FIRESTORE_EMULATOR_HOST'];

  log.info({ projectId, databaseId, emulatorHost }, 'Creating Firestore client');

  // Turns without embeddings or metadata carry undefined fields.
  return new Firestore({
    projectId,
    databaseId,
    ignoreUndefinedProperties: true,
  });
}
