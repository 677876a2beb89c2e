import type {
  FederationOptions,
  FederationResult,
  FederationStatus,
  Modality,
  ModalityFailure,
  RetrievalHit,
} from '@prism/shared/src/types/retrieval.types.js';
import { modalityPriority } from '@prism/shared/src/types/retrieval.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { toError } from '@prism/shared/src/utils/errors.js';
import { withTimeout } from '@prism/shared/src/utils/async.js';
import type { ContentIndex } from './content-index.js';
import { normalizeScore } from './score-normalization.js';

const log = createChildLogger('retrieval:federator');

export const DEFAULT_FEDERATION_LIMIT = 30;
export const DEFAULT_FEDERATION_THRESHOLD = 0;

export interface RetrievalFederator {
  federate(
    queryText: string,
    modalities: readonly Modality[],
    options?: FederationOptions,
  ): Promise<FederationResult>;
}

export interface FederatorDeps {
  readonly indices: readonly ContentIndex[];
  /** Applied to each modality's search separately. */
  readonly timeoutMs: number;
}

type ModalityOutcome =
  | { readonly ok: true; readonly hits: readonly RetrievalHit[] }
  | { readonly ok: false; readonly failure: ModalityFailure };

export function compareHits(a: RetrievalHit, b: RetrievalHit): number {
  return (
    b.similarity - a.similarity ||
    modalityPriority(a.modality) - modalityPriority(b.modality) ||
    (a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0)
  );
}

/** Keeps the best-ranked transcript hit per distinct sentence. Expects sorted input. */
function dedupeTranscripts(hits: readonly RetrievalHit[]): RetrievalHit[] {
  const seen = new Set<string>();
  return hits.filter((hit) => {
    if (hit.modality !== 'transcript' || hit.snippet === undefined) {
      return true;
    }
    if (seen.has(hit.snippet)) {
      return false;
    }
    seen.add(hit.snippet);
    return true;
  });
}

function statusOf(requested: number, failed: number): FederationStatus {
  if (requested > 0 && failed === requested) return 'unavailable';
  if (failed > 0) return 'partial';
  return 'complete';
}

export function createRetrievalFederator(deps: FederatorDeps): RetrievalFederator {
  const indices = new Map<Modality, ContentIndex>(deps.indices.map((index) => [index.modality, index]));

  async function searchOne(modality: Modality, queryText: string, k: number): Promise<ModalityOutcome> {
    const index = indices.get(modality);
    if (!index) {
      return {
        ok: false,
        failure: {
          kind: 'ModalityUnavailable',
          modality,
          reason: `No index registered for modality ${modality}`,
        },
      };
    }

    try {
      const result = await withTimeout(
        index.search(queryText, k),
        deps.timeoutMs,
        `Retrieval for ${modality}`,
      );
      const hits = result.matches.map(
        (match): RetrievalHit => ({
          modality,
          sourceId: match.sourceId,
          similarity: normalizeScore(result.metric, match.score),
          snippet: match.snippet,
          preview: match.preview,
          metadata: match.metadata,
        }),
      );
      return { ok: true, hits };
    } catch (error) {
      const reason = toError(error).message;
      log.warn({ modality, reason }, 'Modality unavailable');
      return { ok: false, failure: { kind: 'ModalityUnavailable', modality, reason } };
    }
  }

  return {
    async federate(
      queryText: string,
      modalities: readonly Modality[],
      options: FederationOptions = {},
    ): Promise<FederationResult> {
      const limit = options.limit ?? DEFAULT_FEDERATION_LIMIT;
      const threshold = options.threshold ?? DEFAULT_FEDERATION_THRESHOLD;
      const requested = [...new Set(modalities)];

      const outcomes = await Promise.all(
        requested.map((modality) => searchOne(modality, queryText, limit)),
      );

      const failures: ModalityFailure[] = [];
      const merged: RetrievalHit[] = [];
      for (const outcome of outcomes) {
        if (outcome.ok) {
          merged.push(...outcome.hits);
        } else {
          failures.push(outcome.failure);
        }
      }

      merged.sort(compareHits);
      const hits = dedupeTranscripts(merged)
        .filter((hit) => hit.similarity >= threshold)
        .slice(0, limit);

      const status = statusOf(requested.length, failures.length);

      log.debug(
        { modalities: requested, status, hitCount: hits.length, failureCount: failures.length },
        'Federated retrieval completed',
      );

      return { status, hits, failures };
    },
  };
}
