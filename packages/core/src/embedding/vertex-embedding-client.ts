import { z } from 'zod';
import { helpers, v1 } from '@google-cloud/aiplatform';
import type { EmbeddingClient, EmbeddingModelKind } from './embedding-client.js';
import {
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_MULTIMODAL_EMBEDDING_MODEL,
  EMBEDDING_DIMENSION,
} from './embedding-client.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { ConfigurationError, LlmError, toError } from '@prism/shared/src/utils/errors.js';

const log = createChildLogger('embedding:vertex');

export interface VertexEmbeddingOptions {
  readonly kind?: EmbeddingModelKind;
  readonly model?: string;
  readonly dimension?: number;
}

const TextPredictionSchema = z.object({
  embeddings: z.object({ values: z.array(z.number()) }),
});

const MultimodalPredictionSchema = z.object({
  textEmbedding: z.array(z.number()),
});

type PredictionServiceClient = InstanceType<typeof v1.PredictionServiceClient>;

export function parsePrediction(raw: unknown, kind: EmbeddingModelKind): number[] | undefined {
  if (kind === 'multimodal') {
    const parsed = MultimodalPredictionSchema.safeParse(raw);
    return parsed.success ? parsed.data.textEmbedding : undefined;
  }
  const parsed = TextPredictionSchema.safeParse(raw);
  return parsed.success ? parsed.data.embeddings.values : undefined;
}

export function createVertexEmbeddingClient(options: VertexEmbeddingOptions = {}): EmbeddingClient {
  const projectId = process.env['PRISM_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';
  const kind = options.kind ?? 'text';
  const model =
    options.model ?? (kind === 'multimodal' ? DEFAULT_MULTIMODAL_EMBEDDING_MODEL : DEFAULT_EMBEDDING_MODEL);
  const dimension = options.dimension ?? EMBEDDING_DIMENSION;

  if (!projectId) {
    throw new ConfigurationError(
      'PRISM_GCP_PROJECT_ID environment variable is required for Vertex AI embedding client',
    );
  }

  const endpoint = `projects/${projectId}/locations/${location}/publishers/google/models/${model}`;

  log.info({ projectId, location, model, kind, dimension }, 'Initializing Vertex AI embedding client');

  let clientInstance: PredictionServiceClient | undefined;

  function getClient(): PredictionServiceClient {
    clientInstance ??= new v1.PredictionServiceClient({
      apiEndpoint: `${location}-aiplatform.googleapis.com`,
      projectId,
    });
    return clientInstance;
  }

  const instanceField = kind === 'multimodal' ? 'text' : 'content';

  async function embed(texts: string[]): Promise<number[][]> {
    try {
      const instances = texts.map((text) => ({
        structValue: {
          fields: {
            [instanceField]: { stringValue: text },
          },
        },
      }));
      const parameters =
        kind === 'multimodal'
          ? { structValue: { fields: { dimension: { numberValue: dimension } } } }
          : undefined;

      const [response] = await getClient().predict({ endpoint, instances, parameters });

      const rawPredictions = response.predictions ?? [];
      if (rawPredictions.length !== texts.length) {
        log.error({ count: rawPredictions.length }, 'Unexpected embedding response');
        throw new LlmError(
          `Unexpected embedding response: expected ${String(texts.length)} predictions, got ${String(rawPredictions.length)}`,
          false,
        );
      }

      return rawPredictions.map((raw) => {
        const values = parsePrediction(
          helpers.fromValue(raw as Parameters<typeof helpers.fromValue>[0]),
          kind,
        );
        if (!values || values.length !== dimension) {
          throw new LlmError(
            `Unexpected embedding dimension: expected ${String(dimension)}, got ${String(values?.length ?? 0)}`,
            false,
          );
        }
        return values;
      });
    } catch (error) {
      if (error instanceof LlmError) {
        throw error;
      }
      const cause = toError(error);
      throw new LlmError(`Vertex AI embedding failed: ${cause.message}`, false, cause);
    }
  }

  return {
    dimension,

    async generateEmbedding(text: string): Promise<number[]> {
      log.debug({ textLength: text.length }, 'Generating single embedding');
      const [result] = await embed([text]);
      return result;
    },

    async generateEmbeddings(texts: string[]): Promise<number[][]> {
      log.debug({ count: texts.length }, 'Generating batch embeddings');
      return embed(texts);
    },
  };
}
