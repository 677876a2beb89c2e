import { z } from 'zod';
import type { RetrievalHit } from '@prism/shared/src/types/retrieval.types.js';
import type { RetrievalFederator } from '../retrieval/federator.js';
import { defineTool } from './tool-registry.js';
import type { RegisteredTool } from './tool-registry.js';

export const TRANSCRIPT_SEARCH_TOOL = 'search_video_transcripts';

const TranscriptSearchArgsSchema = z.object({
  queryText: z.string().min(1).describe('What to look for in the spoken content of the videos'),
});

export interface TranscriptSearchToolDeps {
  readonly federator: RetrievalFederator;
  readonly limit: number;
  readonly threshold: number;
}

function sourceLabel(hit: RetrievalHit): string {
  const video = hit.metadata['video'];
  return typeof video === 'string' ? video : hit.sourceId;
}

export function formatTranscriptHits(hits: readonly RetrievalHit[]): string {
  if (hits.length === 0) {
    return 'No matching transcript passages found.';
  }
  return hits.map((hit) => `- [Source: ${sourceLabel(hit)}] ${hit.snippet ?? ''}`).join('\n');
}

export function createTranscriptSearchTool(deps: TranscriptSearchToolDeps): RegisteredTool {
  return defineTool({
    name: TRANSCRIPT_SEARCH_TOOL,
    description: 'Search the transcripts of ingested videos for passages relevant to the query.',
    argsSchema: TranscriptSearchArgsSchema,

    async execute(args) {
      const result = await deps.federator.federate(args.queryText, ['transcript'], {
        limit: deps.limit,
        threshold: deps.threshold,
      });

      if (result.status === 'unavailable') {
        throw new Error(
          `Transcript index unavailable: ${result.failures.map((f) => f.reason).join('; ')}`,
        );
      }

      return {
        toolName: TRANSCRIPT_SEARCH_TOOL,
        arguments: { queryText: args.queryText },
        content: formatTranscriptHits(result.hits),
        data: result.hits,
      };
    },
  });
}
