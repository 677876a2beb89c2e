import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { createToolRegistry, defineTool } from './tool-registry.js';
import { createToolInvoker } from './tool-invoker.js';
import { createWebSearchTool } from './web-search.tool.js';
import { createTranscriptSearchTool, formatTranscriptHits } from './transcript-search.tool.js';
import { createMockWebSearchClient } from '../services/web-search/mock-web-search-client.js';
import type { RetrievalFederator } from '../retrieval/federator.js';
import type { FederationResult } from '@prism/shared/src/types/retrieval.types.js';

function fakeFederator(result: FederationResult): RetrievalFederator {
  return { federate: vi.fn().mockResolvedValue(result) };
}

const echoTool = defineTool({
  name: 'echo',
  description: 'Echo a word',
  argsSchema: z.object({ word: z.string() }),
  execute: (args) =>
    Promise.resolve({ toolName: 'echo', arguments: args, content: args.word }),
});

describe('ToolRegistry', () => {
  it('should expose JSON schema specs generated from argument schemas', () => {
    const registry = createToolRegistry([echoTool]);

    expect(registry.specs()).toEqual([
      {
        name: 'echo',
        description: 'Echo a word',
        parameters: {
          type: 'object',
          properties: { word: { type: 'string' } },
          required: ['word'],
          additionalProperties: false,
        },
      },
    ]);
    expect(registry.get('echo')).toBe(echoTool);
    expect(registry.get('missing')).toBeUndefined();
  });
});

describe('ToolInvoker', () => {
  it('should return none without a request', async () => {
    const invoker = createToolInvoker({ registry: createToolRegistry([echoTool]), timeoutMs: 100 });
    expect(await invoker.invoke()).toEqual({ status: 'none' });
  });

  it('should dispatch by exact name', async () => {
    const invoker = createToolInvoker({ registry: createToolRegistry([echoTool]), timeoutMs: 100 });

    const outcome = await invoker.invoke({ name: 'echo', arguments: { word: 'tide' } });

    expect(outcome).toEqual({
      status: 'success',
      result: { toolName: 'echo', arguments: { word: 'tide' }, content: 'tide' },
    });
  });

  it('should report an unknown tool without executing anything', async () => {
    const execute = vi.fn();
    const registry = createToolRegistry([
      defineTool({ name: 'web_search', description: 'x', argsSchema: z.object({}), execute }),
    ]);
    const invoker = createToolInvoker({ registry, timeoutMs: 100 });

    const outcome = await invoker.invoke({ name: 'Web_Search', arguments: {} });

    expect(outcome).toEqual({
      status: 'error',
      error: { kind: 'UnknownTool', toolName: 'Web_Search', message: 'Unknown tool: Web_Search' },
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('should turn invalid arguments into an execution failure', async () => {
    const invoker = createToolInvoker({ registry: createToolRegistry([echoTool]), timeoutMs: 100 });

    const outcome = await invoker.invoke({ name: 'echo', arguments: { word: 42 } });

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.kind).toBe('ExecutionFailure');
      expect(outcome.error.message).toBe(
        'Invalid arguments for echo: word: Expected string, received number',
      );
    }
  });

  it('should turn a thrown error into an execution failure', async () => {
    const registry = createToolRegistry([
      defineTool({
        name: 'broken',
        description: 'x',
        argsSchema: z.object({}),
        execute: () => Promise.reject(new Error('upstream refused')),
      }),
    ]);
    const invoker = createToolInvoker({ registry, timeoutMs: 100 });

    const outcome = await invoker.invoke({ name: 'broken', arguments: {} });

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.kind).toBe('ExecutionFailure');
      expect(outcome.error.message).toBe('upstream refused');
      expect(outcome.error.cause).toBeInstanceOf(Error);
    }
  });

  it('should report a timeout when the tool exceeds its budget', async () => {
    const registry = createToolRegistry([
      defineTool({
        name: 'slow',
        description: 'x',
        argsSchema: z.object({}),
        execute: () => new Promise(() => undefined),
      }),
    ]);
    const invoker = createToolInvoker({ registry, timeoutMs: 20 });

    const outcome = await invoker.invoke({ name: 'slow', arguments: {} });

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.kind).toBe('Timeout');
      expect(outcome.error.message).toBe('Tool slow timed out after 20ms');
    }
  });
});

describe('web_search tool', () => {
  it('should format the grounded summary with its sources', async () => {
    const tool = createWebSearchTool({ client: createMockWebSearchClient(), defaultMaxResults: 5 });

    const result = await tool.run({ keywords: 'ferry timetable', maxResults: 1 });

    expect(result.toolName).toBe('web_search');
    expect(result.arguments).toEqual({ keywords: 'ferry timetable', maxResults: 1 });
    expect(result.content).toBe(
      'Mock web search result with general information about the topic.\nSources:\n- https://example.com/source1',
    );
  });

  it('should fall back to the configured maximum', async () => {
    const tool = createWebSearchTool({ client: createMockWebSearchClient(), defaultMaxResults: 5 });

    const result = await tool.run({ keywords: 'ferry timetable' });
    expect(result.arguments).toEqual({ keywords: 'ferry timetable', maxResults: 5 });
  });
});

describe('search_video_transcripts tool', () => {
  it('should federate over transcripts only with its own limit and threshold', async () => {
    const federator = fakeFederator({
      status: 'complete',
      hits: [
        {
          modality: 'transcript',
          sourceId: 's1',
          similarity: 0.91,
          snippet: 'The lighthouse was automated in 1980.',
          metadata: { video: 'coast.mp4' },
        },
      ],
      failures: [],
    });
    const tool = createTranscriptSearchTool({ federator, limit: 20, threshold: 0.7 });

    const result = await tool.run({ queryText: 'lighthouse automation' });

    expect(federator.federate).toHaveBeenCalledWith('lighthouse automation', ['transcript'], {
      limit: 20,
      threshold: 0.7,
    });
    expect(result.content).toBe('- [Source: coast.mp4] The lighthouse was automated in 1980.');
  });

  it('should fail when the transcript index is unavailable', async () => {
    const federator = fakeFederator({
      status: 'unavailable',
      hits: [],
      failures: [{ kind: 'ModalityUnavailable', modality: 'transcript', reason: 'offline' }],
    });
    const tool = createTranscriptSearchTool({ federator, limit: 20, threshold: 0.7 });

    await expect(tool.run({ queryText: 'x' })).rejects.toThrow(
      'Transcript index unavailable: offline',
    );
  });

  it('should say so when nothing matched', () => {
    expect(formatTranscriptHits([])).toBe('No matching transcript passages found.');
  });
});
