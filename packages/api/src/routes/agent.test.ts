import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LlmError } from '@prism/shared/src/utils/errors.js';
import type { LlmClient } from '@prism/core/src/llm/llm-types.js';
import { createTestApp } from '../test-helpers.js';
import type { TestApp } from '../test-helpers.js';

const NOW = new Date('2026-02-03T04:05:06.000Z');

function jsonPost(body: Record<string, unknown>, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

describe('Agent Routes', () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = createTestApp({ now: () => NOW });
  });

  describe('POST /api/agent/query', () => {
    it('should answer from a matching document', async () => {
      const query = 'What does the uploaded report say about revenue?';
      await testApp.contentRepository.add({
        id: 'report.pdf#1',
        modality: 'document',
        embedding: await testApp.embeddingClient.generateEmbedding(query),
        snippet: 'Revenue grew by 12% year over year.',
        metadata: { source: 'report.pdf' },
      });

      const res = await testApp.app.request(
        '/api/agent/query',
        jsonPost({ query, conversationId: 'conv-1' }),
      );

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toEqual({
        answer: `Mock answer to: ${query}`,
        conversationId: 'conv-1',
        metadata: {
          timestamp: '2026-02-03T04:05:06.000Z',
          hasDocContext: true,
          hasImageContext: false,
          hasToolOutput: false,
        },
      });
    });

    it('should report tool output when the web search tool runs', async () => {
      const res = await testApp.app.request(
        '/api/agent/query',
        jsonPost({ query: 'What is the latest news on the harbour?', conversationId: 'conv-2' }),
      );

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        conversationId: 'conv-2',
        metadata: { hasDocContext: false, hasImageContext: false, hasToolOutput: true },
      });
    });

    it('should mint a conversation id when none is given', async () => {
      const res = await testApp.app.request('/api/agent/query', jsonPost({ query: 'Hello there' }));

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ conversationId: expect.stringMatching(/^[0-9a-f-]{36}$/) });
    });

    it('should reject an empty query', async () => {
      const res = await testApp.app.request(
        '/api/agent/query',
        jsonPost({ query: '   ' }, { 'x-request-id': 'req-empty' }),
      );

      expect(res.status).toBe(400);
      const body: unknown = await res.json();
      expect(body).toEqual({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId: 'req-empty',
        details: ['query: Query text is required'],
      });
    });

    it('should return 502 when the model provider fails', async () => {
      const llmClient: LlmClient = {
        invoke: vi.fn().mockRejectedValue(new LlmError('Permission denied', false)),
      };
      testApp = createTestApp({ llmClient, now: () => NOW });

      const res = await testApp.app.request(
        '/api/agent/query',
        jsonPost({ query: 'Anything?', conversationId: 'conv-3' }, { 'x-request-id': 'req-502' }),
      );

      expect(res.status).toBe(502);
      const body: unknown = await res.json();
      expect(body).toEqual({
        error: 'Language model processing failed',
        code: 'PIPELINE_FAILED',
        requestId: 'req-502',
      });
      expect(await testApp.conversationRepository.list('conv-3')).toEqual([]);
    });
  });

  describe('conversations', () => {
    beforeEach(async () => {
      await testApp.app.request(
        '/api/agent/query',
        jsonPost({ query: 'Where was the launch photo taken?', conversationId: 'conv-1' }),
      );
    });

    it('should list conversation summaries', async () => {
      const res = await testApp.app.request('/api/agent/conversations');

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toEqual([
        {
          conversationId: 'conv-1',
          title: 'Where was the launch photo taken?',
          messageCount: 2,
          createdAt: '2026-02-03T04:05:06.000Z',
          updatedAt: '2026-02-03T04:05:06.000Z',
        },
      ]);
    });

    it('should return the messages of a conversation in order', async () => {
      const res = await testApp.app.request('/api/agent/conversations/conv-1');

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toEqual({
        conversationId: 'conv-1',
        messages: [
          {
            role: 'user',
            content: 'Where was the launch photo taken?',
            timestamp: '2026-02-03T04:05:06.000Z',
          },
          {
            role: 'assistant',
            content: 'Mock answer to: Where was the launch photo taken?',
            timestamp: '2026-02-03T04:05:06.000Z',
          },
        ],
      });
    });

    it('should return 404 for an unknown conversation', async () => {
      const res = await testApp.app.request('/api/agent/conversations/missing', {
        headers: { 'x-request-id': 'req-404' },
      });

      expect(res.status).toBe(404);
      const body: unknown = await res.json();
      expect(body).toEqual({
        error: 'Conversation not found: missing',
        code: 'CONVERSATION_NOT_FOUND',
        requestId: 'req-404',
      });
    });

    it('should delete a conversation idempotently', async () => {
      const first = await testApp.app.request('/api/agent/conversations/conv-1', {
        method: 'DELETE',
      });
      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ message: 'Deleted', numDeleted: 2 });

      const second = await testApp.app.request('/api/agent/conversations/conv-1', {
        method: 'DELETE',
      });
      expect(second.status).toBe(200);
      expect(await second.json()).toEqual({ message: 'Deleted', numDeleted: 0 });

      const after = await testApp.app.request('/api/agent/conversations/conv-1');
      expect(after.status).toBe(404);
    });
  });
});
