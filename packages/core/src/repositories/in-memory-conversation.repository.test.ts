import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryConversationRepository } from './in-memory-conversation.repository.js';
import type { ConversationRepository } from './conversation.repository.js';

const t = (seconds: number): Date => new Date(Date.UTC(2024, 0, 1, 12, 0, seconds));

describe('InMemoryConversationRepository', () => {
  let repo: ConversationRepository;

  beforeEach(() => {
    repo = createInMemoryConversationRepository();
  });

  it('should assign increasing sequence numbers per conversation', async () => {
    const first = await repo.append({ conversationId: 'c1', role: 'user', content: 'hi', userId: 'u1' });
    const second = await repo.append({
      conversationId: 'c1',
      role: 'assistant',
      content: 'hello',
      userId: 'u1',
    });
    const other = await repo.append({ conversationId: 'c2', role: 'user', content: 'x', userId: 'u1' });

    expect(first.sequence).toBe(1);
    expect(second.sequence).toBe(2);
    expect(other.sequence).toBe(1);
  });

  it('should order turns by timestamp then sequence', async () => {
    await repo.append({ conversationId: 'c1', role: 'user', content: 'b', userId: 'u1', timestamp: t(5) });
    await repo.append({ conversationId: 'c1', role: 'assistant', content: 'c', userId: 'u1', timestamp: t(5) });
    await repo.append({ conversationId: 'c1', role: 'user', content: 'a', userId: 'u1', timestamp: t(1) });

    const turns = await repo.list('c1');
    expect(turns.map((turn) => turn.content)).toEqual(['a', 'b', 'c']);
  });

  it('should return an empty list for an unknown conversation', async () => {
    expect(await repo.list('missing')).toEqual([]);
    expect(await repo.listRecent('missing', 4)).toEqual([]);
  });

  it('should return the last n turns oldest first', async () => {
    for (let i = 1; i <= 5; i++) {
      await repo.append({
        conversationId: 'c1',
        role: i % 2 === 1 ? 'user' : 'assistant',
        content: `turn ${String(i)}`,
        userId: 'u1',
        timestamp: t(i),
      });
    }

    const recent = await repo.listRecent('c1', 2);
    expect(recent.map((turn) => turn.content)).toEqual(['turn 4', 'turn 5']);
    expect(await repo.listRecent('c1', 0)).toEqual([]);
  });

  it('should keep both turns when the same content is appended twice', async () => {
    const first = await repo.append({ conversationId: 'c1', role: 'user', content: 'original', userId: 'u1', timestamp: t(1) });
    const second = await repo.append({
      conversationId: 'c1',
      role: 'assistant',
      content: 'original',
      userId: 'u1',
      timestamp: t(2),
    });

    const turns = await repo.list('c1');
    expect(first.id).not.toBe(second.id);
    expect(turns.map((turn) => [turn.id, turn.role, turn.content])).toEqual([
      [first.id, 'user', 'original'],
      [second.id, 'assistant', 'original'],
    ]);
  });

  it('should summarize conversations by last activity with a truncated title', async () => {
    const longQuestion = 'q'.repeat(150);
    await repo.append({ conversationId: 'old', role: 'user', content: 'first topic', userId: 'u1', timestamp: t(1) });
    await repo.append({ conversationId: 'new', role: 'user', content: longQuestion, userId: 'u1', timestamp: t(2) });
    await repo.append({ conversationId: 'new', role: 'assistant', content: 'answer', userId: 'u1', timestamp: t(3) });

    const summaries = await repo.listConversations();

    expect(summaries).toEqual([
      { conversationId: 'new', title: 'q'.repeat(100), turnCount: 2, createdAt: t(2), updatedAt: t(3) },
      { conversationId: 'old', title: 'first topic', turnCount: 1, createdAt: t(1), updatedAt: t(1) },
    ]);
  });

  it('should filter summaries by user', async () => {
    await repo.append({ conversationId: 'c1', role: 'user', content: 'mine', userId: 'u1' });
    await repo.append({ conversationId: 'c2', role: 'user', content: 'theirs', userId: 'u2' });

    const summaries = await repo.listConversations('u2');
    expect(summaries.map((s) => s.conversationId)).toEqual(['c2']);
  });

  it('should delete all turns and report the count', async () => {
    await repo.append({ conversationId: 'c1', role: 'user', content: 'a', userId: 'u1' });
    await repo.append({ conversationId: 'c1', role: 'assistant', content: 'b', userId: 'u1' });

    expect(await repo.delete('c1')).toBe(2);
    expect(await repo.list('c1')).toEqual([]);
    expect(await repo.listConversations()).toEqual([]);
    expect(await repo.delete('c1')).toBe(0);
  });

  it('should search turns that carry an embedding', async () => {
    await repo.append({ conversationId: 'c1', role: 'user', content: 'near', userId: 'u1', embedding: [1, 0] });
    await repo.append({ conversationId: 'c2', role: 'user', content: 'far', userId: 'u1', embedding: [0, 1] });
    await repo.append({ conversationId: 'c2', role: 'assistant', content: 'none', userId: 'u1' });

    const results = await repo.searchSimilar({ embedding: [1, 0], limit: 5 });

    expect(results.map((r) => [r.turn.content, r.score])).toEqual([
      ['near', 1],
      ['far', 0],
    ]);
  });
});
