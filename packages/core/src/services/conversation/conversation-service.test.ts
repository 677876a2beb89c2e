import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationNotFoundError } from '@prism/shared/src/utils/errors.js';
import { createInMemoryConversationRepository } from '../../repositories/in-memory-conversation.repository.js';
import type { ConversationRepository } from '../../repositories/conversation.repository.js';
import { createConversationService } from './conversation-service.js';
import type { ConversationService } from './conversation-service.js';

describe('ConversationService', () => {
  let repository: ConversationRepository;
  let service: ConversationService;

  beforeEach(async () => {
    repository = createInMemoryConversationRepository();
    service = createConversationService(repository);

    await repository.append({
      conversationId: 'older',
      role: 'user',
      content: 'Where are the photos from the launch?',
      userId: 'u1',
      timestamp: new Date('2026-01-01T08:00:00.000Z'),
    });
    await repository.append({
      conversationId: 'newer',
      role: 'user',
      content: 'Summarise the board minutes',
      userId: 'u1',
      timestamp: new Date('2026-01-02T08:00:00.000Z'),
    });
    await repository.append({
      conversationId: 'newer',
      role: 'assistant',
      content: 'The board approved the budget.',
      userId: 'u1',
      timestamp: new Date('2026-01-02T08:00:03.000Z'),
    });
  });

  it('should list summaries by last activity', async () => {
    const summaries = await service.list();

    expect(summaries).toEqual([
      {
        conversationId: 'newer',
        title: 'Summarise the board minutes',
        turnCount: 2,
        createdAt: new Date('2026-01-02T08:00:00.000Z'),
        updatedAt: new Date('2026-01-02T08:00:03.000Z'),
      },
      {
        conversationId: 'older',
        title: 'Where are the photos from the launch?',
        turnCount: 1,
        createdAt: new Date('2026-01-01T08:00:00.000Z'),
        updatedAt: new Date('2026-01-01T08:00:00.000Z'),
      },
    ]);
  });

  it('should return the ordered turns of a conversation', async () => {
    const conversation = await service.get('newer');

    expect(conversation.conversationId).toBe('newer');
    expect(conversation.turns.map((t) => t.role)).toEqual(['user', 'assistant']);
  });

  it('should throw for an unknown conversation', async () => {
    await expect(service.get('missing')).rejects.toBeInstanceOf(ConversationNotFoundError);
  });

  it('should delete and report the number of removed turns', async () => {
    expect(await service.delete('newer')).toBe(2);
    expect(await service.delete('newer')).toBe(0);
    await expect(service.get('newer')).rejects.toThrow('Conversation not found: newer');
  });
});
