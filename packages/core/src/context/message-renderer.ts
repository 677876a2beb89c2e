import type { ContextBundle } from '@prism/shared/src/types/agent.types.js';
import type { ChatContentPart, ChatMessage } from '../llm/llm-types.js';
import { renderSections } from './context-assembler.js';

export function renderPlanningMessages(systemPrompt: string, query: string): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: query },
  ];
}

/**
 * History turns become prior messages. Every other section goes into the
 * final user message as text, followed by the inline images and the query.
 */
export function renderFinalMessages(
  systemPrompt: string,
  query: string,
  bundle: ContextBundle,
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt }];

  for (const section of bundle.sections) {
    if (section.kind !== 'history') continue;
    for (const turn of section.turns) {
      messages.push({ role: turn.role, content: turn.content });
    }
  }

  const contextText = renderSections(bundle.sections.filter((s) => s.kind !== 'history'));
  if (contextText.length === 0 && bundle.images.length === 0) {
    messages.push({ role: 'user', content: query });
    return messages;
  }

  const parts: ChatContentPart[] = [];
  if (contextText.length > 0) {
    parts.push({ type: 'text', text: contextText });
  }
  for (const image of bundle.images) {
    parts.push({ type: 'image', image: image.preview });
  }
  parts.push({ type: 'text', text: query });

  messages.push({ role: 'user', content: parts });
  return messages;
}
