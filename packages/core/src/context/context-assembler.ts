import type {
  ContextBundle,
  ContextSection,
  HistoryEntry,
  InlineImage,
  RetrievalSection,
  ToolOutcome,
  ToolSection,
} from '@prism/shared/src/types/agent.types.js';
import type { Modality, RetrievalHit } from '@prism/shared/src/types/retrieval.types.js';
import { MODALITIES } from '@prism/shared/src/types/retrieval.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { compareHits } from '../retrieval/federator.js';

const log = createChildLogger('context:assembler');

export const TOOL_SECTION_LABEL = 'TOOL RESULTS';
export const HISTORY_SECTION_LABEL = 'RECENT CONVERSATION';

export const MODALITY_SECTION_LABELS: Readonly<Record<Modality, string>> = {
  document: 'DOCUMENT CONTEXT',
  image: 'IMAGE CONTEXT',
  video_frame: 'VIDEO FRAME CONTEXT',
  transcript: 'VIDEO TRANSCRIPT CONTEXT',
  chat_memory: 'CHAT HISTORY CONTEXT',
};

const IMAGE_MODALITIES: ReadonlySet<Modality> = new Set<Modality>(['image', 'video_frame']);

export interface AssemblyInput {
  readonly toolOutcome: ToolOutcome;
  readonly retrieval: Partial<Record<Modality, readonly RetrievalHit[]>>;
  /** Oldest first. */
  readonly history: readonly HistoryEntry[];
}

export interface AssemblyOptions {
  readonly charBudget: number;
  readonly historyTurns: number;
}

function sourceLabel(hit: RetrievalHit): string {
  for (const key of ['source', 'title', 'name', 'video']) {
    const value = hit.metadata[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return hit.sourceId;
}

function renderHit(hit: RetrievalHit, position: number): string {
  if (IMAGE_MODALITIES.has(hit.modality)) {
    return `- [Image ${String(position + 1)}: ${sourceLabel(hit)}]`;
  }
  if (hit.modality === 'chat_memory') {
    const role = hit.metadata['role'];
    return `- [${typeof role === 'string' ? role : 'turn'}] ${hit.snippet ?? ''}`;
  }
  return `- [Source: ${sourceLabel(hit)}] ${hit.snippet ?? ''}`;
}

export function renderSection(section: ContextSection): string {
  const header = `[${section.label}]`;
  switch (section.kind) {
    case 'tool':
      return `${header}\n[${section.toolName}]\n${section.content}`;
    case 'retrieval':
      return [header, ...section.hits.map(renderHit)].join('\n');
    case 'history':
      return [header, ...section.turns.map((turn) => `- [${turn.role}] ${turn.content}`)].join('\n');
  }
}

export function renderSections(sections: readonly ContextSection[]): string {
  return sections.map(renderSection).join('\n\n');
}

interface Draft {
  tool: ToolSection | undefined;
  hits: RetrievalHit[];
  history: HistoryEntry[];
}

function buildSections(draft: Draft): ContextSection[] {
  const sections: ContextSection[] = [];
  if (draft.tool) {
    sections.push(draft.tool);
  }
  for (const modality of MODALITIES) {
    const hits = draft.hits.filter((hit) => hit.modality === modality).sort(compareHits);
    if (hits.length > 0) {
      const section: RetrievalSection = {
        kind: 'retrieval',
        label: MODALITY_SECTION_LABELS[modality],
        modality,
        hits,
      };
      sections.push(section);
    }
  }
  if (draft.history.length > 0) {
    sections.push({ kind: 'history', label: HISTORY_SECTION_LABEL, turns: draft.history });
  }
  return sections;
}

/** Removes one unit of context; returns false once nothing is left to drop. */
function dropOne(draft: Draft): boolean {
  if (draft.hits.length > 0) {
    // Lowest similarity first; ties drop the later modality, then the greater id.
    draft.hits.sort(compareHits);
    draft.hits.pop();
    return true;
  }
  if (draft.history.length > 0) {
    draft.history.shift();
    return true;
  }
  if (draft.tool) {
    draft.tool = undefined;
    return true;
  }
  return false;
}

function collectImages(sections: readonly ContextSection[]): InlineImage[] {
  const images: InlineImage[] = [];
  for (const section of sections) {
    if (section.kind !== 'retrieval' || !IMAGE_MODALITIES.has(section.modality)) continue;
    for (const hit of section.hits) {
      if (!hit.preview) continue;
      images.push({
        modality: hit.modality,
        sectionLabel: section.label,
        sourceId: hit.sourceId,
        similarity: hit.similarity,
        preview: hit.preview,
        metadata: hit.metadata,
      });
    }
  }
  return images;
}

export function assembleContext(input: AssemblyInput, options: AssemblyOptions): ContextBundle {
  const draft: Draft = {
    tool:
      input.toolOutcome.status === 'success'
        ? {
            kind: 'tool',
            label: TOOL_SECTION_LABEL,
            toolName: input.toolOutcome.result.toolName,
            content: input.toolOutcome.result.content,
          }
        : undefined,
    hits: MODALITIES.flatMap((modality) => [...(input.retrieval[modality] ?? [])]),
    history: options.historyTurns > 0 ? input.history.slice(-options.historyTurns) : [],
  };
  const initialHitCount = draft.hits.length;

  let sections = buildSections(draft);
  let text = renderSections(sections);
  while (text.length > options.charBudget && dropOne(draft)) {
    sections = buildSections(draft);
    text = renderSections(sections);
  }

  const droppedHits = initialHitCount - draft.hits.length;
  if (droppedHits > 0) {
    log.debug({ droppedHits, budget: options.charBudget, length: text.length }, 'Context truncated');
  }

  const hasSection = (modality: Modality): boolean =>
    sections.some((s) => s.kind === 'retrieval' && s.modality === modality);

  return {
    sections,
    images: collectImages(sections),
    text,
    flags: {
      hasDocContext: hasSection('document'),
      hasImageContext: hasSection('image'),
      hasToolOutput: sections.some((s) => s.kind === 'tool'),
    },
    droppedHits,
  };
}
