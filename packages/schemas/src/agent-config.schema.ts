import { z } from 'zod';
import { MODALITIES } from '@prism/shared/src/types/retrieval.types.js';

const ModalitySchema = z.enum(MODALITIES);

const Unit = z.number().min(0).max(1);

const ModelSettingsSchema = z.object({
  name: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxOutputTokens: z.number().int().positive(),
});

const PromptsSchema = z.object({
  planning: z.string().min(1),
  final: z.string().min(1),
});

const ModalityRetrievalSchema = z.object({
  modality: ModalitySchema,
  limit: z.number().int().positive(),
  threshold: Unit,
});

const RetrievalSchema = z.object({
  modalities: z
    .array(ModalityRetrievalSchema)
    .refine(
      (entries) => new Set(entries.map((e) => e.modality)).size === entries.length,
      { message: 'Each modality may be configured only once' },
    ),
});

const TimeoutsSchema = z.object({
  modelMs: z.number().int().positive(),
  toolMs: z.number().int().positive(),
  retrievalMs: z.number().int().positive(),
});

const ToolsSchema = z.object({
  webSearch: z.object({
    maxResults: z.number().int().positive(),
  }),
  transcriptSearch: z.object({
    limit: z.number().int().positive(),
    threshold: Unit,
  }),
});

export const AgentConfigSchema = z.object({
  $schema: z.string().optional(),
  version: z.string().regex(/^\d+\.\d+\.\d+$/),
  model: ModelSettingsSchema,
  prompts: PromptsSchema,
  retrieval: RetrievalSchema,
  history: z.object({
    turns: z.number().int().nonnegative(),
  }),
  context: z.object({
    charBudget: z.number().int().positive(),
  }),
  timeouts: TimeoutsSchema,
  retry: z.object({
    maxRetries: z.number().int().min(0).max(1),
  }),
  fallbackAnswer: z.string().min(1),
  tools: ToolsSchema,
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ModalityRetrievalConfig = z.infer<typeof ModalityRetrievalSchema>;
export type TimeoutsConfig = z.infer<typeof TimeoutsSchema>;
export type ToolsConfig = z.infer<typeof ToolsSchema>;
