import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { CONTENT_MODALITIES } from '@prism/shared/src/types/retrieval.types.js';
import { loadAgentConfig } from '@prism/schemas/src/config-loader.js';
import { createMockLlmClient } from '@prism/core/src/llm/llm-client.js';
import { createMockEmbeddingClient } from '@prism/core/src/embedding/mock-embedding-client.js';
import { createMockWebSearchClient } from '@prism/core/src/services/web-search/mock-web-search-client.js';
import { createInMemoryContentRepository } from '@prism/core/src/repositories/in-memory-content.repository.js';
import { createInMemoryConversationRepository } from '@prism/core/src/repositories/in-memory-conversation.repository.js';
import { createAgentRuntime } from '@prism/core/src/orchestration/agent-runtime.js';

const SampleContentSchema = z.array(
  z.object({
    id: z.string(),
    modality: z.enum(CONTENT_MODALITIES),
    snippet: z.string(),
    metadata: z.record(z.unknown()).default({}),
  }),
);

async function main(): Promise<void> {
  const configDir = process.argv[2] ?? resolve(process.cwd(), 'config');
  const queryText = process.argv[3] ?? 'What does the annual report say about revenue?';
  const conversationId = process.argv[4];

  console.log('=== Prism Query Runner ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Query: ${queryText}\n`);

  const startTime = Date.now();

  const agentConfig = await loadAgentConfig(configDir);
  const embeddingClient = createMockEmbeddingClient();
  const contentRepository = createInMemoryContentRepository();

  const raw: unknown = JSON.parse(
    await readFile(resolve(configDir, 'sample-content.json'), 'utf-8'),
  );
  const samples = SampleContentSchema.parse(raw);
  const embeddings = await embeddingClient.generateEmbeddings(samples.map((s) => s.snippet));
  for (const [i, sample] of samples.entries()) {
    await contentRepository.add({ ...sample, embedding: embeddings[i] });
  }
  console.log(`Loaded ${String(samples.length)} content records\n`);

  const { pipeline } = createAgentRuntime({
    agentConfig,
    llmClient: createMockLlmClient(),
    embeddingClient,
    webSearchClient: createMockWebSearchClient(),
    contentRepository,
    conversationRepository: createInMemoryConversationRepository(),
  });

  const answer = await pipeline.run({ text: queryText, conversationId });
  const elapsed = Date.now() - startTime;

  console.log('--- Answer ---');
  console.log(`  ${answer.answer}\n`);
  console.log('--- Metadata ---');
  console.log(`  Conversation: ${answer.conversationId}`);
  console.log(`  Document context: ${String(answer.metadata.hasDocContext)}`);
  console.log(`  Image context: ${String(answer.metadata.hasImageContext)}`);
  console.log(`  Tool output: ${String(answer.metadata.hasToolOutput)}`);
  console.log(`\nCompleted in ${String(elapsed)}ms`);
}

main().catch((error: unknown) => {
  console.error('Query failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
