import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@prism/shared/src/utils/errors.js';
import { validateAgentConfig } from './validators.js';
import type { AgentConfig } from './agent-config.schema.js';

export const AGENT_CONFIG_FILE = 'agent.json';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${message}`);
  }
}

export async function loadAgentConfig(configDir: string): Promise<AgentConfig> {
  const raw = await readJsonFile(join(configDir, AGENT_CONFIG_FILE));
  return validateAgentConfig(raw);
}
