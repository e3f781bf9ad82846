// Model Client Registry
// Central registry for the model clients the orchestrator can talk to

import type { ModelClient } from './types.js';
import { AnthropicClient } from './anthropic.js';
import { BedrockClient } from './bedrock.js';
import { isProviderConfigured } from '../env.js';
import { AppError } from '../utils/errors.js';

// Client instances (lazy initialization)
const clients: Map<string, ModelClient> = new Map();

function getOrCreateClient(name: string): ModelClient | null {
  const cached = clients.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  let client: ModelClient | null = null;

  switch (name) {
    case 'anthropic':
      client = AnthropicClient.fromEnv();
      break;
    case 'bedrock':
      client = BedrockClient.fromEnv();
      break;
    default:
      return null;
  }

  clients.set(name, client);
  return client;
}

export function getModelClient(name: string): ModelClient {
  const client = getOrCreateClient(name);

  if (!client) {
    throw AppError.providerNotConfigured(name);
  }

  return client;
}

// Re-export types
export type {
  ContentBlock,
  Message,
  ModelClient,
  ModelRequest,
  ModelResponse,
  StopReason,
  TextBlock,
  ToolResultBlock,
  ToolSpec,
  ToolUseBlock,
} from './types.js';
