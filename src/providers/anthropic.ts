// Anthropic Provider
// Calls the Messages API directly over HTTPS

import { env } from '../env.js';
import { AppError } from '../utils/errors.js';
import { parseWireResponse, toWireBody, type GenerationSettings } from './anthropic-format.js';
import type { ModelClient, ModelRequest, ModelResponse } from './types.js';

export interface AnthropicClientOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  version?: string;
  maxTokens?: number;
  temperature?: number;
}

export class AnthropicClient implements ModelClient {
  name = 'anthropic';
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private version: string;
  private settings: GenerationSettings;

  constructor(options: AnthropicClientOptions) {
    if (!options.apiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }

    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = (options.baseUrl || 'https://api.anthropic.com').replace(/\/+$/, '');
    this.version = options.version || '2023-06-01';
    this.settings = {
      maxTokens: options.maxTokens ?? 800,
      temperature: options.temperature ?? 0,
    };
  }

  static fromEnv(): AnthropicClient {
    return new AnthropicClient({
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      baseUrl: env.ANTHROPIC_BASE_URL,
      version: env.ANTHROPIC_VERSION,
      maxTokens: env.MODEL_MAX_TOKENS,
      temperature: env.MODEL_TEMPERATURE,
    });
  }

  async send(request: ModelRequest): Promise<ModelResponse> {
    const response = await fetch(`${this.baseUrl}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': this.version,
      },
      body: JSON.stringify({
        model: this.model,
        ...toWireBody(request, this.settings),
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw AppError.providerError(`Anthropic API error: ${response.status} - ${error}`, {
        status: response.status,
      });
    }

    const data: unknown = await response.json();
    return parseWireResponse(data);
  }
}
