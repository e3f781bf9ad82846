// AWS Bedrock Provider
// Uses @aws-sdk/client-bedrock-runtime to reach Anthropic models hosted on Bedrock

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { env } from '../env.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { parseWireResponse, toWireBody, type GenerationSettings } from './anthropic-format.js';
import type { ModelClient, ModelRequest, ModelResponse } from './types.js';

const BEDROCK_ANTHROPIC_VERSION = 'bedrock-2023-05-31';

export interface BedrockClientOptions {
  modelId: string;
  maxTokens?: number;
  temperature?: number;
  runtime?: Pick<BedrockRuntimeClient, 'send'>;
}

export class BedrockClient implements ModelClient {
  name = 'bedrock';
  private runtime: Pick<BedrockRuntimeClient, 'send'>;
  private modelId: string;
  private settings: GenerationSettings;

  constructor(options: BedrockClientOptions) {
    this.modelId = options.modelId;
    this.settings = {
      maxTokens: options.maxTokens ?? 800,
      temperature: options.temperature ?? 0,
    };
    this.runtime = options.runtime ?? BedrockClient.createRuntime();
  }

  private static createRuntime(): BedrockRuntimeClient {
    if (!env.AWS_ACCESS_KEY_ID || !env.AWS_SECRET_ACCESS_KEY || !env.BEDROCK_REGION) {
      throw new Error('AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, and BEDROCK_REGION are required');
    }

    return new BedrockRuntimeClient({
      region: env.BEDROCK_REGION,
      credentials: {
        accessKeyId: env.AWS_ACCESS_KEY_ID,
        secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      },
    });
  }

  static fromEnv(): BedrockClient {
    return new BedrockClient({
      modelId: env.BEDROCK_MODEL_ID,
      maxTokens: env.MODEL_MAX_TOKENS,
      temperature: env.MODEL_TEMPERATURE,
    });
  }

  async send(request: ModelRequest): Promise<ModelResponse> {
    const command = new InvokeModelCommand({
      modelId: this.modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({
        anthropic_version: BEDROCK_ANTHROPIC_VERSION,
        ...toWireBody(request, this.settings),
      }),
    });

    let responseBody: unknown;
    try {
      const response = await this.runtime.send(command);
      responseBody = JSON.parse(new TextDecoder().decode(response.body));
    } catch (error) {
      throw AppError.providerError(`Bedrock API error: ${errorMessage(error)}`);
    }

    return parseWireResponse(responseBody);
  }
}
