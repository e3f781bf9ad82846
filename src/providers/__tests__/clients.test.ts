import { afterEach, describe, expect, it, vi } from 'vitest';
import type { InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { AnthropicClient } from '../anthropic.js';
import { BedrockClient } from '../bedrock.js';
import { getModelClient } from '../index.js';
import type { ModelRequest } from '../types.js';
import { ErrorCode } from '../../utils/errors.js';

const request: ModelRequest = {
  system: 'System',
  messages: [{ role: 'user', content: 'What is in lesson 1?' }],
  tools: [
    {
      name: 'get_course_outline',
      description: 'Outline',
      input_schema: { type: 'object', properties: { course_name: { type: 'string' } }, required: ['course_name'] },
    },
  ],
  toolChoice: { type: 'auto' },
};

const wireResponse = {
  id: 'msg_1',
  type: 'message',
  role: 'assistant',
  stop_reason: 'end_turn',
  content: [{ type: 'text', text: 'Lesson 1 is about chunking.' }],
  usage: { input_tokens: 20, output_tokens: 8 },
};

describe('AnthropicClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to the messages endpoint with auth headers and the wire body', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(JSON.stringify(wireResponse), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const client = new AnthropicClient({
      apiKey: 'test-key',
      model: 'test-model',
      baseUrl: 'https://anthropic.test/',
    });
    const response = await client.send(request);

    expect(response).toEqual({
      stopReason: 'end_turn',
      content: [{ type: 'text', text: 'Lesson 1 is about chunking.' }],
      usage: { inputTokens: 20, outputTokens: 8 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://anthropic.test/v1/messages');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      'x-api-key': 'test-key',
      'anthropic-version': '2023-06-01',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      max_tokens: 800,
      temperature: 0,
      system: 'System',
      messages: [{ role: 'user', content: 'What is in lesson 1?' }],
      tools: request.tools,
      tool_choice: { type: 'auto' },
    });
  });

  it('raises a provider error with the status and body on a non-2xx reply', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('rate limited', { status: 429 })),
    );

    const client = new AnthropicClient({ apiKey: 'test-key', model: 'test-model' });

    await expect(client.send(request)).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_ERROR,
      message: 'Anthropic API error: 429 - rate limited',
      details: { status: 429 },
    });
  });

  it('requires an api key', () => {
    expect(() => new AnthropicClient({ apiKey: '', model: 'test-model' })).toThrow(
      'ANTHROPIC_API_KEY not configured',
    );
  });
});

describe('BedrockClient', () => {
  function fakeRuntime(impl: (command: InvokeModelCommand) => Promise<{ body: Uint8Array }>) {
    return { send: vi.fn(impl) };
  }

  it('invokes the model with the Bedrock anthropic version and parses the reply', async () => {
    const runtime = fakeRuntime(async () => ({
      body: new TextEncoder().encode(JSON.stringify(wireResponse)),
    }));
    const client = new BedrockClient({
      modelId: 'anthropic.test-model',
      maxTokens: 300,
      temperature: 0.2,
      runtime: runtime as never,
    });

    const response = await client.send(request);

    expect(response.content).toEqual([{ type: 'text', text: 'Lesson 1 is about chunking.' }]);

    const command = runtime.send.mock.calls[0][0];
    expect(command.input.modelId).toBe('anthropic.test-model');
    expect(JSON.parse(String(command.input.body))).toEqual({
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: 300,
      temperature: 0.2,
      system: 'System',
      messages: [{ role: 'user', content: 'What is in lesson 1?' }],
      tools: request.tools,
      tool_choice: { type: 'auto' },
    });
  });

  it('wraps runtime failures in a provider error', async () => {
    const runtime = fakeRuntime(async () => {
      throw new Error('AccessDeniedException');
    });
    const client = new BedrockClient({ modelId: 'anthropic.test-model', runtime: runtime as never });

    await expect(client.send(request)).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_ERROR,
      message: 'Bedrock API error: AccessDeniedException',
    });
  });
});

describe('getModelClient', () => {
  it('rejects an unknown provider name', () => {
    expect(() => getModelClient('does-not-exist')).toThrow(
      'Model provider "does-not-exist" is not available or not configured',
    );
  });
});
