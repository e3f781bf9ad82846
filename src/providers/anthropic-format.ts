/**
 * Anthropic Messages wire format
 * Shared by the direct HTTP client and the Bedrock client, which accept the same body
 */

import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import type {
  ContentBlock,
  Message,
  ModelRequest,
  ModelResponse,
  StopReason,
  ToolChoice,
  ToolSpec,
} from './types.js';

export interface GenerationSettings {
  maxTokens: number;
  temperature: number;
}

export interface WireRequestBody {
  max_tokens: number;
  temperature: number;
  system: string;
  messages: Message[];
  tools?: ToolSpec[];
  tool_choice?: ToolChoice;
}

const STOP_REASONS: readonly StopReason[] = [
  'end_turn',
  'tool_use',
  'max_tokens',
  'stop_sequence',
  'pause_turn',
  'refusal',
];

const TextBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.unknown()).default({}),
});

const WireResponseSchema = z.object({
  content: z.array(z.object({ type: z.string() }).passthrough()),
  stop_reason: z.string().nullish(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export function toWireBody(request: ModelRequest, settings: GenerationSettings): WireRequestBody {
  const body: WireRequestBody = {
    max_tokens: settings.maxTokens,
    temperature: settings.temperature,
    system: request.system,
    messages: [...request.messages],
  };

  if (request.tools && request.tools.length > 0) {
    body.tools = [...request.tools];
    body.tool_choice = request.toolChoice ?? { type: 'auto' };
  }

  return body;
}

function toStopReason(raw: string | null | undefined): StopReason {
  const match = STOP_REASONS.find(reason => reason === raw);
  return match ?? 'end_turn';
}

// Block types the orchestrator does not act on (thinking, server tool blocks) are dropped.
function toContentBlock(raw: { type: string }): ContentBlock | null {
  switch (raw.type) {
    case 'text': {
      const parsed = TextBlockSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    }
    case 'tool_use': {
      const parsed = ToolUseBlockSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    }
    default:
      return null;
  }
}

export function parseWireResponse(json: unknown): ModelResponse {
  const parsed = WireResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw AppError.providerError('Malformed model response', parsed.error.flatten());
  }

  const content: ContentBlock[] = [];
  for (const raw of parsed.data.content) {
    const block = toContentBlock(raw);
    if (block) content.push(block);
  }

  const usage = parsed.data.usage;

  return {
    stopReason: toStopReason(parsed.data.stop_reason),
    content,
    ...(usage
      ? {
          usage: {
            inputTokens: usage.input_tokens ?? 0,
            outputTokens: usage.output_tokens ?? 0,
          },
        }
      : {}),
  };
}
