// Tool-Calling Orchestrator
// Sends a query to the model and negotiates a bounded number of tool-use rounds

import { logger } from '../../logger.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import {
  isTextBlock,
  isToolUseBlock,
  type Message,
  type ModelClient,
  type ModelResponse,
  type ToolResultBlock,
  type ToolUseBlock,
} from '../../providers/types.js';
import { ROUNDS_EXHAUSTED_MESSAGE, SYSTEM_PROMPT } from './prompts.js';
import { buildModelRequest, createRequestConfig, type RequestConfig } from './request-builder.js';
import type {
  AnswerOptions,
  OrchestrationResult,
  OrchestratorOptions,
  ToolExecutor,
  ToolInvocation,
} from './types.js';

const log = logger.child({ module: 'orchestrator' });

export const DEFAULT_MAX_ROUNDS = 2;

export function extractText(response: ModelResponse): string {
  const block = response.content.find(isTextBlock);
  return block ? block.text : '';
}

/** Per-call state; one instance lives for exactly one `run`. */
class Negotiation {
  readonly transcript: Message[];
  readonly toolInvocations: ToolInvocation[] = [];
  modelCalls = 0;

  constructor(
    private client: ModelClient,
    private config: RequestConfig,
    query: string,
  ) {
    this.transcript = [{ role: 'user', content: query }];
  }

  async send(withTools: boolean): Promise<ModelResponse> {
    this.modelCalls++;
    const request = buildModelRequest(this.config, this.transcript, { withTools });
    log.debug(
      { call: this.modelCalls, messages: request.messages.length, tools: request.tools?.length ?? 0 },
      'sending model request',
    );
    return this.client.send(request);
  }

  async resolveToolUses(
    toolUses: ToolUseBlock[],
    executor: ToolExecutor,
    round: number,
  ): Promise<ToolResultBlock[]> {
    const results: ToolResultBlock[] = [];

    // In block order, one at a time.
    for (const toolUse of toolUses) {
      let content: string;
      let isError = false;

      try {
        content = await executor.execute(toolUse.name, toolUse.input);
      } catch (error) {
        isError = true;
        content = `Error executing tool: ${errorMessage(error)}`;
        log.warn({ tool: toolUse.name, round, err: errorMessage(error) }, 'tool execution failed');
      }

      this.toolInvocations.push({
        round,
        toolUseId: toolUse.id,
        name: toolUse.name,
        input: toolUse.input,
        content,
        isError,
      });

      results.push({
        type: 'tool_result',
        tool_use_id: toolUse.id,
        content,
        ...(isError ? { is_error: true } : {}),
      });
    }

    return results;
  }

  finish(response: ModelResponse, rounds: number): OrchestrationResult {
    return {
      answer: extractText(response),
      transcript: [...this.transcript, { role: 'assistant', content: response.content }],
      rounds,
      modelCalls: this.modelCalls,
      toolInvocations: [...this.toolInvocations],
    };
  }
}

export class ToolCallingOrchestrator {
  private client: ModelClient;
  private systemPrompt: string;
  private maxRounds: number;

  constructor(client: ModelClient, options: OrchestratorOptions = {}) {
    this.client = client;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
  }

  async answer(query: string, options: AnswerOptions = {}): Promise<string> {
    const result = await this.run(query, options);
    return result.answer;
  }

  async run(query: string, options: AnswerOptions = {}): Promise<OrchestrationResult> {
    const maxRounds = options.maxRounds ?? this.maxRounds;

    if (!query.trim()) {
      throw AppError.validationError('Query must not be empty');
    }
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw AppError.validationError(`maxRounds must be a positive integer, got ${maxRounds}`);
    }

    const config = createRequestConfig(this.systemPrompt, options.history, options.tools);
    const negotiation = new Negotiation(this.client, config, query);

    const executor = options.executor;
    let response = await negotiation.send(true);

    if (response.stopReason !== 'tool_use' || !executor) {
      return negotiation.finish(response, 0);
    }

    for (let round = 1; round <= maxRounds; round++) {
      const toolUses = response.content.filter(isToolUseBlock);

      negotiation.transcript.push({ role: 'assistant', content: response.content });

      // No tool_use blocks despite the stop reason: no results to send back.
      if (toolUses.length > 0) {
        const results = await negotiation.resolveToolUses(toolUses, executor, round);
        negotiation.transcript.push({ role: 'user', content: results });
      }

      if (toolUses.length === 0 || round >= maxRounds) {
        log.debug({ round, maxRounds, toolsInvoked: toolUses.length }, 'requesting final answer without tools');
        const final = await negotiation.send(false);
        return negotiation.finish(final, round);
      }

      response = await negotiation.send(true);
      if (response.stopReason !== 'tool_use') {
        return negotiation.finish(response, round);
      }
    }

    return {
      answer: ROUNDS_EXHAUSTED_MESSAGE,
      transcript: [...negotiation.transcript],
      rounds: maxRounds,
      modelCalls: negotiation.modelCalls,
      toolInvocations: [...negotiation.toolInvocations],
    };
  }
}

export function createOrchestrator(
  client: ModelClient,
  options?: OrchestratorOptions
): ToolCallingOrchestrator {
  return new ToolCallingOrchestrator(client, options);
}
