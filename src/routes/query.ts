/**
 * Query Route
 * Answers a question through the tool-calling orchestrator
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ModelClient } from '../providers/types.js';
import { createOrchestrator } from '../services/orchestrator/index.js';
import type { ToolRegistry } from '../services/tools/registry.js';

const QueryRequestSchema = z.object({
  query: z.string().trim().min(1),
  history: z.string().optional(),
  max_rounds: z.number().int().min(1).max(5).optional(),
  use_tools: z.boolean().default(true),
});

export interface QueryRouteOptions {
  getClient: () => ModelClient;
  registry: ToolRegistry;
  maxRounds: number;
}

export const queryRoutes: FastifyPluginAsync<QueryRouteOptions> = async (server, options) => {
  // POST /v1/query - Answer a question, letting the model call catalog tools
  server.post('/query', async (request) => {
    const body = QueryRequestSchema.parse(request.body);

    const orchestrator = createOrchestrator(options.getClient(), { maxRounds: options.maxRounds });
    const tools = body.use_tools ? options.registry.toToolSpecs() : [];

    const result = await orchestrator.run(body.query, {
      history: body.history,
      tools,
      executor: tools.length > 0 ? options.registry : undefined,
      maxRounds: body.max_rounds,
    });

    request.log.info(
      { rounds: result.rounds, modelCalls: result.modelCalls, toolCalls: result.toolInvocations.length },
      'query answered',
    );

    return {
      answer: result.answer,
      rounds: result.rounds,
      model_calls: result.modelCalls,
      tool_calls: result.toolInvocations.map(invocation => ({
        name: invocation.name,
        is_error: invocation.isError,
      })),
    };
  });
};
