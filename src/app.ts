// Server factory
// Builds the Fastify instance; src/index.ts only adds startup and listen

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './env.js';
import { logger } from './logger.js';
import { getModelClient } from './providers/index.js';
import type { ModelClient } from './providers/types.js';
import { courseRoutes } from './routes/courses.js';
import { queryRoutes } from './routes/query.js';
import { CourseCatalog } from './services/catalog.js';
import { toolRegistry, type ToolRegistry } from './services/tools/index.js';
import { AppError, ErrorCode, formatErrorResponse } from './utils/errors.js';

export const API_VERSION = '1.0.0';

export interface ServerDependencies {
  /** Fixed model client; resolved from MODEL_PROVIDER per request when absent. */
  client?: ModelClient;
  registry?: ToolRegistry;
  catalog?: CourseCatalog;
  logger?: boolean;
}

export async function buildServer(deps: ServerDependencies = {}): Promise<FastifyInstance> {
  const serverLogger: FastifyBaseLogger = logger;
  const server = Fastify({
    logger: deps.logger === false ? false : serverLogger,
  });

  const includeDetails = env.NODE_ENV !== 'production';

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid request body',
        statusCode: 400,
        details: error.flatten(),
      });
    }

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.code(error.statusCode).send(formatErrorResponse(error, includeDetails));
    }

    // Fastify's own client errors (malformed JSON, wrong content type)
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({
        error: ErrorCode.BAD_REQUEST,
        message: error.message,
        statusCode,
      });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send(formatErrorResponse(AppError.internal()));
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  const fixedClient = deps.client;
  await server.register(queryRoutes, {
    prefix: '/v1',
    getClient: () => fixedClient ?? getModelClient(env.MODEL_PROVIDER),
    registry: deps.registry ?? toolRegistry,
    maxRounds: env.MAX_TOOL_ROUNDS,
  });

  await server.register(courseRoutes, {
    prefix: '/v1',
    catalog: deps.catalog ?? new CourseCatalog(),
  });

  return server;
}
