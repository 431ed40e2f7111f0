// Server assembly
// Registers routes and the error handler on a Fastify instance; index.ts starts it listening
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './env.js';
import { agentRoutes } from './routes/agents.js';
import { generationRoutes } from './routes/generation.js';
import { toolRoutes } from './routes/tools.js';
import { workflowRoutes } from './routes/workflows.js';
import { createServices, type Services } from './services/index.js';
import { AppError, ErrorCode, formatErrorResponse } from './utils/errors.js';

export const VERSION = '1.0.0';

export interface BuildServerOptions {
  services?: Services;
  logger?: boolean;
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const services = options.services ?? createServices();
  const includeDetails = env.NODE_ENV !== 'production';

  const server = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: env.LOG_LEVEL,
            ...(env.NODE_ENV === 'development'
              ? {
                  transport: {
                    target: 'pino-pretty',
                    options: {
                      translateTime: 'HH:MM:ss Z',
                      ignore: 'pid,hostname',
                    },
                  },
                }
              : {}),
          },
  });

  await server.register(cors, {
    origin: ['http://localhost:3000', 'http://127.0.0.1:3000', 'http://localhost:8080', 'http://127.0.0.1:8080'],
    credentials: true,
  });

  server.setErrorHandler((error: Error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) request.log.error({ err: error }, error.message);
      return reply.code(error.statusCode).send(formatErrorResponse(error, includeDetails));
    }

    if (error instanceof ZodError) {
      const appError = AppError.validationError('Invalid request', error.issues);
      return reply.code(400).send(formatErrorResponse(appError, includeDetails));
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    const statusCode = statusCodeOf(error);
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({ error: ErrorCode.BAD_REQUEST, message: error.message, statusCode });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send(formatErrorResponse(AppError.internal(), false));
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: VERSION,
      model: services.provider.model,
      tools: services.tools.list().length,
    };
  });

  await server.register(toolRoutes, { prefix: '/v1', services });
  await server.register(agentRoutes, { prefix: '/v1', services });
  await server.register(generationRoutes, { prefix: '/v1', services });
  await server.register(workflowRoutes, { prefix: '/v1', services });

  return server;
}
