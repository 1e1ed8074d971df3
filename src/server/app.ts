import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { nanoid } from 'nanoid';
import type { Runtime } from '../runtime.js';
import { createLogger } from '../utils/logger.js';
import { toHttpError } from './errors.js';
import { createApiKeyAuth } from './middleware/auth.js';
import { registerAgentRoutes } from './routes/agents.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerOrchestrationRoutes } from './routes/orchestrations.js';
import { serverConfigSchema, createErrorResponse, ErrorCode, type ServerConfig } from './types.js';

const logger = createLogger('server');

/**
 * Server configuration plus the runtime the routes call into
 */
export interface AppConfig extends Partial<ServerConfig> {
  runtime: Pick<Runtime, 'client' | 'agents' | 'orchestrations'>;
  /** Bearer key required on mutating routes */
  apiKey?: string;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(config: AppConfig): Promise<FastifyInstance> {
  // Extract what is not part of the ServerConfig schema before validation
  const { runtime, apiKey, ...serverConfig } = config;

  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  await app.register(cors, {
    origin: validatedConfig.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  // Add request ID to response headers
  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    const mapped = toHttpError(error);
    if (mapped) {
      const level = mapped.statusCode >= 500 ? 'error' : 'warn';
      logger[level]({ err: error, requestId: request.id, code: mapped.code }, 'Request failed');
      return reply
        .status(mapped.statusCode)
        .send(createErrorResponse(mapped.code, mapped.message, mapped.details, request.id));
    }

    logger.error({ err: error, requestId: request.id }, 'Request error');

    // Handle validation errors
    if (error.validation) {
      return reply
        .status(400)
        .send(createErrorResponse(ErrorCode.BAD_REQUEST, 'Validation error', { errors: error.validation }, request.id));
    }

    // Handle specific HTTP status codes
    if (error.statusCode !== undefined && error.statusCode < 500) {
      const code = mapStatusToErrorCode(error.statusCode);
      return reply.status(error.statusCode).send(createErrorResponse(code, error.message, undefined, request.id));
    }

    return reply
      .status(500)
      .send(
        createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', { retryable: false }, request.id)
      );
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply
      .status(404)
      .send(createErrorResponse(ErrorCode.NOT_FOUND, `Route ${request.method} ${request.url} not found`, undefined, request.id));
  });

  const auth = createApiKeyAuth(apiKey);

  registerHealthRoutes(app, {
    agents: runtime.agents,
    orchestrations: runtime.orchestrations,
    limits: { waitTimeoutMs: validatedConfig.waitTimeoutMs },
  });
  registerAgentRoutes(app, { client: runtime.client, auth });
  registerOrchestrationRoutes(app, {
    client: runtime.client,
    auth,
    waitTimeoutMs: validatedConfig.waitTimeoutMs,
  });

  return app;
}

/**
 * Map HTTP status code to error code
 */
function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCode.BAD_REQUEST;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 403:
      return ErrorCode.FORBIDDEN;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 429:
      return ErrorCode.TOO_MANY_REQUESTS;
    default:
      return ErrorCode.BAD_REQUEST;
  }
}
