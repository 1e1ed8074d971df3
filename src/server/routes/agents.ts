import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DurableClient } from '../../orchestrator/index.js';
import { createLogger } from '../../utils/logger.js';
import { createErrorResponse, createSuccessResponse, ErrorCode } from '../types.js';
import { sessionParamsSchema } from '../types/api.js';

const logger = createLogger('routes:agents');

export interface AgentRouteDeps {
  client: Pick<DurableClient, 'runAgent' | 'getSessionState'>;
  auth: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
}

/**
 * Register agent session routes
 */
export function registerAgentRoutes(app: FastifyInstance, deps: AgentRouteDeps): void {
  /**
   * POST /api/v1/agents/:agentName/sessions/:sessionId/run - Run one turn
   * The body is the input, either plain text or JSON.
   */
  app.post('/api/v1/agents/:agentName/sessions/:sessionId/run', { preHandler: deps.auth }, async (request, reply) => {
    const params = sessionParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply
        .status(400)
        .send(
          createErrorResponse(ErrorCode.BAD_REQUEST, 'Invalid parameters', { errors: params.error.errors }, request.id)
        );
    }

    if (request.body === undefined || request.body === null || request.body === '') {
      return reply
        .status(400)
        .send(createErrorResponse(ErrorCode.BAD_REQUEST, 'Request body is required', undefined, request.id));
    }

    const { agentName, sessionId } = params.data;
    const output = await deps.client.runAgent(agentName, sessionId, request.body);
    logger.debug({ agentName, sessionId }, 'Agent turn completed');

    return reply.send(createSuccessResponse({ agentName, sessionId, output }, request.id));
  });

  /**
   * GET /api/v1/agents/:agentName/sessions/:sessionId - Session state
   */
  app.get('/api/v1/agents/:agentName/sessions/:sessionId', async (request, reply) => {
    const params = sessionParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply
        .status(400)
        .send(
          createErrorResponse(ErrorCode.BAD_REQUEST, 'Invalid parameters', { errors: params.error.errors }, request.id)
        );
    }

    const { agentName, sessionId } = params.data;
    const state = await deps.client.getSessionState(agentName, sessionId);

    if (state === null) {
      return reply
        .status(404)
        .send(
          createErrorResponse(
            ErrorCode.NOT_FOUND,
            `Session ${sessionId} of agent ${agentName} not found`,
            undefined,
            request.id
          )
        );
    }

    return reply.send(createSuccessResponse({ agentName, sessionId, state }, request.id));
  });
}
