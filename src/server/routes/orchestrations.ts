import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DurableClient } from '../../orchestrator/index.js';
import { isTerminalStatus } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';
import { createErrorResponse, createSuccessResponse, ErrorCode } from '../types.js';
import {
  eventParamsSchema,
  instanceIdParamsSchema,
  listInstancesQuerySchema,
  orchestrationNameParamsSchema,
  startQuerySchema,
  type CheckStatusLinks,
} from '../types/api.js';

const logger = createLogger('routes:orchestrations');

const BASE_PATH = '/api/v1/orchestrations';

export interface OrchestrationRouteDeps {
  client: Pick<
    DurableClient,
    'start' | 'status' | 'history' | 'raiseEvent' | 'waitForCompletion' | 'listInstances'
  >;
  auth: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
  /** Wait applied when a start request asks for `?wait=true` */
  waitTimeoutMs: number;
}

export function checkStatusLinks(instanceId: string): CheckStatusLinks {
  const base = `${BASE_PATH}/${encodeURIComponent(instanceId)}`;
  return {
    id: instanceId,
    statusQueryUri: base,
    historyQueryUri: `${base}/history`,
    sendEventUri: `${base}/events/{eventName}`,
  };
}

function invalid(request: FastifyRequest, reply: FastifyReply, message: string, errors: unknown): FastifyReply {
  return reply.status(400).send(createErrorResponse(ErrorCode.BAD_REQUEST, message, { errors }, request.id));
}

/**
 * Register orchestration routes
 */
export function registerOrchestrationRoutes(app: FastifyInstance, deps: OrchestrationRouteDeps): void {
  const { client } = deps;

  /**
   * GET /api/v1/orchestrations - List instances
   */
  app.get(BASE_PATH, async (request, reply) => {
    const query = listInstancesQuerySchema.safeParse(request.query);
    if (!query.success) {
      return invalid(request, reply, 'Invalid query parameters', query.error.errors);
    }

    const { limit, offset, status, name } = query.data;
    const items = await client.listInstances({
      limit,
      offset,
      ...(status !== undefined ? { status } : {}),
      ...(name !== undefined ? { name } : {}),
    });

    return reply.send(createSuccessResponse({ items, limit, offset }, request.id));
  });

  /**
   * POST /api/v1/orchestrations/:name - Start an instance
   * Responds 202 with status links, or waits with ?waitMs= / ?wait=true
   * and responds 200 once the instance is terminal.
   */
  app.post(`${BASE_PATH}/:name`, { preHandler: deps.auth }, async (request, reply) => {
    const params = orchestrationNameParamsSchema.safeParse(request.params);
    if (!params.success) {
      return invalid(request, reply, 'Invalid parameters', params.error.errors);
    }
    const query = startQuerySchema.safeParse(request.query);
    if (!query.success) {
      return invalid(request, reply, 'Invalid query parameters', query.error.errors);
    }

    const { instanceId: requestedId, waitMs, wait } = query.data;
    const instanceId = await client.start(
      params.data.name,
      request.body,
      requestedId !== undefined ? { instanceId: requestedId } : {}
    );
    logger.info({ name: params.data.name, instanceId }, 'Orchestration started');

    const waitFor = waitMs ?? (wait === 'true' ? deps.waitTimeoutMs : undefined);
    if (waitFor === undefined) {
      return reply.status(202).send(createSuccessResponse(checkStatusLinks(instanceId), request.id));
    }

    const status = await client.waitForCompletion(instanceId, waitFor);
    if (isTerminalStatus(status.status)) {
      return reply.send(createSuccessResponse(status, request.id));
    }

    return reply.status(202).send(createSuccessResponse({ ...checkStatusLinks(instanceId), status }, request.id));
  });

  /**
   * GET /api/v1/orchestrations/:instanceId - Instance status
   */
  app.get(`${BASE_PATH}/:instanceId`, async (request, reply) => {
    const params = instanceIdParamsSchema.safeParse(request.params);
    if (!params.success) {
      return invalid(request, reply, 'Invalid parameters', params.error.errors);
    }

    const status = await client.status(params.data.instanceId);
    return reply.send(createSuccessResponse(status, request.id));
  });

  /**
   * GET /api/v1/orchestrations/:instanceId/history - Folded action records
   */
  app.get(`${BASE_PATH}/:instanceId/history`, async (request, reply) => {
    const params = instanceIdParamsSchema.safeParse(request.params);
    if (!params.success) {
      return invalid(request, reply, 'Invalid parameters', params.error.errors);
    }

    const actions = await client.history(params.data.instanceId);
    return reply.send(createSuccessResponse({ instanceId: params.data.instanceId, actions }, request.id));
  });

  /**
   * POST /api/v1/orchestrations/:instanceId/events/:eventName - Raise an event
   */
  app.post(`${BASE_PATH}/:instanceId/events/:eventName`, { preHandler: deps.auth }, async (request, reply) => {
    const params = eventParamsSchema.safeParse(request.params);
    if (!params.success) {
      return invalid(request, reply, 'Invalid parameters', params.error.errors);
    }

    const { instanceId, eventName } = params.data;
    const result = await client.raiseEvent(instanceId, eventName, request.body);

    if (result.delivered) {
      return reply.status(202).send(createSuccessResponse({ instanceId, eventName, delivered: true }, request.id));
    }

    const missing = result.reason === 'unknown_instance';
    return reply
      .status(missing ? 404 : 409)
      .send(
        createErrorResponse(
          missing ? ErrorCode.NOT_FOUND : ErrorCode.CONFLICT,
          result.error.message,
          { kind: result.error.code, reason: result.reason, retryable: false },
          request.id
        )
      );
  });
}
