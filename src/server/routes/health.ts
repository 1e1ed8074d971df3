import type { FastifyInstance } from 'fastify';
import type { AgentRegistry } from '../../agent/index.js';
import type { OrchestrationRegistry } from '../../orchestrator/index.js';
import { createSuccessResponse, type HealthStatus } from '../types.js';

/**
 * Package version - should match package.json
 */
export const VERSION = '0.1.0';

export interface HealthRouteDeps {
  agents: Pick<AgentRegistry, 'list'>;
  orchestrations: Pick<OrchestrationRegistry, 'listOrchestrations' | 'listActivities'>;
  limits: { waitTimeoutMs: number };
}

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps): void {
  /**
   * GET /health - Basic health check
   * Returns service status, version and what is registered
   */
  app.get('/health', async (request, reply) => {
    const response: HealthStatus & {
      limits: HealthRouteDeps['limits'];
      agents: { name: string; kind: string }[];
      orchestrations: string[];
      activities: string[];
    } = {
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      limits: deps.limits,
      agents: deps.agents.list(),
      orchestrations: deps.orchestrations.listOrchestrations(),
      activities: deps.orchestrations.listActivities(),
    };

    return reply.send(createSuccessResponse(response, request.id));
  });
}
