/**
 * HTTP API tests, driven through Fastify's inject.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AgentRegistry } from '../src/agent/index.js';
import { OrchestrationRegistry, type OrchestrationFunction } from '../src/orchestrator/index.js';
import type { Runtime } from '../src/runtime.js';
import { checkStatusLinks, createApp } from '../src/server/index.js';
import { createTestRuntime, scriptedAgent } from './helpers.js';

const shout: OrchestrationFunction = function* (ctx) {
  const reply = yield* ctx.callAgent('haiku_agent', ctx.getInput(z.string()), { sessionId: 's1' });
  return reply.toUpperCase();
};

const awaitGo: OrchestrationFunction = function* (ctx) {
  const payload = yield* ctx.waitForEvent('go');
  return `went ${String(payload)}`;
};

function bodyOf(response: { body: string }): unknown {
  return JSON.parse(response.body);
}

const text = { 'content-type': 'text/plain' };

describe('HTTP API', () => {
  let runtime: Runtime;
  let app: FastifyInstance;
  let haiku: ReturnType<typeof scriptedAgent>;

  async function build(apiKey?: string): Promise<FastifyInstance> {
    return createApp({ runtime, enableLogging: false, ...(apiKey !== undefined ? { apiKey } : {}) });
  }

  beforeEach(async () => {
    haiku = scriptedAgent('haiku_agent', (input, state) => `#${state.inputs.length + 1}: ${input}`);
    const broken = scriptedAgent('broken_agent', () => {
      throw new Error('model unavailable');
    });
    runtime = createTestRuntime({
      agents: new AgentRegistry().register(haiku).register(broken),
      orchestrations: new OrchestrationRegistry()
        .registerOrchestration('shout', shout)
        .registerOrchestration('go', awaitGo),
    });
    app = await build();
  });

  afterEach(async () => {
    await app.close();
    runtime.close();
  });

  describe('GET /health', () => {
    it('should report what is registered', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['x-request-id']).toEqual(expect.any(String));
      expect(bodyOf(res)).toMatchObject({
        success: true,
        data: {
          status: 'ok',
          version: '0.1.0',
          limits: { waitTimeoutMs: 180000 },
          agents: [
            { name: 'haiku_agent', kind: 'scripted' },
            { name: 'broken_agent', kind: 'scripted' },
          ],
          orchestrations: ['shout', 'go'],
          activities: [],
        },
      });
    });
  });

  describe('agent sessions', () => {
    const runUrl = '/api/v1/agents/haiku_agent/sessions/s1/run';

    it('should run a turn with a text body', async () => {
      const res = await app.inject({ method: 'POST', url: runUrl, headers: text, payload: 'the moon' });

      expect(res.statusCode).toBe(200);
      expect(bodyOf(res)).toMatchObject({
        success: true,
        data: { agentName: 'haiku_agent', sessionId: 's1', output: '#1: the moon' },
      });
    });

    it('should send a JSON body to the agent as JSON text', async () => {
      const res = await app.inject({ method: 'POST', url: runUrl, payload: { topic: 'rain' } });

      expect(res.statusCode).toBe(200);
      expect(haiku.runner.calls).toEqual(['{"topic":"rain"}']);
    });

    it('should require a body', async () => {
      const res = await app.inject({ method: 'POST', url: runUrl });

      expect(res.statusCode).toBe(400);
      expect(bodyOf(res)).toMatchObject({
        success: false,
        error: { code: 'BAD_REQUEST', message: 'Request body is required' },
      });
      expect(haiku.runner.calls).toEqual([]);
    });

    it('should return session state after a run', async () => {
      await app.inject({ method: 'POST', url: runUrl, headers: text, payload: 'the moon' });

      const res = await app.inject({ method: 'GET', url: '/api/v1/agents/haiku_agent/sessions/s1' });

      expect(res.statusCode).toBe(200);
      expect(bodyOf(res)).toMatchObject({
        data: { agentName: 'haiku_agent', sessionId: 's1', state: { inputs: ['the moon'] } },
      });
    });

    it('should return 404 for a session that never ran', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/agents/haiku_agent/sessions/nobody' });

      expect(res.statusCode).toBe(404);
      expect(bodyOf(res)).toMatchObject({
        error: { code: 'NOT_FOUND', message: 'Session nobody of agent haiku_agent not found' },
      });
    });

    it('should return 404 for an unknown agent', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/agents/ghost/sessions/s1/run',
        headers: text,
        payload: 'boo',
      });

      expect(res.statusCode).toBe(404);
      expect(bodyOf(res)).toMatchObject({
        error: {
          code: 'NOT_FOUND',
          message: 'Agent ghost not found',
          details: { kind: 'AGENT_NOT_FOUND', retryable: false },
        },
      });
    });

    it('should report agent failures as a retryable bad gateway', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/agents/broken_agent/sessions/s1/run',
        headers: text,
        payload: 'hello',
      });

      expect(res.statusCode).toBe(502);
      expect(bodyOf(res)).toMatchObject({
        error: {
          code: 'BAD_GATEWAY',
          message: 'Agent broken_agent failed for session s1: model unavailable',
          details: { agentName: 'broken_agent', sessionId: 's1', kind: 'ADAPTER_ERROR', retryable: true },
        },
      });
    });
  });

  describe('authentication', () => {
    const runUrl = '/api/v1/agents/haiku_agent/sessions/s1/run';

    beforeEach(async () => {
      await app.close();
      app = await build('test-secret');
    });

    it.each([
      [undefined, 'Authorization header required'],
      ['Basic abc', 'Invalid authorization format. Use: Bearer <api-key>'],
      ['Bearer wrong', 'Invalid API key'],
    ])('should reject authorization %s', async (authorization, message) => {
      const res = await app.inject({
        method: 'POST',
        url: runUrl,
        headers: authorization !== undefined ? { ...text, authorization } : text,
        payload: 'the moon',
      });

      expect(res.statusCode).toBe(401);
      expect(bodyOf(res)).toMatchObject({ error: { code: 'UNAUTHORIZED', message } });
      expect(haiku.runner.calls).toEqual([]);
    });

    it('should accept the configured key', async () => {
      const res = await app.inject({
        method: 'POST',
        url: runUrl,
        headers: { ...text, authorization: 'Bearer test-secret' },
        payload: 'the moon',
      });

      expect(res.statusCode).toBe(200);
    });

    it('should leave read routes open', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
    });
  });

  describe('orchestrations', () => {
    it('should start an instance and return status links', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/orchestrations/go?instanceId=o1',
        headers: text,
        payload: 'x',
      });

      expect(res.statusCode).toBe(202);
      expect(bodyOf(res)).toMatchObject({
        success: true,
        data: {
          id: 'o1',
          statusQueryUri: '/api/v1/orchestrations/o1',
          historyQueryUri: '/api/v1/orchestrations/o1/history',
          sendEventUri: '/api/v1/orchestrations/o1/events/{eventName}',
        },
      });
    });

    it('should encode instance ids in links', () => {
      expect(checkStatusLinks('p1:0').statusQueryUri).toBe('/api/v1/orchestrations/p1%3A0');
    });

    it('should wait for a finished instance when asked', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/orchestrations/shout?instanceId=o2&waitMs=5000',
        headers: text,
        payload: 'moon',
      });

      expect(res.statusCode).toBe(200);
      expect(bodyOf(res)).toMatchObject({
        data: { instanceId: 'o2', name: 'shout', status: 'Completed', output: '#1: MOON' },
      });
    });

    it('should answer 202 with the current status when the wait runs out', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/orchestrations/go?instanceId=o3&waitMs=20',
        headers: text,
        payload: 'x',
      });

      expect(res.statusCode).toBe(202);
      expect(bodyOf(res)).toMatchObject({
        data: { id: 'o3', status: { instanceId: 'o3', status: 'Pending' } },
      });
    });

    it('should return 404 for an unknown orchestration', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/orchestrations/nope', headers: text, payload: 'x' });

      expect(res.statusCode).toBe(404);
      expect(bodyOf(res)).toMatchObject({
        error: { code: 'NOT_FOUND', message: 'No orchestration registered as nope' },
      });
    });

    it('should return 409 when a live instance id is reused', async () => {
      const start = { method: 'POST' as const, url: '/api/v1/orchestrations/go?instanceId=dup', headers: text, payload: 'x' };
      await app.inject(start);

      const res = await app.inject(start);

      expect(res.statusCode).toBe(409);
      expect(bodyOf(res)).toMatchObject({
        error: { code: 'CONFLICT', message: 'Orchestration instance dup is already running' },
      });
    });

    it('should reject an invalid wait', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/orchestrations/go?waitMs=-1',
        headers: text,
        payload: 'x',
      });

      expect(res.statusCode).toBe(400);
      expect(bodyOf(res)).toMatchObject({ error: { code: 'BAD_REQUEST', message: 'Invalid query parameters' } });
    });

    it('should return status and history', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/orchestrations/go?instanceId=o4', headers: text, payload: 'x' });

      const status = await app.inject({ method: 'GET', url: '/api/v1/orchestrations/o4' });
      const history = await app.inject({ method: 'GET', url: '/api/v1/orchestrations/o4/history' });

      expect(status.statusCode).toBe(200);
      expect(bodyOf(status)).toMatchObject({ data: { instanceId: 'o4', name: 'go', status: 'Pending' } });
      expect(history.statusCode).toBe(200);
      expect(bodyOf(history)).toMatchObject({
        data: {
          instanceId: 'o4',
          actions: [{ sequenceNo: 0, kind: 'externalEvent', name: 'go', status: 'scheduled' }],
        },
      });
    });

    it('should return 404 for an unknown instance', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/orchestrations/missing' });

      expect(res.statusCode).toBe(404);
      expect(bodyOf(res)).toMatchObject({
        error: {
          code: 'NOT_FOUND',
          message: 'Orchestration instance missing not found',
          details: { kind: 'INSTANCE_NOT_FOUND' },
        },
      });
    });

    it('should list instances with filters', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/orchestrations/go?instanceId=l1', headers: text, payload: 'x' });
      await app.inject({
        method: 'POST',
        url: '/api/v1/orchestrations/shout?instanceId=l2&waitMs=5000',
        headers: text,
        payload: 'moon',
      });

      const res = await app.inject({ method: 'GET', url: '/api/v1/orchestrations?status=Pending&limit=5' });

      expect(res.statusCode).toBe(200);
      expect(bodyOf(res)).toMatchObject({
        data: { items: [{ instanceId: 'l1', status: 'Pending' }], limit: 5, offset: 0 },
      });
    });

    it('should reject an unknown status filter', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/orchestrations?status=Sleeping' });

      expect(res.statusCode).toBe(400);
    });
  });

  describe('events', () => {
    beforeEach(async () => {
      await app.inject({ method: 'POST', url: '/api/v1/orchestrations/go?instanceId=e1', headers: text, payload: 'x' });
    });

    it('should deliver an event to a waiting instance', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/orchestrations/e1/events/go',
        headers: text,
        payload: 'yes',
      });

      expect(res.statusCode).toBe(202);
      expect(bodyOf(res)).toMatchObject({ data: { instanceId: 'e1', eventName: 'go', delivered: true } });
      await expect(runtime.client.status('e1')).resolves.toMatchObject({ status: 'Completed', output: 'went yes' });
    });

    it('should return 409 for a finished instance', async () => {
      const url = '/api/v1/orchestrations/e1/events/go';
      await app.inject({ method: 'POST', url, headers: text, payload: 'yes' });

      const res = await app.inject({ method: 'POST', url, headers: text, payload: 'again' });

      expect(res.statusCode).toBe(409);
      expect(bodyOf(res)).toMatchObject({
        error: {
          code: 'CONFLICT',
          message: "Event 'go' addressed to terminal instance e1",
          details: { kind: 'EVENT_MISMATCH', reason: 'terminal_instance', retryable: false },
        },
      });
    });

    it('should return 404 for an unknown instance', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/orchestrations/nobody/events/go',
        headers: text,
        payload: 'yes',
      });

      expect(res.statusCode).toBe(404);
      expect(bodyOf(res)).toMatchObject({
        error: { code: 'NOT_FOUND', details: { kind: 'EVENT_MISMATCH', reason: 'unknown_instance' } },
      });
    });
  });

  it('should return 404 for unknown routes', async () => {
    const res = await app.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(bodyOf(res)).toMatchObject({ error: { code: 'NOT_FOUND', message: 'Route GET /nope not found' } });
  });
});
