/**
 * OpenAI Agents SDK runner tests. The SDK's `run` is replaced; Agent and MCP
 * server objects are real, with their connections stubbed.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Agent, MCPServerStreamableHttp } from '@openai/agents';
import { OpenAIAgentsRunner, defineOpenAIAgent, openAIAgentsCodec } from '../src/agent/index.js';

const sdk = vi.hoisted(() => ({
  run: vi.fn<(agent: Agent, input: unknown[]) => Promise<{ finalOutput: unknown; history: unknown[] }>>(),
}));

vi.mock('@openai/agents', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@openai/agents')>();
  return { ...actual, run: sdk.run };
});

function weatherServer(): MCPServerStreamableHttp {
  return new MCPServerStreamableHttp({ url: 'http://localhost:8000/mcp', name: 'weather' });
}

describe('OpenAIAgentsRunner', () => {
  beforeEach(() => {
    sdk.run.mockReset();
  });

  it('should send the history plus the new input and keep what the SDK returns', async () => {
    const history = [
      { role: 'user', content: 'the moon' },
      { role: 'assistant', content: 'pale moon' },
    ];
    sdk.run.mockResolvedValue({ finalOutput: 'pale moon', history });
    const agent = new Agent({ name: 'Haiku agent', instructions: 'Write haiku.' });
    const runner = new OpenAIAgentsRunner(agent);

    const turn = await runner.run({ items: [] }, 'the moon');

    expect(sdk.run).toHaveBeenCalledWith(agent, [{ role: 'user', content: 'the moon' }]);
    expect(turn.output).toBe('pale moon');
    expect(turn.state.items).toEqual(history);
  });

  it('should append to earlier items', async () => {
    sdk.run.mockResolvedValue({ finalOutput: 'ok', history: [] });
    const runner = new OpenAIAgentsRunner(new Agent({ name: 'Haiku agent', instructions: 'Write haiku.' }));

    await runner.run({ items: [{ role: 'user', content: 'first' }] }, 'second');

    expect(sdk.run.mock.calls[0]?.[1]).toEqual([
      { role: 'user', content: 'first' },
      { role: 'user', content: 'second' },
    ]);
  });

  it('should render structured and missing output as text', async () => {
    const runner = new OpenAIAgentsRunner(new Agent({ name: 'Planner', instructions: 'Plan.' }));

    sdk.run.mockResolvedValueOnce({ finalOutput: { days: 2 }, history: [] });
    await expect(runner.run({ items: [] }, 'x')).resolves.toMatchObject({ output: '{"days":2}' });

    sdk.run.mockResolvedValueOnce({ finalOutput: undefined, history: [] });
    await expect(runner.run({ items: [] }, 'x')).resolves.toMatchObject({ output: '' });
  });

  it('should connect MCP servers for the turn and close them afterwards', async () => {
    const server = weatherServer();
    const connect = vi.spyOn(server, 'connect').mockResolvedValue(undefined);
    const close = vi.spyOn(server, 'close').mockResolvedValue(undefined);
    sdk.run.mockResolvedValue({ finalOutput: 'Sunny', history: [] });
    const agent = new Agent({ name: 'Weather Agent', instructions: 'Weather.', mcpServers: [server] });

    await new OpenAIAgentsRunner(agent).run({ items: [] }, 'Paris?');

    expect(connect).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(sdk.run.mock.calls[0]?.[0]).toBe(agent);
  });

  it('should run without a server that fails to connect', async () => {
    const server = weatherServer();
    vi.spyOn(server, 'connect').mockRejectedValue(new Error('connection refused'));
    const close = vi.spyOn(server, 'close').mockResolvedValue(undefined);
    sdk.run.mockResolvedValue({ finalOutput: 'No tools today', history: [] });
    const agent = new Agent({ name: 'Weather Agent', instructions: 'Weather.', mcpServers: [server] });

    const turn = await new OpenAIAgentsRunner(agent).run({ items: [] }, 'Paris?');

    expect(turn.output).toBe('No tools today');
    expect(sdk.run.mock.calls[0]?.[0].mcpServers).toEqual([]);
    expect(close).not.toHaveBeenCalled();
  });

  it('should close servers when the run fails', async () => {
    const server = weatherServer();
    vi.spyOn(server, 'connect').mockResolvedValue(undefined);
    const close = vi.spyOn(server, 'close').mockResolvedValue(undefined);
    sdk.run.mockRejectedValue(new Error('rate limited'));
    const agent = new Agent({ name: 'Weather Agent', instructions: 'Weather.', mcpServers: [server] });

    await expect(new OpenAIAgentsRunner(agent).run({ items: [] }, 'Paris?')).rejects.toThrow('rate limited');
    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe('openAIAgentsCodec', () => {
  it('should start empty and round-trip stored items', () => {
    expect(openAIAgentsCodec.initialState()).toEqual({ items: [] });
    expect(openAIAgentsCodec.deserialize({ items: [{ role: 'user', content: 'hi' }] })).toEqual({
      items: [{ role: 'user', content: 'hi' }],
    });
  });

  it('should reject stored state of another shape', () => {
    expect(() => openAIAgentsCodec.deserialize({ turns: [] })).toThrow(/^Invalid openai-agents session state/);
  });

  it('should define agents of the openai-agents kind', () => {
    const definition = defineOpenAIAgent('haiku_agent', new Agent({ name: 'Haiku agent', instructions: 'x' }));
    expect(definition).toMatchObject({ name: 'haiku_agent', kind: 'openai-agents' });
  });
});
