/**
 * OpenAI Agents SDK Runner
 *
 * Runs an `@openai/agents` Agent over the session's structured item history.
 * The SDK owns the item format; this runner only carries it between turns.
 */

import { Agent, run, type AgentInputItem, type MCPServer } from '@openai/agents';
import { z } from 'zod';
import { createLogger } from '../utils/index.js';
import type { AgentDefinition, AgentRunner, AgentTurn, SessionCodec } from './runner.js';

const logger = createLogger('agent:openai-agents');

export const OPENAI_AGENTS_KIND = 'openai-agents';

/**
 * Session state: every input, output and tool item the SDK produced so far.
 */
export interface OpenAIAgentsState {
  items: AgentInputItem[];
}

const storedStateSchema = z.object({
  items: z.array(z.object({}).passthrough()),
});

export const openAIAgentsCodec: SessionCodec<OpenAIAgentsState> = {
  initialState: () => ({ items: [] }),
  serialize: (state) => ({ items: state.items }),
  deserialize: (stored) => {
    const result = storedStateSchema.safeParse(stored);
    if (!result.success) {
      throw new Error(`Invalid openai-agents session state: ${result.error.message}`);
    }
    // Item shapes are validated by the SDK when they are sent back to the model
    return { items: result.data.items as AgentInputItem[] };
  },
};

/**
 * Runs one turn of an SDK agent, connecting its MCP servers for the duration.
 */
export class OpenAIAgentsRunner implements AgentRunner<OpenAIAgentsState> {
  constructor(private readonly agent: Agent) {}

  async run(state: OpenAIAgentsState, input: string): Promise<AgentTurn<OpenAIAgentsState>> {
    const items: AgentInputItem[] = [...state.items, { role: 'user', content: input }];
    const connected = await this.connectServers();
    const agent =
      connected.length === this.agent.mcpServers.length ? this.agent : this.agent.clone({ mcpServers: connected });

    try {
      const result = await run(agent, items);
      const finalOutput: unknown = result.finalOutput;
      const output =
        typeof finalOutput === 'string' ? finalOutput : finalOutput === undefined ? '' : JSON.stringify(finalOutput);

      logger.debug(
        { agent: this.agent.name, items: result.history.length },
        'Agent turn completed'
      );

      return { state: { items: result.history }, output };
    } finally {
      await this.closeServers(connected);
    }
  }

  /**
   * Connect each MCP server; a server that fails to connect is skipped for this turn.
   */
  private async connectServers(): Promise<MCPServer[]> {
    const connected: MCPServer[] = [];
    for (const server of this.agent.mcpServers) {
      try {
        await server.connect();
        connected.push(server);
      } catch (error) {
        logger.warn({ agent: this.agent.name, server: server.name, err: error }, 'MCP server failed to connect');
      }
    }
    return connected;
  }

  private async closeServers(servers: MCPServer[]): Promise<void> {
    for (const server of servers) {
      try {
        await server.close();
      } catch (error) {
        logger.error({ agent: this.agent.name, server: server.name, err: error }, 'MCP server failed to close');
      }
    }
  }
}

/**
 * Build a registry definition for an SDK agent.
 */
export function defineOpenAIAgent(name: string, agent: Agent): AgentDefinition<OpenAIAgentsState> {
  return {
    name,
    kind: OPENAI_AGENTS_KIND,
    codec: openAIAgentsCodec,
    runner: new OpenAIAgentsRunner(agent),
  };
}
