import { SESSION_KEY_SEPARATOR } from '../types/index.js';
import { createLogger } from '../utils/index.js';
import { bindAgent, type AgentDefinition, type RegisteredAgent } from './runner.js';

const logger = createLogger('agent:registry');

/**
 * Routing table from agent name to agent kind and runner.
 * Built once at startup and passed to whoever dispatches session runs.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, RegisteredAgent>();

  /**
   * Registers an agent with the registry
   */
  register<TState>(definition: AgentDefinition<TState>): this {
    const { name } = definition;

    if (name.length === 0 || name.includes(SESSION_KEY_SEPARATOR)) {
      throw new Error(`Invalid agent name "${name}": must be non-empty and not contain "${SESSION_KEY_SEPARATOR}"`);
    }

    if (this.agents.has(name)) {
      logger.warn({ name }, 'Agent already registered, replacing');
    }

    this.agents.set(name, bindAgent(definition));
    logger.debug({ name, kind: definition.kind }, 'Agent registered');
    return this;
  }

  /**
   * Gets an agent by name
   */
  get(name: string): RegisteredAgent | null {
    return this.agents.get(name) ?? null;
  }

  /**
   * Checks if an agent is registered
   */
  has(name: string): boolean {
    return this.agents.has(name);
  }

  /**
   * Lists all registered agents
   */
  list(): Array<{ name: string; kind: string }> {
    return Array.from(this.agents.values()).map((a) => ({ name: a.name, kind: a.kind }));
  }

  get size(): number {
    return this.agents.size;
  }
}
