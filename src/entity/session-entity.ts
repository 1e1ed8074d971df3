/**
 * Session entity.
 *
 * Owns the Conversation Store row of every session key. All reads and writes
 * of a key go through that key's lane of a bounded serial queue, so runs for
 * one session never interleave while different sessions proceed in parallel.
 */

import type { AgentRegistry } from '../agent/index.js';
import type { ConversationStore } from '../store/index.js';
import {
  AdapterError,
  AgentNotFoundError,
  formatSessionKey,
  inputToText,
  type SessionKey,
} from '../types/index.js';
import { KeyedSerialQueue, createLogger } from '../utils/index.js';

const log = createLogger('session-entity');

export interface SessionEntityConfig {
  /** Runs allowed to wait behind the active run of one session */
  maxQueuedRunsPerSession: number;
}

export class SessionEntities {
  private readonly queue: KeyedSerialQueue;

  constructor(
    private readonly agents: AgentRegistry,
    private readonly store: ConversationStore,
    config: SessionEntityConfig
  ) {
    this.queue = new KeyedSerialQueue({
      name: 'session-queue',
      maxQueueDepth: config.maxQueuedRunsPerSession,
    });
  }

  /**
   * Run one turn of a session and return the agent's reply.
   *
   * State is only written after the runner succeeds; a failed run leaves the
   * stored conversation exactly as it was.
   */
  run(key: SessionKey, input: unknown): Promise<string> {
    const agent = this.agents.get(key.agentName);
    if (!agent) {
      return Promise.reject(new AgentNotFoundError(key.agentName));
    }

    const sessionKey = formatSessionKey(key);
    return this.queue.enqueue(sessionKey, async () => {
      const stored = await this.store.get(key);
      const session = agent.open(stored);
      const text = inputToText(input);

      log.debug({ sessionKey, kind: agent.kind, isNew: stored === undefined }, 'Running session turn');

      let turn: { state: unknown; output: string };
      try {
        turn = await session.run(text);
        if (turn.state === undefined) {
          throw new Error('runner produced no state to store');
        }
      } catch (error) {
        log.warn({ sessionKey, err: error }, 'Agent run failed, session state unchanged');
        throw new AdapterError(key.agentName, key.sessionId, error);
      }

      await this.store.put(key, turn.state);
      log.info({ sessionKey, outputLength: turn.output.length }, 'Session turn completed');
      return turn.output;
    });
  }

  /**
   * Current stored state of a session, decoded and re-encoded by its agent kind.
   * Returns null for a session that has never run.
   */
  getState(key: SessionKey): Promise<unknown> {
    const agent = this.agents.get(key.agentName);
    if (!agent) {
      return Promise.reject(new AgentNotFoundError(key.agentName));
    }

    return this.queue.enqueue(formatSessionKey(key), async () => {
      const stored = await this.store.get(key);
      return stored === undefined ? null : agent.open(stored).snapshot();
    });
  }

  /**
   * Runs waiting behind the active one for a session.
   */
  getQueueDepth(key: SessionKey): number {
    return this.queue.getQueueDepth(formatSessionKey(key));
  }

  get activeSessions(): number {
    return this.queue.activeKeys;
  }
}
