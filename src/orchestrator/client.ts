/**
 * Client facade over sessions, the orchestration engine and the event bus.
 * The HTTP routes and the CLI talk to the core only through this class.
 */

import type { SessionEntities } from '../entity/index.js';
import type { ActionRecord, ListInstancesFilter, OrchestrationStatusView } from '../types/index.js';
import type { OrchestrationEngine } from './engine.js';
import type { EventBus, RaiseResult } from './event-bus.js';

export interface StartOrchestrationOptions {
  instanceId?: string;
}

export class DurableClient {
  constructor(
    private readonly sessions: SessionEntities,
    private readonly engine: OrchestrationEngine,
    private readonly bus: EventBus
  ) {}

  /**
   * Run one turn of an agent session directly, outside any orchestration.
   */
  runAgent(agentName: string, sessionId: string, input: unknown): Promise<string> {
    return this.sessions.run({ agentName, sessionId }, input);
  }

  getSessionState(agentName: string, sessionId: string): Promise<unknown> {
    return this.sessions.getState({ agentName, sessionId });
  }

  start(name: string, input: unknown, options: StartOrchestrationOptions = {}): Promise<string> {
    return this.engine.start(name, input, options.instanceId !== undefined ? { instanceId: options.instanceId } : {});
  }

  status(instanceId: string): Promise<OrchestrationStatusView> {
    return this.engine.getStatus(instanceId);
  }

  raiseEvent(instanceId: string, eventName: string, payload: unknown): Promise<RaiseResult> {
    return this.bus.raise(instanceId, eventName, payload);
  }

  history(instanceId: string): Promise<ActionRecord[]> {
    return this.engine.getHistory(instanceId);
  }

  waitForCompletion(instanceId: string, timeoutMs: number): Promise<OrchestrationStatusView> {
    return this.engine.waitForCompletion(instanceId, timeoutMs);
  }

  listInstances(filter: ListInstancesFilter = {}): Promise<OrchestrationStatusView[]> {
    return this.engine.list(filter);
  }
}
