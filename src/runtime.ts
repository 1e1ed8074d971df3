/**
 * Composition root.
 *
 * Builds the registries, stores, session entities, engine, event bus and
 * client from configuration, and hands them out as one runtime object.
 */

import { AgentRegistry, createAgentCatalog } from './agent/index.js';
import { StoreKind, type DurableAgentsConfig } from './config/index.js';
import { SessionEntities } from './entity/index.js';
import {
  DurableClient,
  EventBus,
  OrchestrationEngine,
  OrchestrationRegistry,
  type RecoveryReport,
} from './orchestrator/index.js';
import {
  FileConversationStore,
  FileOrchestrationStore,
  MemoryConversationStore,
  MemoryOrchestrationStore,
  type ConversationStore,
  type OrchestrationStore,
} from './store/index.js';
import { createLogger } from './utils/index.js';
import { registerWorkflows } from './workflows/index.js';

const log = createLogger('runtime');

export type RuntimeConfig = Pick<
  DurableAgentsConfig,
  'store' | 'dataDir' | 'maxQueuedRunsPerSession' | 'maxHistoryEvents' | 'openaiModel' | 'weatherMcpUrl'
>;

export interface RuntimeOverrides {
  /** Agent registry to use instead of the default catalog */
  agents?: AgentRegistry;
  /** Orchestration registry to use instead of the bundled workflows */
  orchestrations?: OrchestrationRegistry;
  conversationStore?: ConversationStore;
  orchestrationStore?: OrchestrationStore;
  clock?: () => Date;
}

export interface Runtime {
  agents: AgentRegistry;
  orchestrations: OrchestrationRegistry;
  sessions: SessionEntities;
  engine: OrchestrationEngine;
  bus: EventBus;
  client: DurableClient;
  /** Resume live instances left by a previous process */
  recover(): Promise<RecoveryReport>;
  close(): void;
}

function createStores(config: RuntimeConfig): { conversations: ConversationStore; orchestrations: OrchestrationStore } {
  if (config.store === StoreKind.MEMORY) {
    return { conversations: new MemoryConversationStore(), orchestrations: new MemoryOrchestrationStore() };
  }
  return {
    conversations: new FileConversationStore(config.dataDir),
    orchestrations: new FileOrchestrationStore(config.dataDir),
  };
}

export function createRuntime(config: RuntimeConfig, overrides: RuntimeOverrides = {}): Runtime {
  const stores = createStores(config);
  const agents = overrides.agents ?? createAgentCatalog(config);
  const orchestrations = overrides.orchestrations ?? registerWorkflows(new OrchestrationRegistry());

  const sessions = new SessionEntities(agents, overrides.conversationStore ?? stores.conversations, {
    maxQueuedRunsPerSession: config.maxQueuedRunsPerSession,
  });

  const engine = new OrchestrationEngine({
    registry: orchestrations,
    store: overrides.orchestrationStore ?? stores.orchestrations,
    sessions,
    config: { maxHistoryEvents: config.maxHistoryEvents },
    ...(overrides.clock !== undefined ? { clock: overrides.clock } : {}),
  });

  const bus = new EventBus(engine);
  const client = new DurableClient(sessions, engine, bus);

  log.debug(
    {
      store: config.store,
      agents: agents.size,
      orchestrations: orchestrations.listOrchestrations().length,
    },
    'Runtime created'
  );

  return {
    agents,
    orchestrations,
    sessions,
    engine,
    bus,
    client,
    recover: () => engine.recover(),
    close: () => {
      engine.close();
      bus.removeAllListeners();
    },
  };
}
