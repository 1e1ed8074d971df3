export {
  Task,
  ActionTask,
  WhenAllTask,
  WhenAnyTask,
  type ResultSchema,
  type Settlement,
} from './task.js';

export {
  OrchestrationContext,
  type CallAgentOptions,
  type SubOrchestrationOptions,
} from './context.js';

export {
  buildHistoryView,
  foldHistory,
  outstandingActions,
  type ActionOutcome,
  type HistoryView,
} from './history.js';

export {
  replay,
  replayOnce,
  type OrchestrationFunction,
  type ReplayInput,
  type ReplayOutcome,
  type ReplayResult,
} from './replay.js';

export { OrchestrationRegistry, type ActivityFunction } from './registry.js';

export {
  OrchestrationEngine,
  type EngineStats,
  type EventDelivery,
  type OrchestrationEngineConfig,
  type OrchestrationEngineDeps,
  type OrchestrationEngineEvents,
  type RecoveryReport,
  type StartOptions,
} from './engine.js';

export { EventBus, type EventBusEvents, type RaiseResult, type RaisedEvent } from './event-bus.js';

export { DurableClient, type StartOrchestrationOptions } from './client.js';
