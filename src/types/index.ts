// Session Types
export {
  SESSION_KEY_SEPARATOR,
  formatSessionKey,
  parseSessionKey,
  inputToText,
  type SessionKey,
} from './session.js';

// Orchestration Types
export {
  OrchestrationStatus,
  TERMINAL_STATUSES,
  isTerminalStatus,
  ActionKind,
  ActionStatus,
  callTargetSchema,
  historyEventSchema,
  instanceSummarySchema,
  toStatusView,
  type CallTarget,
  type HistoryEvent,
  type ActionScheduledEvent,
  type EventRaisedEvent,
  type InstanceSummary,
  type ActionRecord,
  type OrchestrationStatusView,
  type ListInstancesFilter,
} from './orchestration.js';

// Error Types
export {
  ErrorKind,
  serializedErrorSchema,
  DurableAgentError,
  TransientInfraError,
  AdapterError,
  AggregateChildFailure,
  InputMissingError,
  EventMismatchError,
  QueueFullError,
  NonDeterminismError,
  HistoryLimitError,
  AgentNotFoundError,
  OrchestrationNotFoundError,
  InstanceNotFoundError,
  InstanceConflictError,
  OrchestrationTaskError,
  serializeError,
  isRetryable,
  type SerializedError,
  type ChildFailure,
} from './errors.js';
