/**
 * Error taxonomy for sessions, orchestrations and the event bus.
 */

import { z } from 'zod';

export const ErrorKind = {
  TRANSIENT_INFRA: 'TRANSIENT_INFRA',
  ADAPTER_ERROR: 'ADAPTER_ERROR',
  AGGREGATE_CHILD_FAILURE: 'AGGREGATE_CHILD_FAILURE',
  INPUT_MISSING: 'INPUT_MISSING',
  EVENT_MISMATCH: 'EVENT_MISMATCH',
  QUEUE_FULL: 'QUEUE_FULL',
  NON_DETERMINISM: 'NON_DETERMINISM',
  HISTORY_LIMIT: 'HISTORY_LIMIT',
  AGENT_NOT_FOUND: 'AGENT_NOT_FOUND',
  ORCHESTRATION_NOT_FOUND: 'ORCHESTRATION_NOT_FOUND',
  INSTANCE_NOT_FOUND: 'INSTANCE_NOT_FOUND',
  INSTANCE_CONFLICT: 'INSTANCE_CONFLICT',
  TASK_FAILED: 'TASK_FAILED',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Error as it is recorded in history and exposed through status queries.
 */
export const serializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  code: z.string().optional(),
  retryable: z.boolean().optional(),
  details: z.record(z.unknown()).optional(),
});

export type SerializedError = z.infer<typeof serializedErrorSchema>;

/**
 * Base class for every error raised by this package.
 */
export class DurableAgentError extends Error {
  override readonly name: string = 'DurableAgentError';
  readonly code: ErrorKind;
  readonly retryable: boolean;

  constructor(code: ErrorKind, message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.retryable = retryable;
    Object.setPrototypeOf(this, DurableAgentError.prototype);
  }

  /**
   * Extra fields carried into the serialized form.
   */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

/**
 * Store or bus unavailable. Safe to retry the whole operation.
 */
export class TransientInfraError extends DurableAgentError {
  override readonly name = 'TransientInfraError';
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(
      ErrorKind.TRANSIENT_INFRA,
      `Transient infrastructure failure during ${operation}: ${describeCause(cause)}`,
      true,
      { cause }
    );
    this.operation = operation;
    Object.setPrototypeOf(this, TransientInfraError.prototype);
  }

  override details(): Record<string, unknown> {
    return { operation: this.operation };
  }
}

/**
 * The agent runner failed. No session state was written.
 */
export class AdapterError extends DurableAgentError {
  override readonly name = 'AdapterError';
  readonly agentName: string;
  readonly sessionId: string;

  constructor(agentName: string, sessionId: string, cause: unknown) {
    super(
      ErrorKind.ADAPTER_ERROR,
      `Agent ${agentName} failed for session ${sessionId}: ${describeCause(cause)}`,
      true,
      { cause }
    );
    this.agentName = agentName;
    this.sessionId = sessionId;
    Object.setPrototypeOf(this, AdapterError.prototype);
  }

  override details(): Record<string, unknown> {
    return { agentName: this.agentName, sessionId: this.sessionId };
  }
}

/**
 * One failed participant of a fan-in.
 */
export interface ChildFailure {
  sequenceNo: number;
  name: string;
  error: SerializedError;
}

/**
 * One or more fanned-out calls failed.
 */
export class AggregateChildFailure extends DurableAgentError {
  override readonly name = 'AggregateChildFailure';
  readonly failures: ChildFailure[];

  constructor(failures: ChildFailure[]) {
    super(
      ErrorKind.AGGREGATE_CHILD_FAILURE,
      `${failures.length} of the awaited tasks failed: ` +
        failures.map((f) => `#${f.sequenceNo} ${f.name}: ${f.error.message}`).join('; '),
      false
    );
    this.failures = failures;
    Object.setPrototypeOf(this, AggregateChildFailure.prototype);
  }

  override details(): Record<string, unknown> {
    return { failures: this.failures };
  }
}

/**
 * Orchestration started without its required input.
 */
export class InputMissingError extends DurableAgentError {
  override readonly name = 'InputMissingError';
  readonly orchestrationName: string;

  constructor(orchestrationName: string) {
    super(ErrorKind.INPUT_MISSING, `Input missing for orchestration ${orchestrationName}`, false);
    this.orchestrationName = orchestrationName;
    Object.setPrototypeOf(this, InputMissingError.prototype);
  }
}

/**
 * Event addressed to an unknown or terminal instance.
 */
export class EventMismatchError extends DurableAgentError {
  override readonly name = 'EventMismatchError';
  readonly instanceId: string;
  readonly eventName: string;
  readonly reason: 'unknown_instance' | 'terminal_instance';

  constructor(instanceId: string, eventName: string, reason: 'unknown_instance' | 'terminal_instance') {
    super(
      ErrorKind.EVENT_MISMATCH,
      reason === 'unknown_instance'
        ? `Event '${eventName}' addressed to unknown instance ${instanceId}`
        : `Event '${eventName}' addressed to terminal instance ${instanceId}`,
      false
    );
    this.instanceId = instanceId;
    this.eventName = eventName;
    this.reason = reason;
    Object.setPrototypeOf(this, EventMismatchError.prototype);
  }

  override details(): Record<string, unknown> {
    return { instanceId: this.instanceId, eventName: this.eventName, reason: this.reason };
  }
}

/**
 * A per-key queue is at capacity.
 */
export class QueueFullError extends DurableAgentError {
  override readonly name = 'QueueFullError';
  readonly key: string;
  readonly depth: number;

  constructor(key: string, depth: number) {
    super(ErrorKind.QUEUE_FULL, `Queue for ${key} is full (${depth} pending)`, true);
    this.key = key;
    this.depth = depth;
    Object.setPrototypeOf(this, QueueFullError.prototype);
  }

  override details(): Record<string, unknown> {
    return { key: this.key, depth: this.depth };
  }
}

/**
 * Replay produced a different action than the one recorded at a sequence number.
 */
export class NonDeterminismError extends DurableAgentError {
  override readonly name = 'NonDeterminismError';
  readonly sequenceNo: number;
  readonly expected: string;
  readonly actual: string;

  constructor(sequenceNo: number, expected: string, actual: string) {
    super(
      ErrorKind.NON_DETERMINISM,
      `Non-deterministic orchestration: action #${sequenceNo} was recorded as ${expected} but replay produced ${actual}`,
      false
    );
    this.sequenceNo = sequenceNo;
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, NonDeterminismError.prototype);
  }

  override details(): Record<string, unknown> {
    return { sequenceNo: this.sequenceNo, expected: this.expected, actual: this.actual };
  }
}

export class HistoryLimitError extends DurableAgentError {
  override readonly name = 'HistoryLimitError';
  readonly limit: number;

  constructor(limit: number) {
    super(ErrorKind.HISTORY_LIMIT, `History exceeded ${limit} events`, false);
    this.limit = limit;
    Object.setPrototypeOf(this, HistoryLimitError.prototype);
  }
}

export class AgentNotFoundError extends DurableAgentError {
  override readonly name = 'AgentNotFoundError';
  readonly agentName: string;

  constructor(agentName: string) {
    super(ErrorKind.AGENT_NOT_FOUND, `Agent ${agentName} not found`, false);
    this.agentName = agentName;
    Object.setPrototypeOf(this, AgentNotFoundError.prototype);
  }
}

export class OrchestrationNotFoundError extends DurableAgentError {
  override readonly name = 'OrchestrationNotFoundError';
  readonly orchestrationName: string;

  constructor(orchestrationName: string, what: 'orchestration' | 'activity' = 'orchestration') {
    super(ErrorKind.ORCHESTRATION_NOT_FOUND, `No ${what} registered as ${orchestrationName}`, false);
    this.orchestrationName = orchestrationName;
    Object.setPrototypeOf(this, OrchestrationNotFoundError.prototype);
  }
}

export class InstanceNotFoundError extends DurableAgentError {
  override readonly name = 'InstanceNotFoundError';
  readonly instanceId: string;

  constructor(instanceId: string) {
    super(ErrorKind.INSTANCE_NOT_FOUND, `Orchestration instance ${instanceId} not found`, false);
    this.instanceId = instanceId;
    Object.setPrototypeOf(this, InstanceNotFoundError.prototype);
  }
}

export class InstanceConflictError extends DurableAgentError {
  override readonly name = 'InstanceConflictError';
  readonly instanceId: string;

  constructor(instanceId: string) {
    super(ErrorKind.INSTANCE_CONFLICT, `Orchestration instance ${instanceId} is already running`, false);
    this.instanceId = instanceId;
    Object.setPrototypeOf(this, InstanceConflictError.prototype);
  }
}

/**
 * A recorded failure rethrown into an orchestration function during replay.
 */
export class OrchestrationTaskError extends DurableAgentError {
  override readonly name = 'OrchestrationTaskError';
  readonly recorded: SerializedError;

  constructor(recorded: SerializedError) {
    super(ErrorKind.TASK_FAILED, recorded.message, recorded.retryable ?? false);
    this.recorded = recorded;
    Object.setPrototypeOf(this, OrchestrationTaskError.prototype);
  }

  override details(): Record<string, unknown> {
    return { cause: this.recorded };
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Convert any thrown value into its recorded form.
 */
export function serializeError(error: unknown): SerializedError {
  if (error instanceof OrchestrationTaskError) {
    // Keep the original failure rather than wrapping it again
    return error.recorded;
  }

  if (error instanceof DurableAgentError) {
    const details = error.details();
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      retryable: error.retryable,
      ...(details && { details }),
    };
  }

  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }

  return { name: 'Error', message: String(error) };
}

/**
 * Whether a thrown value may succeed when the same operation is retried.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof DurableAgentError && error.retryable;
}
