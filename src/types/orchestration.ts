/**
 * Orchestration instance, history and action record types.
 *
 * History is an append-only list of events. Action records are the folded
 * view of that list: one record per sequence number with its current status.
 */

import { z } from 'zod';
import { serializedErrorSchema } from './errors.js';

// Orchestration Status
export const OrchestrationStatus = {
  RUNNING: 'Running',
  PENDING: 'Pending',
  COMPLETED: 'Completed',
  FAILED: 'Failed',
} as const;

export type OrchestrationStatus = (typeof OrchestrationStatus)[keyof typeof OrchestrationStatus];

export const TERMINAL_STATUSES: readonly OrchestrationStatus[] = [
  OrchestrationStatus.COMPLETED,
  OrchestrationStatus.FAILED,
];

export function isTerminalStatus(status: OrchestrationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// Action Kind
export const ActionKind = {
  CALL: 'call',
  TIMER: 'timer',
  EXTERNAL_EVENT: 'externalEvent',
} as const;

export type ActionKind = (typeof ActionKind)[keyof typeof ActionKind];

// Action Status
export const ActionStatus = {
  SCHEDULED: 'scheduled',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type ActionStatus = (typeof ActionStatus)[keyof typeof ActionStatus];

/**
 * What a `call` action invokes.
 */
export const callTargetSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('entity'),
    agentName: z.string().min(1),
    sessionId: z.string().min(1),
    operation: z.literal('run'),
  }),
  z.object({
    type: z.literal('activity'),
    name: z.string().min(1),
  }),
  z.object({
    type: z.literal('orchestration'),
    name: z.string().min(1),
    instanceId: z.string().min(1),
  }),
]);

export type CallTarget = z.infer<typeof callTargetSchema>;

const timestampSchema = z.string().datetime();

export const historyEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('OrchestrationStarted'),
    input: z.unknown(),
    timestamp: timestampSchema,
  }),
  z.object({
    type: z.literal('ActionScheduled'),
    sequenceNo: z.number().int().min(0),
    kind: z.enum([ActionKind.CALL, ActionKind.TIMER, ActionKind.EXTERNAL_EVENT]),
    name: z.string(),
    target: callTargetSchema.optional(),
    input: z.unknown(),
    fireAt: timestampSchema.optional(),
    timestamp: timestampSchema,
  }),
  z.object({
    type: z.literal('ActionCompleted'),
    sequenceNo: z.number().int().min(0),
    result: z.unknown(),
    timestamp: timestampSchema,
  }),
  z.object({
    type: z.literal('ActionFailed'),
    sequenceNo: z.number().int().min(0),
    error: serializedErrorSchema,
    timestamp: timestampSchema,
  }),
  z.object({
    type: z.literal('EventRaised'),
    name: z.string().min(1),
    payload: z.unknown(),
    timestamp: timestampSchema,
  }),
  z.object({
    type: z.literal('OrchestrationCompleted'),
    output: z.unknown(),
    timestamp: timestampSchema,
  }),
  z.object({
    type: z.literal('OrchestrationFailed'),
    error: serializedErrorSchema,
    timestamp: timestampSchema,
  }),
]);

export type HistoryEvent = z.infer<typeof historyEventSchema>;
export type ActionScheduledEvent = Extract<HistoryEvent, { type: 'ActionScheduled' }>;
export type EventRaisedEvent = Extract<HistoryEvent, { type: 'EventRaised' }>;

/**
 * Summary row kept per instance.
 */
export const instanceSummarySchema = z.object({
  instanceId: z.string().min(1),
  name: z.string().min(1),
  status: z.enum([
    OrchestrationStatus.RUNNING,
    OrchestrationStatus.PENDING,
    OrchestrationStatus.COMPLETED,
    OrchestrationStatus.FAILED,
  ]),
  input: z.unknown(),
  output: z.unknown(),
  error: serializedErrorSchema.optional(),
  customStatus: z.unknown(),
  /** Fresh for every start, so a reused instance id never accepts an earlier run's outcomes */
  generation: z.string().min(1).optional(),
  parentInstanceId: z.string().optional(),
  parentGeneration: z.string().min(1).optional(),
  /** Sequence number of the parent's sub-orchestration action */
  parentSequenceNo: z.number().int().min(0).optional(),
  createdAt: timestampSchema,
  lastUpdatedAt: timestampSchema,
  historyLength: z.number().int().min(0),
});

export type InstanceSummary = z.infer<typeof instanceSummarySchema>;

/**
 * Folded view of one action.
 */
export interface ActionRecord {
  sequenceNo: number;
  kind: ActionKind;
  name: string;
  status: ActionStatus;
  target?: CallTarget;
  input?: unknown;
  result?: unknown;
  error?: z.infer<typeof serializedErrorSchema>;
  fireAt?: string;
  scheduledAt: string;
  completedAt?: string;
}

/**
 * Response of the status query.
 */
export interface OrchestrationStatusView {
  instanceId: string;
  name: string;
  status: OrchestrationStatus;
  output?: unknown;
  error?: z.infer<typeof serializedErrorSchema>;
  customStatus?: unknown;
  createdAt: string;
  lastUpdated: string;
}

export function toStatusView(summary: InstanceSummary): OrchestrationStatusView {
  const view: OrchestrationStatusView = {
    instanceId: summary.instanceId,
    name: summary.name,
    status: summary.status,
    createdAt: summary.createdAt,
    lastUpdated: summary.lastUpdatedAt,
  };

  if (summary.output !== undefined) {
    view.output = summary.output;
  }
  if (summary.error !== undefined) {
    view.error = summary.error;
  }
  if (summary.customStatus !== undefined) {
    view.customStatus = summary.customStatus;
  }

  return view;
}

/**
 * Filters for listing instances.
 */
export interface ListInstancesFilter {
  status?: OrchestrationStatus;
  name?: string;
  limit?: number;
  offset?: number;
}
