import { z } from 'zod';
import { OrchestrationStatus } from '../../types/index.js';

/**
 * Pagination query parameters
 */
export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;

/**
 * List orchestration instances query parameters
 */
export const listInstancesQuerySchema = paginationQuerySchema.extend({
  status: z
    .enum([
      OrchestrationStatus.RUNNING,
      OrchestrationStatus.PENDING,
      OrchestrationStatus.COMPLETED,
      OrchestrationStatus.FAILED,
    ])
    .optional(),
  name: z.string().min(1).optional(),
});

export type ListInstancesQuery = z.infer<typeof listInstancesQuerySchema>;

export const sessionParamsSchema = z.object({
  agentName: z.string().min(1),
  sessionId: z.string().min(1),
});

export type SessionParams = z.infer<typeof sessionParamsSchema>;

export const orchestrationNameParamsSchema = z.object({
  name: z.string().min(1),
});

export type OrchestrationNameParams = z.infer<typeof orchestrationNameParamsSchema>;

export const instanceIdParamsSchema = z.object({
  instanceId: z.string().min(1),
});

export type InstanceIdParams = z.infer<typeof instanceIdParamsSchema>;

export const eventParamsSchema = instanceIdParamsSchema.extend({
  eventName: z.string().min(1),
});

export type EventParams = z.infer<typeof eventParamsSchema>;

/**
 * Start orchestration query parameters
 */
export const startQuerySchema = z.object({
  instanceId: z.string().min(1).optional(),
  /** Block up to this many milliseconds for the instance to finish */
  waitMs: z.coerce.number().int().min(0).max(3600000).optional(),
  /** Block for the configured default wait */
  wait: z.enum(['true', 'false']).optional(),
});

export type StartQuery = z.infer<typeof startQuerySchema>;

/**
 * Links returned when a start request does not wait for the instance
 */
export interface CheckStatusLinks {
  id: string;
  statusQueryUri: string;
  historyQueryUri: string;
  sendEventUri: string;
}
