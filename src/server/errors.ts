import { ZodError } from 'zod';
import { DurableAgentError, ErrorKind, serializeError } from '../types/index.js';
import { ErrorCode } from './types.js';

export interface HttpError {
  statusCode: number;
  code: ErrorCode;
  message: string;
  details: Record<string, unknown>;
}

const STATUS_BY_KIND: Record<ErrorKind, { statusCode: number; code: ErrorCode }> = {
  [ErrorKind.INPUT_MISSING]: { statusCode: 400, code: ErrorCode.BAD_REQUEST },
  [ErrorKind.AGENT_NOT_FOUND]: { statusCode: 404, code: ErrorCode.NOT_FOUND },
  [ErrorKind.ORCHESTRATION_NOT_FOUND]: { statusCode: 404, code: ErrorCode.NOT_FOUND },
  [ErrorKind.INSTANCE_NOT_FOUND]: { statusCode: 404, code: ErrorCode.NOT_FOUND },
  [ErrorKind.INSTANCE_CONFLICT]: { statusCode: 409, code: ErrorCode.CONFLICT },
  [ErrorKind.EVENT_MISMATCH]: { statusCode: 409, code: ErrorCode.CONFLICT },
  [ErrorKind.QUEUE_FULL]: { statusCode: 429, code: ErrorCode.TOO_MANY_REQUESTS },
  [ErrorKind.TRANSIENT_INFRA]: { statusCode: 503, code: ErrorCode.SERVICE_UNAVAILABLE },
  [ErrorKind.ADAPTER_ERROR]: { statusCode: 502, code: ErrorCode.BAD_GATEWAY },
  [ErrorKind.AGGREGATE_CHILD_FAILURE]: { statusCode: 500, code: ErrorCode.INTERNAL_ERROR },
  [ErrorKind.NON_DETERMINISM]: { statusCode: 500, code: ErrorCode.INTERNAL_ERROR },
  [ErrorKind.HISTORY_LIMIT]: { statusCode: 500, code: ErrorCode.INTERNAL_ERROR },
  [ErrorKind.TASK_FAILED]: { statusCode: 500, code: ErrorCode.INTERNAL_ERROR },
};

/**
 * Map a thrown value to the HTTP status and envelope fields it is reported with.
 * Returns null for errors the generic handler deals with.
 */
export function toHttpError(error: unknown): HttpError | null {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: ErrorCode.BAD_REQUEST,
      message: 'Validation error',
      details: { errors: error.errors, retryable: false },
    };
  }

  if (error instanceof DurableAgentError) {
    const { statusCode, code } = STATUS_BY_KIND[error.code];
    const serialized = serializeError(error);
    return {
      statusCode,
      code,
      message: error.message,
      details: { ...(serialized.details ?? {}), kind: error.code, retryable: error.retryable },
    };
  }

  return null;
}
