import { TransientInfraError } from '../types/index.js';

/**
 * errno codes that indicate the backing store is temporarily unavailable.
 */
const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT', 'ECONNRESET']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * Rethrow store failures, marking transient ones as retryable.
 */
export function toStoreError(operation: string, error: unknown): Error {
  const code = errorCode(error);
  if (code !== undefined && TRANSIENT_CODES.has(code)) {
    return new TransientInfraError(operation, error);
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Deep copy through JSON so stored values never share references with callers.
 */
export function jsonClone(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}
