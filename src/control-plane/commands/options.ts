import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { FileOrchestrationStore } from '../../store/index.js';
import { formatValidationErrors, printError } from '../formatter.js';

/**
 * Options shared by the commands that read the file store directly.
 */
export const storeOptionsSchema = z.object({
  dataDir: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

export function openOrchestrationStore(dataDir: string | undefined): FileOrchestrationStore {
  return new FileOrchestrationStore(dataDir ?? getConfig().dataDir);
}

/**
 * Parse command options, printing validation errors and setting the exit code on failure.
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T | null {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  printError(
    formatValidationErrors(
      result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    )
  );
  process.exitCode = 1;
  return null;
}
