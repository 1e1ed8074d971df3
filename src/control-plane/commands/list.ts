import { Command } from 'commander';
import { z } from 'zod';
import { OrchestrationStatus, toStatusView } from '../../types/index.js';
import { formatError, formatInstanceList, formatJson, print, printError } from '../formatter.js';
import { openOrchestrationStore, parseOptions, storeOptionsSchema } from './options.js';

const listOptionsSchema = storeOptionsSchema.extend({
  status: z
    .enum([
      OrchestrationStatus.RUNNING,
      OrchestrationStatus.PENDING,
      OrchestrationStatus.COMPLETED,
      OrchestrationStatus.FAILED,
    ])
    .optional(),
  name: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(20),
});

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List orchestration instances, newest first')
    .option('--status <status>', 'Filter by status (Running, Pending, Completed, Failed)')
    .option('--name <name>', 'Filter by orchestration name')
    .option('-l, --limit <n>', 'Maximum number of instances to show', '20')
    .option('--data-dir <dir>', 'Data directory of the file store')
    .option('--json', 'Output as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeList(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}

async function executeList(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseOptions(listOptionsSchema, rawOptions);
  if (!options) return;

  const summaries = await openOrchestrationStore(options.dataDir).list({
    limit: options.limit,
    ...(options.status !== undefined ? { status: options.status } : {}),
    ...(options.name !== undefined ? { name: options.name } : {}),
  });
  const views = summaries.map(toStatusView);

  print(options.json ? formatJson(views) : formatInstanceList(views));
}
