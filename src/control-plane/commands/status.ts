import { Command } from 'commander';
import { toStatusView } from '../../types/index.js';
import { formatError, formatInstanceDetail, formatJson, print, printError } from '../formatter.js';
import { openOrchestrationStore, parseOptions, storeOptionsSchema } from './options.js';

/**
 * Create the status command.
 */
export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show the status of an orchestration instance')
    .argument('<instanceId>', 'Orchestration instance ID')
    .option('--data-dir <dir>', 'Data directory of the file store')
    .option('--json', 'Output as JSON', false)
    .action(async (instanceId: string, options: Record<string, unknown>) => {
      try {
        await executeStatus(instanceId, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}

async function executeStatus(instanceId: string, rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseOptions(storeOptionsSchema, rawOptions);
  if (!options) return;

  const summary = await openOrchestrationStore(options.dataDir).loadSummary(instanceId);
  if (!summary) {
    printError(formatError(`Orchestration instance not found: ${instanceId}`));
    process.exitCode = 1;
    return;
  }

  const view = toStatusView(summary);
  print(options.json ? formatJson(view) : formatInstanceDetail(view));
}
