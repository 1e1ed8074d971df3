import { Command } from 'commander';
import { foldHistory } from '../../orchestrator/index.js';
import { bold, formatActionList, formatError, formatJson, print, printError } from '../formatter.js';
import { openOrchestrationStore, parseOptions, storeOptionsSchema } from './options.js';

/**
 * Create the history command.
 */
export function createHistoryCommand(): Command {
  return new Command('history')
    .description('Show the folded action history of an orchestration instance')
    .argument('<instanceId>', 'Orchestration instance ID')
    .option('--data-dir <dir>', 'Data directory of the file store')
    .option('--json', 'Output as JSON', false)
    .action(async (instanceId: string, options: Record<string, unknown>) => {
      try {
        await executeHistory(instanceId, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}

async function executeHistory(instanceId: string, rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseOptions(storeOptionsSchema, rawOptions);
  if (!options) return;

  const store = openOrchestrationStore(options.dataDir);
  const summary = await store.loadSummary(instanceId);
  if (!summary) {
    printError(formatError(`Orchestration instance not found: ${instanceId}`));
    process.exitCode = 1;
    return;
  }

  const actions = foldHistory(await store.loadHistory(instanceId));
  if (options.json) {
    print(formatJson(actions));
    return;
  }

  print(`${bold(summary.name)} ${instanceId}`);
  print('');
  print(formatActionList(actions));
}
