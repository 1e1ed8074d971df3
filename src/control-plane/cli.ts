import { Command } from 'commander';
import { createServeCommand } from './commands/serve.js';
import { createStatusCommand } from './commands/status.js';
import { createHistoryCommand } from './commands/history.js';
import { createListCommand } from './commands/list.js';
import { VERSION } from '../server/index.js';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('durable-agents')
    .description('Durable agent sessions and deterministic-replay orchestrations')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createServeCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createHistoryCommand());
  program.addCommand(createListCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    throw error;
  }
}

export { createServeCommand } from './commands/serve.js';
export { createStatusCommand } from './commands/status.js';
export { createHistoryCommand } from './commands/history.js';
export { createListCommand } from './commands/list.js';
