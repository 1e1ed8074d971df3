import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createRuntime } from '../../runtime.js';
import { startServer, stopServer } from '../../server/index.js';
import {
  print,
  printError,
  formatError,
  formatValidationErrors,
  formatWarning,
  bold,
  cyan,
} from '../formatter.js';

/**
 * Schema for serve command options. Unset options fall back to configuration.
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  corsOrigin: z.string().optional(),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the durable agents HTTP server')
    .option('-p, --port <port>', 'Port to listen on (default: DURABLE_AGENTS_PORT or 3001)')
    .option('-H, --host <host>', 'Host to bind to (default: DURABLE_AGENTS_HOST or 0.0.0.0)')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the serve command.
 */
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options: ServeOptions = optionsResult.data;
  const config = getConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;

  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : ['*'];

  print('Starting durable agents server...');
  print('');
  print(`${bold('Port:')} ${cyan(String(port))}`);
  print(`${bold('Host:')} ${cyan(host)}`);
  print(`${bold('Store:')} ${cyan(config.store === 'file' ? `file (${config.dataDir})` : 'memory')}`);
  print(`${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print('');

  const runtime = createRuntime(config);
  const { recovered, failed } = await runtime.recover();
  if (recovered > 0) {
    print(`Resumed ${cyan(String(recovered))} live orchestration instance(s)`);
  }
  if (failed > 0) {
    print(formatWarning(`${failed} orchestration instance(s) could not be resumed, see the log`));
  }

  const server = await startServer({
    runtime,
    port,
    host,
    corsOrigins,
    waitTimeoutMs: config.waitTimeoutMs,
    ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
  });

  const shutdown = (): void => {
    print('');
    print('Shutting down server...');
    stopServer(server)
      .then(() => {
        runtime.close();
        print('Server stopped');
        process.exit(0);
      })
      .catch((err: unknown) => {
        printError(formatError(err instanceof Error ? err.message : String(err)));
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}  /health`);
  print(`  ${cyan('POST')} /api/v1/agents/:agentName/sessions/:sessionId/run`);
  print(`  ${cyan('GET')}  /api/v1/agents/:agentName/sessions/:sessionId`);
  print(`  ${cyan('POST')} /api/v1/orchestrations/:name`);
  print(`  ${cyan('GET')}  /api/v1/orchestrations`);
  print(`  ${cyan('GET')}  /api/v1/orchestrations/:instanceId`);
  print(`  ${cyan('GET')}  /api/v1/orchestrations/:instanceId/history`);
  print(`  ${cyan('POST')} /api/v1/orchestrations/:instanceId/events/:eventName`);
  print('');
  print('Press Ctrl+C to stop the server');
}
