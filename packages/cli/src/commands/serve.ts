import type { Command } from 'commander';
import chalk from 'chalk';
import { startServer, type CliOverrides } from '@logic-net/server';
import { errorMessage, parsePositiveInteger, printError } from '../utils/output.js';

export interface ServeOptions {
  config?: string;
  port?: number;
  host?: string;
  logLevel?: string;
}

/**
 * Start the HTTP server; it keeps running until SIGINT or SIGTERM
 */
export async function serveAction(options: ServeOptions): Promise<number> {
  const cliArgs: CliOverrides = {
    config: options.config,
    port: options.port,
    host: options.host,
    'log-level': options.logLevel,
  };

  try {
    const { config } = await startServer({ cliArgs, handleSignals: true });
    console.log(chalk.green(`logic-net server listening on http://${config.server.host}:${config.server.port}`));
    return 0;
  } catch (error) {
    printError(`Failed to start server: ${errorMessage(error)}`);
    return 1;
  }
}

export function serveCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP/SSE training server')
    .helpOption('--help', 'Display help for command')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('-p, --port <port>', 'Server port', parsePositiveInteger)
    .option('-h, --host <host>', 'Server host')
    .option('--log-level <level>', 'Log level (debug, info, warn, error, silent)')
    .action(async (options: ServeOptions) => {
      process.exitCode = await serveAction(options);
    });
}
