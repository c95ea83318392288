import { ConfigManager, type CliOverrides, type ServerConfig } from './config/index.js';
import { ModelStore } from './models/index.js';
import { RestServer } from './rest/server.js';
import { createServerLogger, type Logger } from './utils/logger.js';

export interface StartServerOptions {
  /** Flags from the command line; `config` names the YAML file */
  cliArgs?: CliOverrides;
  /** Install SIGINT/SIGTERM handlers that close the server */
  handleSignals?: boolean;
}

export interface RunningServer {
  server: RestServer;
  config: ServerConfig;
  logger: Logger;
  stop(): Promise<void>;
}

/**
 * logic-net Server
 *
 * Loads configuration, then starts the REST/SSE server on the configured
 * host and port.
 */
export async function startServer(options: StartServerOptions = {}): Promise<RunningServer> {
  const config = await new ConfigManager({ cliArgs: options.cliArgs }).load();
  const logger = createServerLogger(config.logging);

  logger.info('Starting logic-net server');
  logger.debug('Configuration', config);

  const server = new RestServer(new ModelStore(), logger, config);
  await server.start(config.server.port, config.server.host);

  logger.info(`  REST API: http://${config.server.host}:${config.server.port}/api`);
  logger.info(`  Health:   http://${config.server.host}:${config.server.port}/health`);

  let stopping: Promise<void> | undefined;
  const stop = (): Promise<void> => {
    stopping ??= server.stop();
    return stopping;
  };

  if (options.handleSignals) {
    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}, shutting down...`);
      stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        }
      );
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  }

  return { server, config, logger, stop };
}

// Export for programmatic use
export { RestServer } from './rest/server.js';
export { ApiError, toApiError } from './rest/errors.js';
export type { ApiErrorCode } from './rest/errors.js';
export { evalRequestSchema, trainRequestSchema } from './rest/schemas.js';
export type { EvalRequestBody, TrainRequestBody } from './rest/schemas.js';
export { ModelStore } from './models/index.js';
export type { NewModel, StoredModel } from './models/index.js';
export {
  ConfigManager,
  ConfigError,
  ConfigLoadError,
  ConfigValidationError,
  DEFAULT_CONFIG,
  VALID_LOG_FORMATS,
  VALID_LOG_LEVELS,
} from './config/index.js';
export type { CliOverrides, ConfigManagerOptions, LogFormat, ServerConfig } from './config/index.js';
export { Logger, createServerLogger } from './utils/logger.js';
