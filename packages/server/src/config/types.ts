/**
 * Server Configuration Types
 *
 * Type definitions for YAML-based server configuration.
 */

import type { LogLevel } from '@logic-net/neural';

export const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];
export const VALID_LOG_FORMATS = ['json', 'text'] as const;

export type LogFormat = (typeof VALID_LOG_FORMATS)[number];

export interface ServerConfig {
  server: {
    port: number;
    host: string;
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  training: {
    /** Largest epoch count a single train request may ask for */
    maxEpochs: number;
    /** Used when a train request omits learning_rate */
    defaultLearningRate: number;
    /** Epochs between streamed progress events */
    progressInterval: number;
  };
  cors: {
    enabled: boolean;
  };
}

export const DEFAULT_CONFIG: ServerConfig = {
  server: { port: 3000, host: '127.0.0.1' },
  logging: { level: 'info', format: 'text' },
  training: { maxEpochs: 100000, defaultLearningRate: 0.5, progressInterval: 100 },
  cors: { enabled: true },
};

/**
 * Overrides accepted from the command line, keyed by flag name
 */
export interface CliOverrides {
  config?: string;
  port?: number;
  host?: string;
  'log-level'?: string;
}
