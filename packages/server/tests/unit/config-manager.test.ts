/**
 * YAML Configuration Tests
 *
 * Covers file discovery, environment substitution, defaults, CLI overrides
 * and validation messages.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigLoadError,
  ConfigManager,
  ConfigValidationError,
  DEFAULT_CONFIG,
} from '../../src/config/index.js';

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'logic-net-config-'));
  });

  afterEach(async () => {
    delete process.env.LOGIC_NET_TEST_PORT;
    delete process.env.LOGIC_NET_TEST_HOST;
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: string, name = 'logic-net.yaml'): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  async function loadError(manager: ConfigManager): Promise<unknown> {
    return manager.load().then(
      () => undefined,
      (error: unknown) => error
    );
  }

  // ===========================================================================
  // Loading
  // ===========================================================================

  describe('config loading', () => {
    it('should fall back to defaults when no file is found', async () => {
      const manager = new ConfigManager({ searchPaths: [join(dir, 'absent.yaml')] });

      expect(await manager.load()).toEqual(DEFAULT_CONFIG);
    });

    it('should merge file values over defaults', async () => {
      const path = await writeConfig(`
server:
  port: 8080
logging:
  level: debug
training:
  progressInterval: 10
`);

      const config = await new ConfigManager({ configPath: path }).load();

      expect(config.server).toEqual({ port: 8080, host: '127.0.0.1' });
      expect(config.logging).toEqual({ level: 'debug', format: 'text' });
      expect(config.training).toEqual({ maxEpochs: 100000, defaultLearningRate: 0.5, progressInterval: 10 });
      expect(config.cors.enabled).toBe(true);
    });

    it('should use the first search path that exists', async () => {
      const second = await writeConfig('server:\n  port: 5000\n', 'second.yaml');

      const config = await new ConfigManager({
        searchPaths: [join(dir, 'first.yaml'), second],
      }).load();

      expect(config.server.port).toBe(5000);
    });

    it('should treat an empty file as no overrides', async () => {
      const path = await writeConfig('');

      expect(await new ConfigManager({ configPath: path }).load()).toEqual(DEFAULT_CONFIG);
    });

    it('should fail when an explicit path does not exist', async () => {
      const path = join(dir, 'missing.yaml');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toBeInstanceOf(ConfigLoadError);
      expect(error).toHaveProperty('message', `Config file not found: ${path}`);
      expect(error).toHaveProperty('path', path);
    });

    it('should reject invalid YAML', async () => {
      const path = await writeConfig('server: [8080, 9090\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toBeInstanceOf(ConfigLoadError);
      expect(error).toHaveProperty('message', 'Invalid YAML syntax');
    });
  });

  // ===========================================================================
  // Environment Variables
  // ===========================================================================

  describe('environment substitution', () => {
    it('should substitute variables and restore their types', async () => {
      process.env.LOGIC_NET_TEST_PORT = '9090';
      process.env.LOGIC_NET_TEST_HOST = '0.0.0.0';
      const path = await writeConfig(`
server:
  port: \${LOGIC_NET_TEST_PORT}
  host: \${LOGIC_NET_TEST_HOST}
`);

      const config = await new ConfigManager({ configPath: path }).load();

      expect(config.server).toEqual({ port: 9090, host: '0.0.0.0' });
    });

    it('should apply defaults for unset variables', async () => {
      const path = await writeConfig(`
server:
  port: \${LOGIC_NET_TEST_PORT:-4000}
cors:
  enabled: \${LOGIC_NET_TEST_CORS:-false}
`);

      const config = await new ConfigManager({ configPath: path }).load();

      expect(config.server.port).toBe(4000);
      expect(config.cors.enabled).toBe(false);
    });

    it('should honour an env prefix', async () => {
      process.env.LOGIC_NET_TEST_PORT = '7070';
      const path = await writeConfig('server:\n  port: ${TEST_PORT}\n');

      const config = await new ConfigManager({ configPath: path, envPrefix: 'LOGIC_NET_' }).load();

      expect(config.server.port).toBe(7070);
    });

    it('should fail on a required variable that is not set', async () => {
      const path = await writeConfig('server:\n  host: ${LOGIC_NET_TEST_HOST}\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toBeInstanceOf(ConfigLoadError);
      expect(error).toHaveProperty(
        'message',
        "Required environment variable 'LOGIC_NET_TEST_HOST' not set"
      );
    });
  });

  // ===========================================================================
  // CLI Overrides
  // ===========================================================================

  describe('CLI overrides', () => {
    it('should take precedence over the file', async () => {
      const path = await writeConfig('server:\n  port: 8080\n  host: example.internal\n');

      const config = await new ConfigManager({
        cliArgs: { config: path, port: 4000, 'log-level': 'warn' },
      }).load();

      expect(config.server).toEqual({ port: 4000, host: 'example.internal' });
      expect(config.logging.level).toBe('warn');
    });

    it('should reject an unknown log level', async () => {
      const manager = new ConfigManager({
        searchPaths: [],
        cliArgs: { 'log-level': 'loud' },
      });

      const error = await loadError(manager);

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toHaveProperty(
        'message',
        "Invalid log level 'loud'. Valid options: debug, info, warn, error, silent"
      );
    });
  });

  // ===========================================================================
  // Validation
  // ===========================================================================

  describe('validation', () => {
    it('should reject unknown keys', async () => {
      const path = await writeConfig('server:\n  port: 8080\n  tls: true\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toHaveProperty('message', "Unknown configuration key: 'server.tls'");
      expect(error).toHaveProperty('field', 'server.tls');
    });

    it('should list valid options for an enum field', async () => {
      const path = await writeConfig('logging:\n  level: verbose\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toHaveProperty(
        'message',
        "Invalid value 'verbose' for logging.level. Valid options: debug, info, warn, error, silent"
      );
    });

    it('should report a wrongly typed value', async () => {
      const path = await writeConfig('server:\n  port: eighty\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toHaveProperty('message', "Invalid value for server.port: expected number, got 'eighty'");
    });

    it('should reject a port out of range', async () => {
      const path = await writeConfig('server:\n  port: 70000\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toHaveProperty('message', 'Port out of range (1-65535): 70000');
    });

    it('should reject a non-positive epoch limit', async () => {
      const path = await writeConfig('training:\n  maxEpochs: 0\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toHaveProperty('field', 'training.maxEpochs');
    });

    it('should reject a non-positive learning rate', async () => {
      const path = await writeConfig('training:\n  defaultLearningRate: 0\n');

      const error = await loadError(new ConfigManager({ configPath: path }));

      expect(error).toHaveProperty('field', 'training.defaultLearningRate');
    });
  });
});
