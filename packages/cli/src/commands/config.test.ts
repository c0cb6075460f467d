// @alertline/cli - Config command tests

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { ENV_KEYS } from '@alertline/notifier';
import { createConfigCommand, displayValue } from './config.js';

describe('createConfigCommand', () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    for (const envName of Object.values(ENV_KEYS)) {
      vi.stubEnv(envName, '');
    }
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    consoleSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  describe('show subcommand', () => {
    it('should display resolved values', async () => {
      vi.stubEnv('ALERTLINE_APP', 'billing');
      vi.stubEnv('ALERTLINE_SES_TO', 'ops@example.com, oncall@example.com');

      const cmd = createConfigCommand();
      await cmd.parseAsync(['node', 'test', 'show']);

      expect(consoleSpy).toHaveBeenCalledWith('  app: billing');
      expect(consoleSpy).toHaveBeenCalledWith('  env: dev');
      expect(consoleSpy).toHaveBeenCalledWith('  minLevel: error');
      expect(consoleSpy).toHaveBeenCalledWith('  dedupWindowSeconds: 30');
      expect(consoleSpy).toHaveBeenCalledWith('  sesTo: ops@example.com,oncall@example.com');
      expect(consoleSpy).toHaveBeenCalledWith('  slackWebhookUrl: ');
    });

    it('should mask the Slack webhook URL', async () => {
      vi.stubEnv('ALERTLINE_SLACK_WEBHOOK_URL', 'https://hooks.example.com/services/test-secret');

      const cmd = createConfigCommand();
      await cmd.parseAsync(['node', 'test', 'show']);

      expect(consoleSpy).toHaveBeenCalledWith('  slackWebhookUrl: ***');
    });

    it('should output JSON with --json flag', async () => {
      vi.stubEnv('ALERTLINE_ENV', 'prod');
      vi.stubEnv('ALERTLINE_SLACK_WEBHOOK_URL', 'https://hooks.example.com/services/test-secret');

      const cmd = createConfigCommand();
      await cmd.parseAsync(['node', 'test', 'show', '--json']);

      expect(consoleSpy).toHaveBeenCalledTimes(1);
      const output: unknown = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
      expect(output).toMatchObject({
        app: 'app',
        env: 'prod',
        slackWebhookUrl: '***',
        slackFormat: 'blocks',
        sesTo: [],
      });
    });

    it('should exit on invalid configuration', async () => {
      vi.stubEnv('ALERTLINE_MIN_LEVEL', 'loud');

      const cmd = createConfigCommand();
      await expect(cmd.parseAsync(['node', 'test', 'show'])).rejects.toThrow('process.exit(1)');

      expect(consoleErrorSpy).toHaveBeenCalledWith('Invalid configuration: minLevel: Unknown level "loud"');
    });
  });

  describe('get subcommand', () => {
    it('should print a single value', async () => {
      vi.stubEnv('ALERTLINE_DEDUP_WINDOW_S', '120');

      const cmd = createConfigCommand();
      await cmd.parseAsync(['node', 'test', 'get', 'dedupWindowSeconds']);

      expect(consoleSpy).toHaveBeenCalledWith('120');
    });

    it('should reject unknown keys', async () => {
      const cmd = createConfigCommand();
      await expect(cmd.parseAsync(['node', 'test', 'get', 'apiKey'])).rejects.toThrow('process.exit(1)');

      expect(consoleErrorSpy).toHaveBeenCalledWith('Invalid key: apiKey');
    });
  });

  describe('env subcommand', () => {
    it('should list the backing environment variables', async () => {
      const cmd = createConfigCommand();
      await cmd.parseAsync(['node', 'test', 'env']);

      expect(consoleSpy).toHaveBeenCalledWith('  ALERTLINE_MIN_LEVEL -> minLevel');
      expect(consoleSpy).toHaveBeenCalledWith('  LOG_FORMAT -> logFormat');
    });
  });
});

describe('displayValue', () => {
  it('should render empty for unset values', () => {
    expect(displayValue('sesFrom', undefined)).toBe('');
  });

  it('should join lists', () => {
    expect(displayValue('sesReplyTo', ['a@example.com', 'b@example.com'])).toBe('a@example.com,b@example.com');
  });
});
