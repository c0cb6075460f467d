// @alertline/cli - Config command

import { Command } from 'commander';
import { ConfigurationError, ENV_KEYS, loadConfig, type Config } from '@alertline/notifier';

const SECRET_KEYS: ReadonlySet<keyof Config> = new Set(['slackWebhookUrl']);

function isConfigKey(key: string): key is keyof Config {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, key);
}

export function displayValue(key: keyof Config, value: Config[keyof Config]): string {
  if (value === undefined) return '';
  if (SECRET_KEYS.has(key)) return '***';
  return Array.isArray(value) ? value.join(',') : String(value);
}

/**
 * Resolve configuration from the environment, exiting on invalid settings
 */
function resolveConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Inspect the configuration resolved from the environment');

  config
    .command('show')
    .description('Show the resolved configuration')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const resolved = resolveConfig();
      const masked: Record<string, string | number | boolean | string[] | undefined> = { ...resolved };
      for (const key of SECRET_KEYS) {
        if (resolved[key] !== undefined) masked[key] = '***';
      }

      if (options.json) {
        console.log(JSON.stringify(masked, null, 2));
        return;
      }
      for (const key of Object.keys(ENV_KEYS)) {
        if (isConfigKey(key)) {
          console.log(`  ${key}: ${displayValue(key, resolved[key])}`);
        }
      }
    });

  config
    .command('get <key>')
    .description('Get a single resolved value')
    .action((key: string) => {
      const resolved = resolveConfig();
      if (!isConfigKey(key)) {
        console.error(`Invalid key: ${key}`);
        console.error(`Valid keys: ${Object.keys(ENV_KEYS).join(', ')}`);
        process.exit(1);
      }
      console.log(displayValue(key, resolved[key]));
    });

  config
    .command('env')
    .description('List the environment variable behind each setting')
    .action(() => {
      for (const [key, envName] of Object.entries(ENV_KEYS)) {
        console.log(`  ${envName} -> ${key}`);
      }
    });

  return config;
}
