// @alertline/cli - Send command

import { Command } from 'commander';
import {
  detectAndSetContext,
  getConfig,
  init,
  notify,
  parseLevel,
  reset,
  runIsolated,
  type DestinationResult,
} from '@alertline/notifier';

export const DEFAULT_TEST_MESSAGE = 'Alertline test notification';

interface SendOptions {
  level: string;
  message: string;
  workflow?: string;
}

export function formatResult(result: DestinationResult): string {
  if (result.skipped) {
    return `  ${result.destinationName}: skipped (${result.error ?? 'not configured'})`;
  }
  const attempts = `${result.attempts} attempt${result.attempts === 1 ? '' : 's'}`;
  if (result.success) {
    return `  ${result.destinationName}: sent (${attempts})`;
  }
  return `  ${result.destinationName}: failed after ${attempts}: ${result.error ?? 'unknown error'}`;
}

export function createSendCommand(): Command {
  return new Command('send')
    .description('Send a test notification through the configured destinations')
    .option('-l, --level <level>', 'Event level', 'error')
    .option('-m, --message <text>', 'Event message', DEFAULT_TEST_MESSAGE)
    .option('-w, --workflow <name>', 'Workflow label')
    .action(async (options: SendOptions) => {
      const level = parseLevel(options.level);
      if (!level) {
        console.error(`Invalid level: ${options.level}`);
        console.error('Valid levels: debug, info, warning, error, critical');
        process.exit(1);
      }

      init();
      const config = getConfig();

      const results = await runIsolated(async () => {
        const token = detectAndSetContext({}, {
          app: config.app,
          env: config.env,
          workflow: options.workflow,
        });
        try {
          return await notify({ level, message: options.message, loggerName: `${config.app}.cli` });
        } finally {
          reset(token);
        }
      });

      if (results.length === 0) {
        console.log(`Nothing sent: ${level} is below the minimum level (${config.minLevel})`);
        return;
      }

      console.log('Delivery results:');
      for (const result of results) {
        console.log(formatResult(result));
      }

      if (results.some((result) => !result.success && !result.skipped)) {
        process.exit(1);
      }
    });
}
