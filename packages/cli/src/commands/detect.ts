// @alertline/cli - Detect command

import { Command } from 'commander';
import { detectRuntimeContext } from '@alertline/notifier';

interface DetectOptions {
  event?: string;
  context?: string;
  app?: string;
  env?: string;
  workflow?: string;
}

/**
 * Parse a JSON option, exiting with a message naming the flag on bad input
 */
export function parseJsonOption(flag: string, raw: string | undefined): unknown {
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Invalid JSON for ${flag}: ${reason}`);
    process.exit(1);
  }
}

export function createDetectCommand(): Command {
  return new Command('detect')
    .description('Show the runtime context detected for an invocation')
    .option('--event <json>', 'Triggering event as JSON')
    .option('--context <json>', 'Execution context as JSON')
    .option('--app <name>', 'App label')
    .option('--env <name>', 'Environment label')
    .option('--workflow <name>', 'Workflow label')
    .action((options: DetectOptions) => {
      const event = parseJsonOption('--event', options.event);
      const context = parseJsonOption('--context', options.context);

      const detected = detectRuntimeContext(
        { event, context },
        { app: options.app, env: options.env, workflow: options.workflow }
      );
      console.log(JSON.stringify(detected, null, 2));
    });
}
