/**
 * Public entry points: init, getLogger, notify
 */

import type pino from "pino";
import { createLogEvent, current, resetContextStack, type Level } from "@alertline/core";
import { getConfig, loadConfigWithNotices, resetConfig, setConfig, type Config, type ConfigInput } from "./config.js";
import { initLogger, resetLogger } from "./lib/logger.js";
import { SesEmailDestination } from "./lib/notification/adapters/email.js";
import { SlackWebhookDestination, isValidWebhookUrl } from "./lib/notification/adapters/slack.js";
import {
  getGlobalDispatcher,
  resetGlobalDispatcher,
  type NotificationDispatcher,
} from "./lib/notification/dispatcher.js";
import type { Destination, DestinationResult } from "./lib/notification/types.js";
import { getSignalLogger, resetSignalLoggers, type SignalLogger } from "./signal-logger.js";

export interface InitOptions {
  /** Explicit settings; each one wins over its environment variable */
  config?: ConfigInput;
  /** Re-initialize even if already initialized */
  reset?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Where pino writes (defaults to stdout) */
  logDestination?: pino.DestinationStream;
}

let initialized = false;

/**
 * Destinations described by a config. Both are always present; one without
 * settings is inert and reported as skipped.
 */
export function buildDestinations(config: Config): Destination[] {
  const defaults = { app: config.app, env: config.env };
  return [
    new SlackWebhookDestination({
      webhookUrl: config.slackWebhookUrl,
      format: config.slackFormat,
      username: config.slackUsername,
      defaults,
    }),
    new SesEmailDestination({
      from: config.sesFrom,
      to: config.sesTo,
      replyTo: config.sesReplyTo,
      region: config.sesRegion,
      defaults,
    }),
  ];
}

/**
 * Resolve configuration and set up the global dispatcher. Later calls are
 * no-ops (warm starts reuse the first setup) unless `reset` is set.
 */
export function init(options: InitOptions = {}): NotificationDispatcher {
  if (initialized && !options.reset) {
    return getGlobalDispatcher();
  }

  const { config, notices } = loadConfigWithNotices(options.config, options.env);
  setConfig(config);
  resetLogger();
  const logger = initLogger(options.logDestination);
  for (const notice of notices) {
    logger.warn(notice);
  }

  if (config.slackWebhookUrl && !isValidWebhookUrl(config.slackWebhookUrl)) {
    logger.warn("Slack webhook URL is not a valid https URL; Slack is disabled");
  }

  const dispatcher = getGlobalDispatcher();
  dispatcher.configure({
    minLevel: config.minLevel,
    dedupWindowSeconds: config.dedupWindowSeconds,
    emitLocalCopy: config.emitLocalLog,
    destinations: buildDestinations(config),
  });
  initialized = true;

  logger.debug({ destinations: dispatcher.settings.destinations, minLevel: config.minLevel }, "Alertline initialized");
  return dispatcher;
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Named logger whose calls also go through the dispatcher. Initializes from
 * the environment on first use.
 */
export function getLogger(name: string): SignalLogger {
  init();
  return getSignalLogger(name);
}

export interface NotifyOptions {
  level: Level;
  message: string;
  exc?: unknown;
  extra?: Record<string, unknown>;
  /** Defaults to "<app>.notify" */
  loggerName?: string;
}

/**
 * Send one event straight to the dispatcher, using the active runtime context
 */
export function notify(options: NotifyOptions): Promise<DestinationResult[]> {
  const dispatcher = init();
  const event = createLogEvent({
    level: options.level,
    message: options.message,
    loggerName: options.loggerName ?? `${getConfig().app}.notify`,
    exc: options.exc,
    extra: options.extra,
    context: current(),
  });
  return dispatcher.handle(event);
}

/**
 * Return every process-wide singleton to its initial state (for testing)
 */
export function resetState(): void {
  initialized = false;
  resetGlobalDispatcher();
  resetSignalLoggers();
  resetContextStack();
  resetLogger();
  resetConfig();
}
