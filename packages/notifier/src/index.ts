/**
 * @alertline/notifier
 *
 * Failure capture and level-filtered notifications to Slack and email.
 */

export { init, isInitialized, getLogger, notify, buildDestinations, resetState } from "./api.js";
export type { InitOptions, NotifyOptions } from "./api.js";
export { capture, envelopeFromArgs, DEFAULT_SUMMARY, type CaptureOptions } from "./capture.js";
export { SignalLogger, type EmitOptions } from "./signal-logger.js";

export {
  getConfig,
  setConfig,
  resetConfig,
  parseConfig,
  loadConfig,
  loadConfigWithNotices,
  parseConfigWithNotices,
  type ParsedConfig,
  configFromEnv,
  ENV_KEYS,
  type Config,
  type ConfigInput,
  type SlackFormat,
} from "./config.js";

export {
  ConfigurationError,
  ContextDetectionFailure,
  PermanentDeliveryError,
  TransientDeliveryError,
} from "./lib/errors.js";
export { initLogger, createChildLogger } from "./lib/logger.js";
export { redact, redactString, REDACTED } from "./lib/redact.js";
export * from "./lib/notification/index.js";

// Manual context API
export {
  detectAndSetContext,
  detectRuntimeContext,
  setContext,
  reset,
  current,
  runIsolated,
  Levels,
  parseLevel,
  type Level,
  type LogEvent,
  type RuntimeContext,
  type ContextToken,
} from "@alertline/core";
