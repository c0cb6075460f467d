/**
 * Notification system
 *
 * Level filtering, deduplication and parallel delivery of LogEvents to
 * Slack and email.
 */

// Types
export type { Destination, DestinationResult, DispatcherOptions } from "./types.js";

// Dispatcher
export {
  NotificationDispatcher,
  getGlobalDispatcher,
  resetGlobalDispatcher,
  createDispatcher,
  type DispatcherSettings,
} from "./dispatcher.js";

// Delivery
export {
  DEFAULT_RETRY_POLICY,
  deliverWithRetry,
  resolveRetryPolicy,
  type RetryPolicy,
} from "./retry.js";
export { buildEventView, type EventView } from "./format.js";

// Adapters
export * from "./adapters/index.js";
