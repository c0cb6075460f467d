/**
 * @alertline/core
 *
 * Event model, runtime-context propagation and deduplication shared by the
 * notifier and the CLI.
 */

export * from "./levels.js";
export * from "./context.js";
export * from "./detect.js";
export * from "./events.js";
export * from "./dedup.js";
export * from "./errors.js";
