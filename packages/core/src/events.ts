/**
 * Event model for Alertline notifications
 *
 * A LogEvent is one candidate notification. It is frozen on construction and
 * carries a snapshot of the runtime context that was active when it was
 * emitted.
 */

import { format } from "node:util";
import { freezeContext, type RuntimeContext } from "./context.js";
import type { Level } from "./levels.js";

// ============================================================================
// Types
// ============================================================================

export interface ExceptionInfo {
  /** Error class name (e.g. "TypeError") */
  readonly type: string;
  readonly message: string;
  /** Formatted stack trace, including the cause chain */
  readonly stack: string;
}

export interface LogEvent {
  readonly level: Level;
  /** Message with arguments interpolated */
  readonly message: string;
  /** Message as written by the caller, before interpolation */
  readonly messageTemplate: string;
  /** Unix timestamp (ms) */
  readonly timestamp: number;
  readonly loggerName: string;
  readonly exceptionInfo?: ExceptionInfo;
  readonly extra: Readonly<Record<string, unknown>>;
  readonly contextSnapshot?: RuntimeContext;
}

export interface LogEventInit {
  level: Level;
  message: string;
  args?: readonly unknown[];
  loggerName: string;
  timestamp?: number;
  exc?: unknown;
  /** Takes precedence over `exc`; lets callers describe a thrown `undefined` */
  exceptionInfo?: ExceptionInfo;
  extra?: Record<string, unknown>;
  context?: RuntimeContext;
}

// ============================================================================
// Exceptions
// ============================================================================

function errorTypeName(error: Error): string {
  const ctorName = error.constructor?.name;
  if (error.name && error.name !== "Error") return error.name;
  return ctorName || error.name || "Error";
}

/**
 * Render an error's stack, following `cause` links
 */
export function formatStack(error: Error, depth = 0): string {
  const own = error.stack ?? `${errorTypeName(error)}: ${error.message}`;
  if (depth >= 5 || error.cause === undefined) return own;

  const cause = error.cause;
  const causeText =
    cause instanceof Error ? formatStack(cause, depth + 1) : String(cause);
  return `${own}\nCaused by: ${causeText}`;
}

/**
 * Describe any thrown value. Non-Error throwables get their typeof as the
 * type name.
 */
export function exceptionInfoFrom(thrown: unknown): ExceptionInfo {
  if (thrown instanceof Error) {
    return Object.freeze({
      type: errorTypeName(thrown),
      message: thrown.message,
      stack: formatStack(thrown),
    });
  }
  const message = typeof thrown === "string" ? thrown : format("%o", thrown);
  return Object.freeze({
    type: thrown === null ? "null" : typeof thrown,
    message,
    stack: message,
  });
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Interpolate printf-style placeholders (`%s`, `%d`, `%j`, `%o`)
 */
export function interpolate(template: string, args: readonly unknown[] = []): string {
  if (args.length === 0) return template;
  return format(template, ...args);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Frozen copy of plain objects and arrays, so later mutation by the caller
 * does not reach the event. Other objects (errors, class instances) are kept
 * by reference.
 */
function snapshot(value: unknown, ancestors: Set<object>): unknown {
  if (value === null || typeof value !== "object") return value;
  if (ancestors.has(value)) return value;
  if (!Array.isArray(value) && !isPlainObject(value)) return value;

  ancestors.add(value);
  const copy = Array.isArray(value)
    ? value.map((item: unknown) => snapshot(item, ancestors))
    : snapshotRecord(Object.entries(value), ancestors);
  ancestors.delete(value);
  return Object.freeze(copy);
}

function snapshotRecord(
  entries: Array<[string, unknown]>,
  ancestors: Set<object>
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of entries) {
    out[key] = snapshot(item, ancestors);
  }
  return out;
}

export function createLogEvent(init: LogEventInit): LogEvent {
  const event: LogEvent = {
    level: init.level,
    message: interpolate(init.message, init.args),
    messageTemplate: init.message,
    timestamp: init.timestamp ?? Date.now(),
    loggerName: init.loggerName,
    exceptionInfo:
      init.exceptionInfo ?? (init.exc === undefined ? undefined : exceptionInfoFrom(init.exc)),
    extra: Object.freeze(snapshotRecord(Object.entries(init.extra ?? {}), new Set())),
    contextSnapshot: init.context ? freezeContext(init.context) : undefined,
  };
  return Object.freeze(event);
}
