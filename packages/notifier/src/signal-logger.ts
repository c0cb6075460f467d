/**
 * Named loggers that also raise notifications
 *
 * Each call writes a line through pino at its own level and hands a LogEvent
 * to the dispatcher, which decides whether it goes anywhere else.
 */

import { createLogEvent, current, Levels, type Level } from "@alertline/core";
import { createChildLogger, toPinoLevel } from "./lib/logger.js";
import { getGlobalDispatcher, type NotificationDispatcher } from "./lib/notification/dispatcher.js";
import type { DestinationResult } from "./lib/notification/types.js";

/**
 * Optional trailing argument of every log call
 */
export interface EmitOptions {
  /** Error (or any thrown value) to attach */
  exc?: unknown;
  extra?: Record<string, unknown>;
}

const EMIT_OPTION_KEYS: ReadonlySet<string> = new Set(["exc", "extra"]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * A trailing plain object whose keys are only `exc` and/or `extra` is taken as
 * EmitOptions rather than a format argument.
 */
export function splitEmitArgs(args: readonly unknown[]): { args: unknown[]; options: EmitOptions } {
  const last = args[args.length - 1];
  if (!isPlainObject(last)) return { args: [...args], options: {} };

  const keys = Object.keys(last);
  if (keys.length === 0 || !keys.every((key) => EMIT_OPTION_KEYS.has(key))) {
    return { args: [...args], options: {} };
  }

  const extra = last.extra;
  return {
    args: args.slice(0, -1),
    options: { exc: last.exc, extra: isPlainObject(extra) ? extra : undefined },
  };
}

export type DispatcherSource = () => NotificationDispatcher;

export class SignalLogger {
  constructor(
    readonly name: string,
    private readonly dispatcher: DispatcherSource = getGlobalDispatcher
  ) {}

  debug(message: string, ...args: unknown[]): Promise<DestinationResult[]> {
    return this.log(Levels.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): Promise<DestinationResult[]> {
    return this.log(Levels.INFO, message, ...args);
  }

  warning(message: string, ...args: unknown[]): Promise<DestinationResult[]> {
    return this.log(Levels.WARNING, message, ...args);
  }

  error(message: string, ...args: unknown[]): Promise<DestinationResult[]> {
    return this.log(Levels.ERROR, message, ...args);
  }

  critical(message: string, ...args: unknown[]): Promise<DestinationResult[]> {
    return this.log(Levels.CRITICAL, message, ...args);
  }

  /**
   * Log at an explicit level. Resolves once dispatch has finished; never
   * rejects.
   */
  log(level: Level, message: string, ...rest: unknown[]): Promise<DestinationResult[]> {
    const { args, options } = splitEmitArgs(rest);
    const event = createLogEvent({
      level,
      message,
      args,
      loggerName: this.name,
      exc: options.exc,
      extra: options.extra,
      context: current(),
    });

    const bindings: Record<string, unknown> = { ...event.extra };
    if (options.exc !== undefined) bindings.err = options.exc;
    createChildLogger(this.name)[toPinoLevel(level)](bindings, event.message);

    return this.dispatcher().handle(event);
  }
}

const loggers = new Map<string, SignalLogger>();

/**
 * Get (or create) the signal logger for a name
 */
export function getSignalLogger(name: string): SignalLogger {
  let logger = loggers.get(name);
  if (!logger) {
    logger = new SignalLogger(name);
    loggers.set(name, logger);
  }
  return logger;
}

/**
 * Drop cached loggers (for testing)
 */
export function resetSignalLoggers(): void {
  loggers.clear();
}
