/**
 * Capture boundary
 *
 * `capture(fn)` wraps an invocation entry point: it sets up a runtime context
 * for the duration of the call, reports an uncaught error as a critical
 * event, then re-throws it untouched.
 */

import {
  Levels,
  createLogEvent,
  current,
  detectAndSetContext,
  exceptionInfoFrom,
  reset,
  runIsolated,
  type InvocationEnvelope,
} from "@alertline/core";
import { getConfig, type Config } from "./config.js";
import { getFallbackLogger, getLogger } from "./lib/logger.js";
import type { NotificationDispatcher } from "./lib/notification/dispatcher.js";
import { init } from "./api.js";

export const DEFAULT_SUMMARY = "Automation failed";

export interface CaptureOptions<A extends unknown[]> {
  /** Workflow label for the runtime context */
  workflow?: string;
  /** Message of the failure event */
  summary?: string;
  /** Defaults to the wrapped function's name */
  action?: string;
  /** Extra fields for the failure event, derived from the call arguments */
  extra?: (...args: A) => Record<string, unknown>;
  /** Defaults to the global dispatcher, initialized from the environment */
  dispatcher?: NotificationDispatcher;
}

/**
 * The last argument is the execution context; with two or more, the first is
 * the triggering event.
 */
export function envelopeFromArgs(args: readonly unknown[]): InvocationEnvelope {
  if (args.length === 0) return {};
  if (args.length === 1) return { context: args[0] };
  return { event: args[0], context: args[args.length - 1] };
}

function extraFromArgs<A extends unknown[]>(options: CaptureOptions<A>, args: A): Record<string, unknown> {
  if (!options.extra) return {};
  try {
    return options.extra(...args);
  } catch (err) {
    getLogger().warn({ err }, "Capture extra callback failed; reporting without it");
    return {};
  }
}

interface CaptureSetup {
  dispatcher: NotificationDispatcher;
  config: Config;
}

/**
 * Resolve the dispatcher and config for one call. A failed setup is logged
 * and the call runs without notifications.
 */
function prepare<A extends unknown[]>(options: CaptureOptions<A>): CaptureSetup | undefined {
  try {
    const dispatcher = options.dispatcher ?? init();
    return { dispatcher, config: getConfig() };
  } catch (err) {
    getFallbackLogger().error({ err }, "Alertline setup failed; running without notifications");
    return undefined;
  }
}

/**
 * Wrap `fn` so every call runs inside its own runtime context and uncaught
 * errors are dispatched before they propagate. The wrapper is always async.
 */
export function capture<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: CaptureOptions<A> = {}
): (...args: A) => Promise<Awaited<R>> {
  const action = options.action ?? (fn.name || "anonymous");

  return (...args: A) =>
    runIsolated(async (): Promise<Awaited<R>> => {
      const setup = prepare(options);
      const token = detectAndSetContext(envelopeFromArgs(args), {
        app: setup?.config.app,
        env: setup?.config.env,
        workflow: options.workflow,
      });

      try {
        const result = await fn(...args);
        await setup?.dispatcher.flush();
        return result;
      } catch (error) {
        if (setup) {
          const event = createLogEvent({
            level: Levels.CRITICAL,
            message: options.summary ?? DEFAULT_SUMMARY,
            loggerName: `${setup.config.app}.capture`,
            exceptionInfo: exceptionInfoFrom(error),
            extra: { ...extraFromArgs(options, args), action },
            context: current(),
          });
          await setup.dispatcher.handle(event);
          await setup.dispatcher.flush();
        }
        throw error;
      } finally {
        reset(token);
      }
    });
}
