/**
 * Notification dispatcher
 *
 * Intercepts LogEvents: drops anything below the minimum level, suppresses
 * repeats inside the dedup window, and fans the rest out to every
 * destination in parallel. `handle` never rejects.
 */

import {
  DEFAULT_DEDUP_WINDOW_SECONDS,
  DedupCache,
  computeFingerprint,
  isAtLeast,
  type Level,
  type LogEvent,
} from "@alertline/core";
import { createChildLogger, toPinoLevel } from "../logger.js";
import type { Destination, DestinationResult, DispatcherOptions } from "./types.js";

// ============================================================================
// Dispatcher
// ============================================================================

export interface DispatcherSettings {
  minLevel: Level;
  dedupWindowSeconds: number;
  emitLocalCopy: boolean;
  /** Destination names, in fan-out order */
  destinations: string[];
}

export class NotificationDispatcher {
  private minLevel: Level = "error";
  private destinations: Destination[] = [];
  private emitLocalCopy = true;
  private readonly dedup = new DedupCache({ windowSeconds: DEFAULT_DEDUP_WINDOW_SECONDS });
  private readonly inFlight = new Set<Promise<DestinationResult[]>>();

  constructor(options: DispatcherOptions = {}) {
    this.configure(options);
  }

  /**
   * Apply settings. Omitted options keep their current value, so this can be
   * called again at any time.
   */
  configure(options: DispatcherOptions): void {
    if (options.minLevel !== undefined) this.minLevel = options.minLevel;
    if (options.destinations !== undefined) this.destinations = [...options.destinations];
    if (options.emitLocalCopy !== undefined) this.emitLocalCopy = options.emitLocalCopy;
    if (options.dedupWindowSeconds !== undefined) this.dedup.setWindow(options.dedupWindowSeconds);
  }

  get settings(): DispatcherSettings {
    return {
      minLevel: this.minLevel,
      dedupWindowSeconds: this.dedup.windowSeconds,
      emitLocalCopy: this.emitLocalCopy,
      destinations: this.destinations.map((d) => d.name),
    };
  }

  /**
   * Dispatch one event. Resolves with one result per destination that was
   * considered, or `[]` when the event was filtered or suppressed.
   */
  handle(event: LogEvent): Promise<DestinationResult[]> {
    if (!isAtLeast(event.level, this.minLevel)) {
      return Promise.resolve([]);
    }

    const pending = this.dispatch(event);
    this.inFlight.add(pending);
    void pending.finally(() => this.inFlight.delete(pending));
    return pending;
  }

  /**
   * Wait for every dispatch that is currently in flight
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /**
   * Forget every recorded fingerprint (for testing)
   */
  clearDedup(): void {
    this.dedup.clear();
  }

  private async dispatch(event: LogEvent): Promise<DestinationResult[]> {
    const log = createChildLogger("alertline.dispatcher");
    let results: DestinationResult[] = [];

    try {
      const fingerprint = computeFingerprint(event);
      const suppressed = !this.dedup.shouldSend(fingerprint);

      if (suppressed) {
        log.debug({ fingerprint, level: event.level }, "Duplicate event suppressed");
      } else {
        results = await this.fanOut(event);
      }
      if (this.emitLocalCopy) {
        this.writeLocalCopy(event, suppressed);
      }
    } catch (err) {
      log.error({ err }, "Event dispatch failed");
    }
    return results;
  }

  private async fanOut(event: LogEvent): Promise<DestinationResult[]> {
    const log = createChildLogger("alertline.dispatcher");

    const settled = await Promise.allSettled(
      this.destinations.map(async (destination): Promise<DestinationResult> => {
        if (!destination.isConfigured()) {
          return { destinationName: destination.name, success: false, skipped: true, attempts: 0 };
        }
        return destination.send(event);
      })
    );

    const results = settled.map((outcome, index): DestinationResult => {
      if (outcome.status === "fulfilled") return outcome.value;
      const reason: unknown = outcome.reason;
      return {
        destinationName: this.destinations[index]?.name ?? `destination-${index}`,
        success: false,
        error: reason instanceof Error ? reason.message : String(reason),
        attempts: 1,
      };
    });

    for (const result of results) {
      if (result.skipped) {
        log.debug({ destination: result.destinationName }, "Destination not configured, skipped");
      } else if (result.success) {
        log.debug({ destination: result.destinationName, attempts: result.attempts }, "Notification sent");
      } else {
        log.warn(
          { destination: result.destinationName, attempts: result.attempts, error: result.error },
          "Notification failed"
        );
      }
    }
    return results;
  }

  private writeLocalCopy(event: LogEvent, suppressed: boolean): void {
    const log = createChildLogger(event.loggerName);
    log[toPinoLevel(event.level)](
      {
        alertline: {
          level: event.level,
          loggerName: event.loggerName,
          timestamp: new Date(event.timestamp).toISOString(),
          exception: event.exceptionInfo,
          extra: event.extra,
          context: event.contextSnapshot,
          suppressed,
        },
      },
      event.message
    );
  }
}

// ============================================================================
// Process-wide instance
// ============================================================================

let globalDispatcher: NotificationDispatcher | null = null;

/**
 * Get the global dispatcher instance
 */
export function getGlobalDispatcher(): NotificationDispatcher {
  if (!globalDispatcher) {
    globalDispatcher = new NotificationDispatcher();
  }
  return globalDispatcher;
}

/**
 * Reset the global dispatcher (for testing)
 */
export function resetGlobalDispatcher(): void {
  globalDispatcher = null;
}

/**
 * Create a dispatcher with custom options
 */
export function createDispatcher(options: DispatcherOptions = {}): NotificationDispatcher {
  return new NotificationDispatcher(options);
}
