/**
 * Notification system types
 */

import type { Level, LogEvent } from "@alertline/core";

/**
 * Result of a notification delivery attempt
 */
export interface DestinationResult {
  /** Name of the destination that was notified */
  destinationName: string;
  /** Whether delivery was successful */
  success: boolean;
  /** Error detail if delivery failed */
  error?: string;
  /** Number of attempts made (0 when skipped) */
  attempts: number;
  /** True when the destination was disabled and not attempted */
  skipped?: boolean;
}

/**
 * Destination interface
 *
 * Each notification sink (Slack, email, ...) implements this interface.
 * `send` never rejects; failures come back as an unsuccessful result.
 */
export interface Destination {
  /** Destination name used in results and logs */
  readonly name: string;

  /**
   * Send a notification for an event
   */
  send(event: LogEvent): Promise<DestinationResult>;

  /**
   * Check if the destination has everything it needs to send
   */
  isConfigured(): boolean;
}

/**
 * Dispatcher (event interceptor) settings
 */
export interface DispatcherOptions {
  /** Lowest level that is dispatched (default: error) */
  minLevel?: Level;
  /** Destinations to fan out to */
  destinations?: Destination[];
  /** Suppression window for repeated fingerprints; 0 disables (default: 30) */
  dedupWindowSeconds?: number;
  /** Write a local structured copy of each dispatched event (default: true) */
  emitLocalCopy?: boolean;
}
