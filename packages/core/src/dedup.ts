/**
 * Time-windowed deduplication
 *
 * Remembers when each event fingerprint was last dispatched. Entries older
 * than the window count as absent; nothing sweeps them in the background.
 */

import { createHash } from "node:crypto";
import type { LogEvent } from "./events.js";

/**
 * Key identifying "the same kind of event". Interpolated argument values are
 * left out so repeats that differ only in dynamic values collapse.
 */
export function computeFingerprint(event: LogEvent): string {
  const source = [
    event.loggerName,
    event.level,
    event.messageTemplate,
    event.exceptionInfo ? "exc" : "noexc",
  ].join("\u0000");
  return createHash("sha1").update(source, "utf8").digest("hex");
}

export interface DedupCacheOptions {
  /** Suppression window in seconds; 0 disables deduplication */
  windowSeconds?: number;
  /** Prune expired entries once the cache holds more than this */
  maxEntries?: number;
  now?: () => number;
}

export const DEFAULT_DEDUP_WINDOW_SECONDS = 30;
const DEFAULT_MAX_ENTRIES = 1000;

export class DedupCache {
  private readonly entries = new Map<string, number>();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private windowMs: number;

  constructor(options: DedupCacheOptions = {}) {
    this.windowMs = Math.max(0, options.windowSeconds ?? DEFAULT_DEDUP_WINDOW_SECONDS) * 1000;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.now = options.now ?? (() => Date.now());
  }

  get enabled(): boolean {
    return this.windowMs > 0;
  }

  get windowSeconds(): number {
    return this.windowMs / 1000;
  }

  setWindow(windowSeconds: number): void {
    this.windowMs = Math.max(0, windowSeconds) * 1000;
  }

  /**
   * Check-and-record in one step. Returns false when the fingerprint was
   * sent within the window; otherwise stamps it with the current time and
   * returns true. Always true when the window is 0 (nothing is recorded).
   */
  shouldSend(fingerprint: string): boolean {
    if (!this.enabled) return true;

    const now = this.now();
    const last = this.entries.get(fingerprint);
    if (last !== undefined && now - last < this.windowMs) {
      return false;
    }

    this.entries.set(fingerprint, now);
    if (this.entries.size > this.maxEntries) {
      this.prune(now);
    }
    return true;
  }

  /**
   * Last dispatch time for a fingerprint, if still inside the window
   */
  lastSentAt(fingerprint: string): number | undefined {
    const last = this.entries.get(fingerprint);
    if (last === undefined || this.now() - last >= this.windowMs) return undefined;
    return last;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private prune(now: number): void {
    for (const [key, sentAt] of this.entries) {
      if (now - sentAt >= this.windowMs) {
        this.entries.delete(key);
      }
    }
  }
}
