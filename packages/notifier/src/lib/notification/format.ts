/**
 * Destination-neutral view of a LogEvent
 *
 * Both destinations render from the same redacted view, so nothing
 * sensitive reaches a formatter.
 */

import type { Level, LogEvent } from "@alertline/core";
import { linksFromCaller, type EventLinks } from "../aws-links.js";
import { redactRecord, redactString } from "../redact.js";

export interface EventView {
  level: Level;
  /** Upper-case level name (e.g. "CRITICAL") */
  levelLabel: string;
  message: string;
  loggerName: string;
  /** ISO-8601 */
  timestamp: string;
  app: string;
  env: string;
  workflow?: string;
  /** `extra.action` when the emitter set one (the capture boundary always does) */
  action?: string;
  invocationId?: string;
  caller: Readonly<Record<string, string>>;
  links: EventLinks;
  /** "Type: message" followed by the stack */
  exception?: string;
  details: Record<string, unknown>;
}

export interface ViewDefaults {
  app: string;
  env: string;
}

/**
 * Caller fields shown as labelled fields, in display order
 */
export const CALLER_FIELDS: ReadonlyArray<readonly [key: string, label: string]> = [
  ["functionName", "Function"],
  ["requestId", "Request ID"],
  ["accountName", "Account"],
  ["accountId", "Account ID"],
  ["region", "Region"],
  ["taskArn", "Task"],
  ["clusterArn", "Cluster"],
];

function exceptionText(event: LogEvent): string | undefined {
  const info = event.exceptionInfo;
  if (!info) return undefined;
  const headline = `${info.type}: ${info.message}`;
  const body = info.stack.startsWith(headline) ? info.stack : `${headline}\n${info.stack}`;
  return redactString(body, 12_000);
}

export function buildEventView(event: LogEvent, defaults: ViewDefaults): EventView {
  const context = event.contextSnapshot;
  const details = redactRecord(event.extra);
  const action = typeof details.action === "string" ? details.action : undefined;
  delete details.action;

  return {
    level: event.level,
    levelLabel: event.level.toUpperCase(),
    message: redactString(event.message),
    loggerName: event.loggerName,
    timestamp: new Date(event.timestamp).toISOString(),
    app: context?.app ?? defaults.app,
    env: context?.env ?? defaults.env,
    workflow: context?.workflow,
    action,
    invocationId: context?.invocationId,
    caller: context?.caller ?? {},
    links: linksFromCaller(context?.caller),
    exception: exceptionText(event),
    details,
  };
}

/**
 * Keep the last `maxLen` characters, marking the cut
 */
export function tail(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return "…" + text.slice(text.length - maxLen + 1);
}

/**
 * Truncate to `maxLen` characters, adding an ellipsis if truncated
 */
export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen - 1) + "…";
}
