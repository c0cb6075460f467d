/**
 * Email notification adapter
 *
 * Renders an HTML and a plain-text body and hands them to an EmailTransport.
 * The default transport is Amazon SES; its SDK is only loaded on first send.
 */

import { DEFAULT_LABELS, type Level, type LogEvent } from "@alertline/core";
import { createChildLogger } from "../../logger.js";
import {
  ConfigurationError,
  PermanentDeliveryError,
  TransientDeliveryError,
} from "../../errors.js";
import { buildEventView, tail, truncate, type EventView, type ViewDefaults } from "../format.js";
import { classifyError, deliverWithRetry, resolveRetryPolicy, type RetryPolicy } from "../retry.js";
import type { Destination, DestinationResult } from "../types.js";

// ============================================================================
// Transport
// ============================================================================

export interface EmailMessage {
  from: string;
  to: readonly string[];
  replyTo: readonly string[];
  subject: string;
  text: string;
  html: string;
}

/**
 * Anything that can put an EmailMessage on the wire
 */
export interface EmailTransport {
  send(message: EmailMessage, signal: AbortSignal): Promise<void>;
}

const SES_TRANSIENT_NAMES = new Set([
  "Throttling",
  "ThrottlingException",
  "TooManyRequestsException",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalFailure",
  "RequestTimeout",
  "RequestTimeoutException",
  "TimeoutError",
]);

function httpStatusOf(error: Error): number | undefined {
  if (!("$metadata" in error)) return undefined;
  const metadata = error.$metadata;
  if (typeof metadata === "object" && metadata !== null && "httpStatusCode" in metadata) {
    return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

/**
 * Throttling and 5xx responses are retried; auth and validation errors are not
 */
export function classifySesError(error: unknown): TransientDeliveryError | PermanentDeliveryError | ConfigurationError {
  if (!(error instanceof Error)) return classifyError(error);
  if (error instanceof ConfigurationError) return error;

  const status = httpStatusOf(error);
  if (SES_TRANSIENT_NAMES.has(error.name) || (status !== undefined && status >= 500)) {
    return new TransientDeliveryError(`SES ${error.name}: ${error.message}`, error);
  }
  if (status !== undefined) {
    return new PermanentDeliveryError(`SES ${error.name}: ${error.message}`, error);
  }
  return classifyError(error);
}

type SesModule = typeof import("@aws-sdk/client-ses");

/**
 * SES transport. The SDK module and client are created lazily and reused.
 */
export class SesTransport implements EmailTransport {
  private client?: InstanceType<SesModule["SESClient"]>;
  private sdk?: SesModule;

  constructor(
    private readonly region?: string,
    private readonly loadSdk: () => Promise<SesModule> = () => import("@aws-sdk/client-ses")
  ) {}

  async send(message: EmailMessage, signal: AbortSignal): Promise<void> {
    const sdk = await this.load();
    if (!this.client) {
      const log = createChildLogger("@aws-sdk/client-ses");
      this.client = new sdk.SESClient({
        region: this.region,
        maxAttempts: 1,
        logger: {
          debug: (...content: unknown[]) => log.debug({ content }, "ses"),
          info: (...content: unknown[]) => log.info({ content }, "ses"),
          warn: (...content: unknown[]) => log.warn({ content }, "ses"),
          error: (...content: unknown[]) => log.error({ content }, "ses"),
        },
      });
    }

    try {
      await this.client.send(
        new sdk.SendEmailCommand({
          Source: message.from,
          Destination: { ToAddresses: [...message.to] },
          ReplyToAddresses: message.replyTo.length > 0 ? [...message.replyTo] : undefined,
          Message: {
            Subject: { Data: message.subject, Charset: "UTF-8" },
            Body: {
              Text: { Data: message.text, Charset: "UTF-8" },
              Html: { Data: message.html, Charset: "UTF-8" },
            },
          },
        }),
        { abortSignal: signal }
      );
    } catch (error) {
      throw classifySesError(error);
    }
  }

  private async load(): Promise<SesModule> {
    if (this.sdk) return this.sdk;
    try {
      const sdk = await this.loadSdk();
      this.sdk = sdk;
      return sdk;
    } catch (error) {
      throw new ConfigurationError("@aws-sdk/client-ses could not be loaded", error);
    }
  }
}

// ============================================================================
// Rendering
// ============================================================================

export const LEVEL_COLORS: Readonly<Record<Level, string>> = {
  debug: "#1E90FF",
  info: "#2E8B57",
  warning: "#FF8C00",
  error: "#FF0000",
  critical: "#8B0000",
};

export const SUBJECT_MAX = 200;
const EXCEPTION_HTML_MAX = 12_000;

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function stringify(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function buildSubject(view: EventView): string {
  const subject = `${view.levelLabel} ${view.env} ${view.workflow ?? view.app}: ${view.message}`;
  return truncate(subject.replace(/\s+/g, " ").trim(), SUBJECT_MAX);
}

export function buildTextBody(view: EventView): string {
  const lines = [
    view.message,
    `level=${view.levelLabel} app=${view.app} env=${view.env} workflow=${view.workflow ?? "-"}${
      view.action ? ` action=${view.action}` : ""
    }`,
  ];
  if (view.invocationId) lines.push(`invocation=${view.invocationId}`);
  lines.push(`timestamp=${view.timestamp}`);
  if (view.links.logs) lines.push(`logs: ${view.links.logs}`);
  if (view.links.lambda) lines.push(`lambda: ${view.links.lambda}`);
  if (view.links.source) lines.push(`source: ${view.links.source}`);

  const callerEntries = Object.entries(view.caller);
  if (callerEntries.length > 0) {
    lines.push("caller:");
    for (const [key, value] of callerEntries) lines.push(`  ${key}: ${value}`);
  }

  const detailEntries = Object.entries(view.details);
  if (detailEntries.length > 0) {
    lines.push("details:");
    for (const [key, value] of detailEntries) lines.push(`  ${key}: ${stringify(value)}`);
  }

  if (view.exception) {
    lines.push("", "exception:", view.exception);
  }
  return lines.join("\n");
}

function row(key: string, value: string): string {
  return (
    `<tr><td style="padding:6px 10px;color:#555;font-size:12px;vertical-align:top;white-space:nowrap;"><b>${escapeHtml(key)}</b></td>` +
    `<td style="padding:6px 10px;color:#111;font-size:12px;vertical-align:top;">${escapeHtml(value)}</td></tr>`
  );
}

function table(rows: string): string {
  return `<table style="border-collapse:collapse;width:100%;background:#fff;border:1px solid #eee;">${rows}</table>`;
}

function tableFrom(record: Readonly<Record<string, unknown>>): string {
  const entries = Object.entries(record);
  if (entries.length === 0) return "<i>none</i>";
  return table(entries.map(([key, value]) => row(key, stringify(value))).join(""));
}

function heading(text: string): string {
  return `<h3 style="margin:16px 0 8px 0;">${escapeHtml(text)}</h3>`;
}

export function buildHtmlBody(view: EventView): string {
  const color = LEVEL_COLORS[view.level];
  const subtitle = [view.levelLabel, view.env, view.workflow ?? view.app, view.action]
    .filter((part): part is string => Boolean(part))
    .join(" · ");

  const summary = table(
    [
      row("Level", view.levelLabel),
      row("App", view.app),
      row("Env", view.env),
      view.workflow ? row("Workflow", view.workflow) : "",
      view.action ? row("Action", view.action) : "",
      view.invocationId ? row("Invocation", view.invocationId) : "",
      row("Logger", view.loggerName),
      row("Timestamp", view.timestamp),
    ].join("")
  );

  const linkItems: string[] = [];
  const link = (href: string | undefined, label: string) => {
    if (href) {
      linkItems.push(`<div style="margin:6px 0;"><a href="${escapeHtml(href)}">${escapeHtml(label)}</a></div>`);
    }
  };
  link(view.links.logs, "CloudWatch Logs");
  link(view.links.lambda, "Lambda");
  link(view.links.source, "Source");

  const sections = [
    heading("Summary"),
    summary,
    linkItems.length > 0 ? heading("Links") + linkItems.join("") : "",
    heading("Runtime"),
    tableFrom(view.caller),
    heading("Details"),
    tableFrom(view.details),
    view.exception
      ? heading("Exception") +
        `<pre style="white-space:pre-wrap;background:#0b0b0b;color:#f5f5f5;padding:12px;border-radius:6px;font-size:12px;overflow:auto;">${escapeHtml(
          tail(view.exception, EXCEPTION_HTML_MAX)
        )}</pre>`
      : "",
  ];

  return [
    "<html>",
    `<body style="font-family:Arial, sans-serif;background:#f6f7f9;padding:16px;">`,
    `<div style="max-width:720px;margin:0 auto;background:#fff;border:1px solid #e6e6e6;border-radius:10px;overflow:hidden;">`,
    `<div style="background:${color};color:#fff;padding:12px 16px;">`,
    `<div style="font-size:16px;font-weight:700;">${escapeHtml(view.message)}</div>`,
    `<div style="font-size:12px;opacity:0.9;">${escapeHtml(subtitle)}</div>`,
    "</div>",
    `<div style="padding:16px;">${sections.join("")}</div>`,
    "</div>",
    "</body>",
    "</html>",
  ].join("\n");
}

// ============================================================================
// Destination
// ============================================================================

export interface EmailDestinationOptions {
  from?: string;
  to?: readonly string[];
  replyTo?: readonly string[];
  region?: string;
  /** Defaults to an SesTransport for `region` */
  transport?: EmailTransport;
  retry?: Partial<RetryPolicy>;
  defaults?: ViewDefaults;
}

/**
 * SES email destination
 */
export class SesEmailDestination implements Destination {
  readonly name = "email";
  private readonly policy: RetryPolicy;
  private readonly transport: EmailTransport;

  constructor(private readonly options: EmailDestinationOptions = {}) {
    this.policy = resolveRetryPolicy(options.retry);
    this.transport = options.transport ?? new SesTransport(options.region);
  }

  isConfigured(): boolean {
    return Boolean(this.options.from) && (this.options.to?.length ?? 0) > 0;
  }

  async send(event: LogEvent): Promise<DestinationResult> {
    const from = this.options.from;
    const to = this.options.to ?? [];
    if (!from || to.length === 0) {
      return {
        destinationName: this.name,
        success: false,
        skipped: true,
        error: "Email sender or recipients not configured",
        attempts: 0,
      };
    }

    const view = buildEventView(event, this.options.defaults ?? DEFAULT_LABELS);
    const message: EmailMessage = {
      from,
      to,
      replyTo: this.options.replyTo ?? [],
      subject: buildSubject(view),
      text: buildTextBody(view),
      html: buildHtmlBody(view),
    };

    return deliverWithRetry(this.name, (signal) => this.transport.send(message, signal), this.policy);
  }
}
