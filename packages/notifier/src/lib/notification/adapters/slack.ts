/**
 * Slack notification adapter
 *
 * Posts to an incoming webhook, either as Block Kit blocks or as a single
 * mrkdwn text message.
 */

import type { KnownBlock, MrkdwnElement } from "@slack/types";
import { z } from "zod";
import { DEFAULT_LABELS, type LogEvent } from "@alertline/core";
import type { SlackFormat } from "../../../config.js";
import { CALLER_FIELDS, buildEventView, tail, truncate, type EventView, type ViewDefaults } from "../format.js";
import {
  deliverWithRetry,
  errorForStatus,
  resolveRetryPolicy,
  type RetryPolicy,
} from "../retry.js";
import type { Destination, DestinationResult } from "../types.js";

/** Slack rejects header text over 150 characters */
export const HEADER_MAX = 150;
/** Slack renders at most 10 fields per section */
export const FIELDS_MAX = 10;
export const MESSAGE_MAX = 1800;
export const EXCEPTION_TAIL_MAX = 2500;
export const DETAILS_MAX = 1500;

export interface SlackWebhookPayload {
  /** Fallback for notifications and search */
  text: string;
  blocks?: KnownBlock[];
  username?: string;
}

const webhookUrlSchema = z.string().url().startsWith("https://");

export function isValidWebhookUrl(url: string | undefined): url is string {
  return webhookUrlSchema.safeParse(url).success;
}

/**
 * Format details as JSON for display in Slack
 */
export function formatDetails(details: Record<string, unknown>, maxLen = DETAILS_MAX): string {
  return truncate(JSON.stringify(details, null, 2), maxLen);
}

function mrkdwn(text: string): MrkdwnElement {
  return { type: "mrkdwn", text };
}

function fieldsFor(view: EventView): MrkdwnElement[] {
  const fields: MrkdwnElement[] = [];
  const add = (label: string, value: string | undefined) => {
    if (value) fields.push(mrkdwn(`*${label}*\n${value}`));
  };

  add("App", view.app);
  add("Env", view.env);
  add("Workflow", view.workflow);
  add("Invocation", view.invocationId);
  for (const [key, label] of CALLER_FIELDS) {
    add(label, view.caller[key]);
  }
  add("Logger", view.loggerName);
  return fields.slice(0, FIELDS_MAX);
}

export function linkLine(view: EventView): string | undefined {
  const links: string[] = [];
  if (view.links.logs) links.push(`<${view.links.logs}|CloudWatch Logs>`);
  if (view.links.lambda) links.push(`<${view.links.lambda}|Lambda>`);
  if (view.links.source) links.push(`<${view.links.source}|Source>`);
  return links.length > 0 ? links.join(" · ") : undefined;
}

/**
 * Build Block Kit message for an event
 */
export function buildSlackBlocks(view: EventView): KnownBlock[] {
  const headerText = view.exception
    ? `🚨 ${view.message}`
    : `${view.levelLabel}: ${view.message}`;
  const topLine = view.exception
    ? `*${view.levelLabel}* · \`${view.action ?? view.loggerName}\``
    : `*${view.levelLabel}* · \`${view.loggerName}\``;

  const blocks: KnownBlock[] = [
    {
      type: "header",
      text: { type: "plain_text", text: truncate(headerText, HEADER_MAX), emoji: true },
    },
    { type: "section", text: mrkdwn(topLine) },
  ];

  if (!view.exception) {
    blocks.push({
      type: "section",
      text: mrkdwn(`*Message*\n\`\`\`${truncate(view.message, MESSAGE_MAX)}\`\`\``),
    });
  }

  const fields = fieldsFor(view);
  if (fields.length > 0) {
    blocks.push({ type: "section", fields });
  }

  const links = linkLine(view);
  if (links) {
    blocks.push({ type: "section", text: mrkdwn(links) });
  }

  if (view.exception) {
    blocks.push({
      type: "section",
      text: mrkdwn(`*Exception*\n\`\`\`${tail(view.exception, EXCEPTION_TAIL_MAX)}\`\`\``),
    });
  }

  if (Object.keys(view.details).length > 0) {
    blocks.push({
      type: "section",
      text: mrkdwn(`*Details*\n\`\`\`${formatDetails(view.details)}\`\`\``),
    });
  }

  blocks.push({ type: "divider" });
  return blocks;
}

/**
 * Single mrkdwn message for the plain format
 */
export function buildSlackText(view: EventView): string {
  const lines = [
    `🚨 *${view.levelLabel}*: ${view.message}`,
    `*app*: ${view.app} | *env*: ${view.env} | *workflow*: ${view.workflow ?? "-"}${
      view.action ? ` | *action*: ${view.action}` : ""
    }`,
  ];
  if (view.invocationId) lines.push(`*invocation*: ${view.invocationId}`);
  if (view.links.logs) lines.push(`*logs*: ${view.links.logs}`);
  if (view.exception) lines.push(`\`\`\`${tail(view.exception, EXCEPTION_TAIL_MAX)}\`\`\``);
  if (Object.keys(view.details).length > 0) {
    lines.push(`*details*: \`\`\`${formatDetails(view.details)}\`\`\``);
  }
  return lines.join("\n");
}

export function buildSlackPayload(
  view: EventView,
  format: SlackFormat,
  username?: string
): SlackWebhookPayload {
  const payload: SlackWebhookPayload =
    format === "blocks"
      ? { text: `${view.levelLabel}: ${view.message} (${view.env})`, blocks: buildSlackBlocks(view) }
      : { text: buildSlackText(view) };
  if (username) {
    payload.username = username;
  }
  return payload;
}

export interface SlackDestinationOptions {
  webhookUrl?: string;
  format?: SlackFormat;
  username?: string;
  retry?: Partial<RetryPolicy>;
  /** Labels for events emitted without a runtime context */
  defaults?: ViewDefaults;
}

/**
 * Slack webhook destination
 */
export class SlackWebhookDestination implements Destination {
  readonly name = "slack";
  private readonly policy: RetryPolicy;

  constructor(private readonly options: SlackDestinationOptions = {}) {
    this.policy = resolveRetryPolicy(options.retry);
  }

  isConfigured(): boolean {
    return isValidWebhookUrl(this.options.webhookUrl);
  }

  async send(event: LogEvent): Promise<DestinationResult> {
    const webhookUrl = this.options.webhookUrl;
    if (!isValidWebhookUrl(webhookUrl)) {
      return {
        destinationName: this.name,
        success: false,
        skipped: true,
        error: "Slack webhook URL is missing or not an https URL",
        attempts: 0,
      };
    }

    const view = buildEventView(event, this.options.defaults ?? DEFAULT_LABELS);
    const body = JSON.stringify(
      buildSlackPayload(view, this.options.format ?? "blocks", this.options.username)
    );

    return deliverWithRetry(
      this.name,
      async (signal) => {
        const response = await fetch(webhookUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body,
          signal,
        });
        if (!response.ok) {
          throw errorForStatus(response.status, await response.text(), response.headers.get("retry-after"));
        }
      },
      this.policy
    );
  }
}
