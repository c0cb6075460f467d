/**
 * Configuration
 *
 * Every option can come from an explicit value or from an environment
 * variable; explicit values win. `loadConfig` does the overlay, `parseConfig`
 * validates, and `getConfig`/`setConfig` hold the process-wide result.
 */

import { z } from "zod";
import { parseLevel, type Level } from "@alertline/core";
import { ConfigurationError } from "./lib/errors.js";

export type SlackFormat = "blocks" | "plain";
export type LogFormat = "json" | "pretty";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface Config {
  app: string;
  env: string;
  /** Lowest level dispatched to destinations */
  minLevel: Level;
  /** Write a local structured copy of every dispatched event */
  emitLocalLog: boolean;
  /** 0 disables deduplication */
  dedupWindowSeconds: number;
  /** Level for noisy third-party loggers (AWS SDK, undici) */
  quietLevel: Level;
  slackWebhookUrl?: string;
  slackFormat: SlackFormat;
  slackUsername?: string;
  sesFrom?: string;
  sesTo: string[];
  sesReplyTo: string[];
  sesRegion?: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

type ConfigValue = string | number | boolean | readonly string[] | undefined;

/**
 * Explicit configuration values, all optional
 */
export type ConfigInput = Partial<Record<keyof Config, ConfigValue>>;

const CONFIG_KEYS: ReadonlyArray<keyof Config> = [
  "app",
  "env",
  "minLevel",
  "emitLocalLog",
  "dedupWindowSeconds",
  "quietLevel",
  "slackWebhookUrl",
  "slackFormat",
  "slackUsername",
  "sesFrom",
  "sesTo",
  "sesReplyTo",
  "sesRegion",
  "logLevel",
  "logFormat",
];

/**
 * Environment variable backing each option
 */
export const ENV_KEYS: Readonly<Record<keyof Config, string>> = {
  app: "ALERTLINE_APP",
  env: "ALERTLINE_ENV",
  minLevel: "ALERTLINE_MIN_LEVEL",
  emitLocalLog: "ALERTLINE_EMIT_LOCAL_LOG",
  dedupWindowSeconds: "ALERTLINE_DEDUP_WINDOW_S",
  quietLevel: "ALERTLINE_QUIET_LEVEL",
  slackWebhookUrl: "ALERTLINE_SLACK_WEBHOOK_URL",
  slackFormat: "ALERTLINE_SLACK_FORMAT",
  slackUsername: "ALERTLINE_SLACK_USERNAME",
  sesFrom: "ALERTLINE_SES_FROM",
  sesTo: "ALERTLINE_SES_TO",
  sesReplyTo: "ALERTLINE_SES_REPLY_TO",
  sesRegion: "ALERTLINE_SES_REGION",
  logLevel: "LOG_LEVEL",
  logFormat: "LOG_FORMAT",
};

// ============================================================================
// Schema
// ============================================================================

const TRUE_WORDS: ReadonlySet<string> = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS: ReadonlySet<string> = new Set(["0", "false", "no", "off"]);

const flag = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === "boolean") return value;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected on/off, received "${value}"` });
  return z.NEVER;
});

const level = z.string().transform((value, ctx) => {
  const parsed = parseLevel(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown level "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

/**
 * Comma-separated list or array, blanks dropped
 */
const emailList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (typeof value === "string" ? value.split(",") : value))
  .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0));

/**
 * Empty strings count as unset
 */
const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const configSchema = z.object({
  app: z.string().min(1).default("app"),
  env: z.string().min(1).default("dev"),
  minLevel: level.default("error"),
  emitLocalLog: flag.default(true),
  dedupWindowSeconds: z.coerce.number().min(0).default(30),
  quietLevel: level.default("warning"),
  slackWebhookUrl: optionalText,
  slackFormat: z.enum(["blocks", "plain"]).default("blocks"),
  slackUsername: optionalText,
  sesFrom: optionalText,
  sesTo: emailList.default([]),
  sesReplyTo: emailList.default([]),
  sesRegion: optionalText,
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  logFormat: z.enum(["json", "pretty"]).default("json"),
});

const SLACK_FORMATS: ReadonlySet<string> = new Set(["blocks", "plain"]);

export interface ParsedConfig {
  config: Config;
  /** Settings that were adjusted rather than rejected */
  notices: string[];
}

/**
 * Settings that only shape a destination's output are corrected instead of
 * failing the whole load
 */
function lenientInput(input: ConfigInput): string[] {
  const notices: string[] = [];
  const format = input.slackFormat;
  if (typeof format === "string") {
    const lowered = format.trim().toLowerCase();
    if (SLACK_FORMATS.has(lowered)) {
      input.slackFormat = lowered;
    } else {
      input.slackFormat = "blocks";
      notices.push(`Unknown Slack format "${format}"; using blocks`);
    }
  }
  return notices;
}

/**
 * Validate a set of raw values, reporting corrected settings as notices.
 * Throws ConfigurationError on malformed input.
 */
export function parseConfigWithNotices(raw: ConfigInput = {}): ParsedConfig {
  const input: ConfigInput = { ...raw };
  const notices = lenientInput(input);
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`, result.error);
  }
  return { config: result.data, notices };
}

/**
 * Validate a set of raw values. Throws ConfigurationError on malformed input.
 */
export function parseConfig(input: ConfigInput = {}): Config {
  return parseConfigWithNotices(input).config;
}

/**
 * Read the raw option values present in the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigInput {
  const input: ConfigInput = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_KEYS[key]];
    if (value !== undefined && value !== "") {
      input[key] = value;
    }
  }
  return input;
}

/**
 * Overlay explicit values on the environment, then validate
 */
export function loadConfigWithNotices(
  explicit: ConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ParsedConfig {
  const merged: ConfigInput = { ...configFromEnv(env) };
  for (const key of CONFIG_KEYS) {
    const value = explicit[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return parseConfigWithNotices(merged);
}

export function loadConfig(explicit: ConfigInput = {}, env: NodeJS.ProcessEnv = process.env): Config {
  return loadConfigWithNotices(explicit, env).config;
}

// ============================================================================
// Process-wide config
// ============================================================================

let currentConfig: Config | null = null;

/**
 * Current configuration (loaded from the environment on first use)
 */
export function getConfig(): Config {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}

export function setConfig(config: Config): void {
  currentConfig = config;
}

/**
 * Reset the config (for testing)
 */
export function resetConfig(): void {
  currentConfig = null;
}
