/**
 * Runtime detection
 *
 * Classifies an invocation envelope as lambda, ecs or generic. Detectors are
 * tried in order and the first match wins; adding a platform means adding a
 * detector to the list.
 */

import { hostname } from "node:os";
import { nanoid } from "nanoid";
import { z } from "zod";
import {
  RuntimeSources,
  getContextStack,
  type ContextLabels,
  type ContextToken,
  type RuntimeContext,
  type RuntimeSource,
} from "./context.js";
import { ContextDetectionFailure } from "./errors.js";

/**
 * What the platform hands to an entry point
 */
export interface InvocationEnvelope {
  event?: unknown;
  context?: unknown;
}

export interface Detection {
  source: RuntimeSource;
  invocationId?: string;
  caller: Record<string, string>;
}

export type Environment = Record<string, string | undefined>;

export type ContextDetector = (
  envelope: InvocationEnvelope,
  env: Environment
) => Detection | undefined;

export interface DetectOptions {
  env?: Environment;
  detectors?: readonly ContextDetector[];
  now?: () => number;
}

export const DEFAULT_LABELS = {
  app: "app",
  env: "dev",
} as const;

// ============================================================================
// Shapes
// ============================================================================

const lambdaContextSchema = z.object({
  awsRequestId: z.string().min(1),
  functionName: z.string().min(1),
  functionVersion: z.string().optional(),
  invokedFunctionArn: z.string().optional(),
  memoryLimitInMB: z.union([z.string(), z.number()]).optional(),
  logGroupName: z.string().optional(),
  logStreamName: z.string().optional(),
});

const ecsTaskEventSchema = z.object({
  detail: z.object({
    taskArn: z.string().min(1),
    clusterArn: z.string().min(1),
    group: z.string().optional(),
    lastStatus: z.string().optional(),
  }),
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * Split an ARN (`arn:partition:service:region:account:resource`)
 */
export function parseArn(arn: string): { region?: string; accountId?: string } {
  const parts = arn.split(":");
  if (parts.length < 6 || parts[0] !== "arn") return {};
  return {
    region: parts[3] || undefined,
    accountId: parts[4] || undefined,
  };
}

export function sniffRegion(env: Environment): string | undefined {
  return env.AWS_REGION || env.AWS_DEFAULT_REGION || undefined;
}

/**
 * Copy defined values into a caller map
 */
function compact(values: Record<string, string | number | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== "") {
      out[key] = String(value);
    }
  }
  return out;
}

// ============================================================================
// Detectors
// ============================================================================

export const detectLambdaContext: ContextDetector = (envelope, env) => {
  const parsed = lambdaContextSchema.safeParse(envelope.context);
  if (!parsed.success) return undefined;

  const ctx = parsed.data;
  const arn = ctx.invokedFunctionArn ? parseArn(ctx.invokedFunctionArn) : {};
  return {
    source: RuntimeSources.LAMBDA,
    invocationId: ctx.awsRequestId,
    caller: compact({
      functionName: ctx.functionName,
      functionVersion: ctx.functionVersion,
      invokedFunctionArn: ctx.invokedFunctionArn,
      accountId: arn.accountId,
      region: sniffRegion(env) ?? arn.region,
      logGroup: ctx.logGroupName ?? env.AWS_LAMBDA_LOG_GROUP_NAME,
      logStream: ctx.logStreamName ?? env.AWS_LAMBDA_LOG_STREAM_NAME,
      memoryLimitInMB: ctx.memoryLimitInMB,
      requestId: ctx.awsRequestId,
    }),
  };
};

export const detectEcsTaskEvent: ContextDetector = (envelope, env) => {
  const parsed = ecsTaskEventSchema.safeParse(envelope.event);
  if (!parsed.success) return undefined;

  const { detail } = parsed.data;
  const arn = parseArn(detail.taskArn);
  return {
    source: RuntimeSources.ECS,
    caller: compact({
      taskArn: detail.taskArn,
      clusterArn: detail.clusterArn,
      group: detail.group,
      lastStatus: detail.lastStatus,
      accountId: arn.accountId,
      region: arn.region ?? sniffRegion(env),
    }),
  };
};

export const detectLambdaEnvironment: ContextDetector = (_envelope, env) => {
  const functionName = env.AWS_LAMBDA_FUNCTION_NAME;
  if (!functionName) return undefined;

  return {
    source: RuntimeSources.LAMBDA,
    caller: compact({
      functionName,
      functionVersion: env.AWS_LAMBDA_FUNCTION_VERSION,
      region: sniffRegion(env),
      logGroup: env.AWS_LAMBDA_LOG_GROUP_NAME,
      logStream: env.AWS_LAMBDA_LOG_STREAM_NAME,
    }),
  };
};

export const detectEcsEnvironment: ContextDetector = (_envelope, env) => {
  const metadataUri = env.ECS_CONTAINER_METADATA_URI_V4 || env.ECS_CONTAINER_METADATA_URI;
  if (!metadataUri) return undefined;

  return {
    source: RuntimeSources.ECS,
    caller: compact({
      metadataUri,
      region: sniffRegion(env),
      executionEnv: env.AWS_EXECUTION_ENV,
    }),
  };
};

export const detectGeneric: ContextDetector = () => ({
  source: RuntimeSources.GENERIC,
  caller: compact({ host: hostname(), pid: process.pid }),
});

export const defaultDetectors: readonly ContextDetector[] = [
  detectLambdaContext,
  detectEcsTaskEvent,
  detectLambdaEnvironment,
  detectEcsEnvironment,
];

// ============================================================================
// Detection
// ============================================================================

function runDetectors(
  envelope: InvocationEnvelope,
  env: Environment,
  detectors: readonly ContextDetector[]
): Detection {
  for (const detector of detectors) {
    let found: Detection | undefined;
    try {
      found = detector(envelope, env);
    } catch (error) {
      const failure = new ContextDetectionFailure(
        `Detector ${detector.name || "anonymous"} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error
      );
      return {
        source: RuntimeSources.GENERIC,
        caller: { detectionError: failure.message },
      };
    }
    if (found) return found;
  }
  return { source: RuntimeSources.GENERIC, caller: {} };
}

/**
 * Build a RuntimeContext from an invocation envelope. Never throws: anything
 * unrecognised (or a detector blowing up) yields a generic context.
 */
export function detectRuntimeContext(
  envelope: InvocationEnvelope = {},
  labels: ContextLabels = {},
  options: DetectOptions = {}
): RuntimeContext {
  const env = options.env ?? process.env;
  const now = options.now ?? (() => Date.now());
  const detection = runDetectors(envelope, env, options.detectors ?? defaultDetectors);

  const caller: Record<string, string> = {
    ...(detection.source === RuntimeSources.GENERIC
      ? detectGeneric(envelope, env)?.caller
      : {}),
    ...detection.caller,
    ...compact({
      accountName: env.AWS_ACCOUNT_NAME,
      sourceCode: env.SOURCE_CODE,
    }),
  };

  return {
    invocationId: detection.invocationId ?? nanoid(),
    app: labels.app ?? DEFAULT_LABELS.app,
    env: labels.env ?? DEFAULT_LABELS.env,
    workflow: labels.workflow,
    source: detection.source,
    caller,
    createdAt: now(),
  };
}

/**
 * Detect a context from the envelope and push it on the global stack
 */
export function detectAndSetContext(
  envelope: InvocationEnvelope = {},
  labels: ContextLabels = {},
  options: DetectOptions = {}
): ContextToken {
  return getContextStack().push(detectRuntimeContext(envelope, labels, options));
}
