/**
 * Runtime context propagation
 *
 * Each logical invocation carries a RuntimeContext. Contexts live on a stack
 * held in AsyncLocalStorage, so two invocations running concurrently in the
 * same process never see each other's labels. Pushes hand back a token;
 * resetting the token restores whatever was active before the push.
 */

import { AsyncLocalStorage } from "node:async_hooks";

// ============================================================================
// Types
// ============================================================================

export const RuntimeSources = {
  LAMBDA: "lambda",
  ECS: "ecs",
  GENERIC: "generic",
} as const;

export type RuntimeSource = (typeof RuntimeSources)[keyof typeof RuntimeSources];

/**
 * Metadata for one logical invocation
 */
export interface RuntimeContext {
  /** Provider request id, or a generated id */
  readonly invocationId: string;
  readonly app: string;
  readonly env: string;
  readonly workflow?: string;
  readonly source: RuntimeSource;
  /** Platform-specific identifiers (function name, task ARN, region, ...) */
  readonly caller: Readonly<Record<string, string>>;
  /** Unix timestamp (ms) */
  readonly createdAt: number;
}

/**
 * Labels applied on top of whatever detection finds
 */
export interface ContextLabels {
  app?: string;
  env?: string;
  workflow?: string;
}

interface Frame {
  id: number;
  context: RuntimeContext;
}

interface StackHolder {
  frames: Frame[];
}

/**
 * Handle returned by a push; pass it to `reset` to undo the push
 */
export class ContextToken {
  private used = false;

  /** @internal */
  constructor(
    readonly frameId: number,
    /** @internal */
    readonly holder: StackHolder
  ) {}

  get isUsed(): boolean {
    return this.used;
  }

  /** @internal */
  markUsed(): void {
    this.used = true;
  }
}

/**
 * Freeze a context (and its caller map) so snapshots can be shared safely
 */
export function freezeContext(context: RuntimeContext): RuntimeContext {
  if (Object.isFrozen(context) && Object.isFrozen(context.caller)) {
    return context;
  }
  return Object.freeze({
    ...context,
    caller: Object.freeze({ ...context.caller }),
  });
}

// ============================================================================
// Stack
// ============================================================================

/**
 * Per-execution-flow stack of runtime contexts
 *
 * Outside of `runIsolated` the root stack is used; inside, the caller gets a
 * fork of the enclosing stack that is discarded when the scope ends.
 */
export class RuntimeContextStack {
  private readonly storage = new AsyncLocalStorage<StackHolder>();
  private readonly root: StackHolder = { frames: [] };
  private nextFrameId = 1;

  /**
   * Push a context, shadowing the current one until the token is reset
   */
  push(context: RuntimeContext): ContextToken {
    const holder = this.holder();
    const frame: Frame = { id: this.nextFrameId++, context: freezeContext(context) };
    holder.frames.push(frame);
    return new ContextToken(frame.id, holder);
  }

  /**
   * Pop back to the state before the push that produced `token`.
   * Stale and already-reset tokens are ignored.
   */
  reset(token: ContextToken): void {
    if (token.isUsed) return;
    token.markUsed();

    const frames = token.holder.frames;
    const index = frames.findIndex((f) => f.id === token.frameId);
    if (index === -1) return;
    frames.length = index;
  }

  /**
   * Innermost active context
   */
  current(): RuntimeContext | undefined {
    const frames = this.holder().frames;
    return frames.length > 0 ? frames[frames.length - 1].context : undefined;
  }

  /**
   * Number of contexts currently stacked in this execution flow
   */
  depth(): number {
    return this.holder().frames.length;
  }

  /**
   * Run `fn` with its own copy of the current stack. Pushes made inside do
   * not leak to the caller or to concurrently running scopes.
   */
  runIsolated<T>(fn: () => T): T {
    const fork: StackHolder = { frames: [...this.holder().frames] };
    return this.storage.run(fork, fn);
  }

  /**
   * Drop every context on the root stack (for testing)
   */
  clear(): void {
    this.holder().frames.length = 0;
  }

  private holder(): StackHolder {
    return this.storage.getStore() ?? this.root;
  }
}

/**
 * Process-wide stack instance
 */
let globalStack: RuntimeContextStack | null = null;

export function getContextStack(): RuntimeContextStack {
  if (!globalStack) {
    globalStack = new RuntimeContextStack();
  }
  return globalStack;
}

/**
 * Reset the global stack (for testing)
 */
export function resetContextStack(): void {
  globalStack = null;
}

export function setContext(context: RuntimeContext): ContextToken {
  return getContextStack().push(context);
}

export function reset(token: ContextToken): void {
  getContextStack().reset(token);
}

export function current(): RuntimeContext | undefined {
  return getContextStack().current();
}

export function runIsolated<T>(fn: () => T): T {
  return getContextStack().runIsolated(fn);
}
