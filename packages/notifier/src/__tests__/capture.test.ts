import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { current, type LogEvent } from "@alertline/core";
import { capture, envelopeFromArgs, DEFAULT_SUMMARY } from "../capture.js";
import { createDispatcher, type NotificationDispatcher } from "../lib/notification/dispatcher.js";
import type { Destination, DestinationResult } from "../lib/notification/types.js";
import { SignalLogger } from "../signal-logger.js";
import { ENV_KEYS, getConfig, parseConfig, setConfig } from "../config.js";
import { isInitialized, resetState } from "../api.js";

class RecordingDestination implements Destination {
  readonly name = "recording";
  readonly sent: LogEvent[] = [];

  isConfigured(): boolean {
    return true;
  }

  async send(event: LogEvent): Promise<DestinationResult> {
    this.sent.push(event);
    return { destinationName: this.name, success: true, attempts: 1 };
  }
}

const lambdaContext = {
  awsRequestId: "req-1",
  functionName: "nightly-sync",
  invokedFunctionArn: "arn:aws:lambda:us-east-1:123456789012:function:nightly-sync",
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("capture", () => {
  let destination: RecordingDestination;
  let dispatcher: NotificationDispatcher;

  beforeEach(() => {
    resetState();
    setConfig(parseConfig({ app: "billing", env: "prod", logLevel: "silent" }));
    destination = new RecordingDestination();
    dispatcher = createDispatcher({ destinations: [destination], dedupWindowSeconds: 0 });
  });

  afterEach(() => {
    resetState();
  });

  describe("envelopeFromArgs", () => {
    it("should treat the last argument as the context and the first as the event", () => {
      expect(envelopeFromArgs([])).toEqual({});
      expect(envelopeFromArgs(["ctx"])).toEqual({ context: "ctx" });
      expect(envelopeFromArgs(["evt", "ctx"])).toEqual({ event: "evt", context: "ctx" });
      expect(envelopeFromArgs(["evt", "middle", "ctx"])).toEqual({ event: "evt", context: "ctx" });
    });
  });

  it("should return the result unchanged and dispatch nothing", async () => {
    const double = capture(async (n: number) => n * 2, { dispatcher });

    await expect(double(21)).resolves.toBe(42);
    expect(destination.sent).toHaveLength(0);
  });

  it("should wrap synchronous functions in a promise", async () => {
    const wrapped = capture((a: string, b: string) => `${a}-${b}`, { dispatcher });

    const pending = wrapped("x", "y");

    expect(pending).toBeInstanceOf(Promise);
    expect(await pending).toBe("x-y");
  });

  it("should report a thrown error as a critical event and re-throw it", async () => {
    const failure = new RangeError("division by zero");
    function handler(_event: unknown, _context: unknown): number {
      throw failure;
    }
    const wrapped = capture(handler, { workflow: "nightly", dispatcher });

    await expect(wrapped({ records: [] }, lambdaContext)).rejects.toBe(failure);

    expect(destination.sent).toHaveLength(1);
    const event = destination.sent[0];
    expect(event.level).toBe("critical");
    expect(event.message).toBe(DEFAULT_SUMMARY);
    expect(event.loggerName).toBe("billing.capture");
    expect(event.exceptionInfo?.type).toBe("RangeError");
    expect(event.exceptionInfo?.message).toBe("division by zero");
    expect(event.extra).toEqual({ action: "handler" });
    expect(event.contextSnapshot).toMatchObject({
      invocationId: "req-1",
      app: "billing",
      env: "prod",
      workflow: "nightly",
      source: "lambda",
    });
    expect(event.contextSnapshot?.caller.functionName).toBe("nightly-sync");
  });

  it("should use the summary, action and extra options", async () => {
    const wrapped = capture(
      async (order: { id: string }) => {
        throw new Error(`order ${order.id} rejected`);
      },
      {
        dispatcher,
        summary: "Order import failed",
        action: "import-orders",
        extra: (order) => ({ orderId: order.id }),
      }
    );

    await expect(wrapped({ id: "ord-9" })).rejects.toThrow("order ord-9 rejected");

    expect(destination.sent[0].message).toBe("Order import failed");
    expect(destination.sent[0].extra).toEqual({ orderId: "ord-9", action: "import-orders" });
  });

  it("should still report when the extra callback throws", async () => {
    const failure = new Error("primary");
    const wrapped = capture(
      () => {
        throw failure;
      },
      {
        dispatcher,
        extra: () => {
          throw new Error("secondary");
        },
      }
    );

    await expect(wrapped()).rejects.toBe(failure);
    expect(destination.sent).toHaveLength(1);
    expect(destination.sent[0].extra).toEqual({ action: "anonymous" });
  });

  it("should expose the context inside the call and tear it down afterwards", async () => {
    const wrapped = capture(() => current(), { workflow: "reports", dispatcher });

    const inside = await wrapped();

    expect(inside).toMatchObject({ app: "billing", env: "prod", workflow: "reports", source: "generic" });
    expect(current()).toBeUndefined();
  });

  it("should tear down after a failure", async () => {
    const wrapped = capture(
      () => {
        throw new Error("nope");
      },
      { dispatcher }
    );

    await expect(wrapped()).rejects.toThrow("nope");
    expect(current()).toBeUndefined();
  });

  it("should keep concurrent invocations apart", async () => {
    const wrapped = capture(
      async (_event: unknown, context: { awsRequestId: string; functionName: string }) => {
        await delay(context.awsRequestId === "a" ? 20 : 0);
        return current()?.invocationId;
      },
      { dispatcher }
    );

    const [a, b] = await Promise.all([
      wrapped({}, { awsRequestId: "a", functionName: "fn" }),
      wrapped({}, { awsRequestId: "b", functionName: "fn" }),
    ]);

    expect(a).toBe("a");
    expect(b).toBe("b");
  });

  it("should deliver un-awaited log calls before returning", async () => {
    const log = new SignalLogger("billing.jobs", () => dispatcher);
    const wrapped = capture(
      (_event: unknown, _context: unknown) => {
        void log.error("step %d failed", 3);
        return "done";
      },
      { dispatcher }
    );

    await expect(wrapped({}, lambdaContext)).resolves.toBe("done");

    expect(destination.sent).toHaveLength(1);
    expect(destination.sent[0].message).toBe("step 3 failed");
    expect(destination.sent[0].contextSnapshot?.invocationId).toBe("req-1");
  });

  it("should describe a thrown undefined as an exception", async () => {
    const wrapped = capture(
      () => {
        throw undefined;
      },
      { dispatcher }
    );

    await expect(wrapped()).rejects.toBeUndefined();

    expect(destination.sent).toHaveLength(1);
    expect(destination.sent[0].exceptionInfo).toEqual({
      type: "undefined",
      message: "undefined",
      stack: "undefined",
    });
  });

  describe("with settings from the environment", () => {
    beforeEach(() => {
      resetState();
      for (const envName of Object.values(ENV_KEYS)) {
        vi.stubEnv(envName, "");
      }
      vi.stubEnv("LOG_LEVEL", "silent");
    });

    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it("should correct a mistyped Slack format and still run the handler", async () => {
      vi.stubEnv("ALERTLINE_SLACK_FORMAT", "Blocks");
      let ran = false;
      const wrapped = capture(() => {
        ran = true;
        return "ok";
      });

      await expect(wrapped()).resolves.toBe("ok");

      expect(ran).toBe(true);
      expect(isInitialized()).toBe(true);
      expect(getConfig().slackFormat).toBe("blocks");
    });

    it("should run the handler without notifications when setup fails", async () => {
      vi.stubEnv("ALERTLINE_MIN_LEVEL", "loud");
      let ran = false;
      const wrapped = capture(() => {
        ran = true;
        return current()?.app;
      });

      await expect(wrapped()).resolves.toBe("app");

      expect(ran).toBe(true);
      expect(isInitialized()).toBe(false);
    });

    it("should re-throw the handler's own error when setup fails", async () => {
      vi.stubEnv("ALERTLINE_EMIT_LOCAL_LOG", "sometimes");
      const failure = new TypeError("bad input");
      const wrapped = capture(() => {
        throw failure;
      });

      await expect(wrapped()).rejects.toBe(failure);
      expect(current()).toBeUndefined();
    });
  });
});
