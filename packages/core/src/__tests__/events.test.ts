import { describe, it, expect } from "vitest";
import { createLogEvent, exceptionInfoFrom, interpolate } from "../events.js";
import { isAtLeast, parseLevel } from "../levels.js";
import type { RuntimeContext } from "../context.js";

class QuotaExceeded extends Error {}

describe("levels", () => {
  it("should order severities", () => {
    expect(isAtLeast("critical", "error")).toBe(true);
    expect(isAtLeast("error", "error")).toBe(true);
    expect(isAtLeast("warning", "error")).toBe(false);
    expect(isAtLeast("debug", "info")).toBe(false);
  });

  it("should parse names case-insensitively with aliases", () => {
    expect(parseLevel("ERROR")).toBe("error");
    expect(parseLevel(" warn ")).toBe("warning");
    expect(parseLevel("fatal")).toBe("critical");
    expect(parseLevel("verbose")).toBeUndefined();
  });
});

describe("interpolate", () => {
  it("should leave the template alone without arguments", () => {
    expect(interpolate("100%s done")).toBe("100%s done");
  });

  it("should substitute printf-style placeholders", () => {
    expect(interpolate("user %s retried %d times", ["u-1", 3])).toBe("user u-1 retried 3 times");
  });
});

describe("exceptionInfoFrom", () => {
  it("should use the error name for built-in errors", () => {
    const info = exceptionInfoFrom(new RangeError("division by zero"));
    expect(info.type).toBe("RangeError");
    expect(info.message).toBe("division by zero");
    expect(info.stack).toContain("RangeError: division by zero");
  });

  it("should use the class name for subclasses that keep the default name", () => {
    expect(exceptionInfoFrom(new QuotaExceeded("limit")).type).toBe("QuotaExceeded");
  });

  it("should append the cause chain to the stack", () => {
    const err = new Error("outer", { cause: new TypeError("inner") });
    expect(exceptionInfoFrom(err).stack).toContain("Caused by: TypeError: inner");
  });

  it("should describe non-error throwables", () => {
    expect(exceptionInfoFrom("plain")).toEqual({ type: "string", message: "plain", stack: "plain" });
    expect(exceptionInfoFrom(null).type).toBe("null");
  });
});

describe("createLogEvent", () => {
  const context: RuntimeContext = {
    invocationId: "inv-1",
    app: "billing",
    env: "prod",
    source: "generic",
    caller: { host: "box" },
    createdAt: 1,
  };

  it("should build a frozen event with template and message", () => {
    const event = createLogEvent({
      level: "error",
      message: "charge %s failed",
      args: ["ch_1"],
      loggerName: "billing.charges",
      timestamp: 99,
      extra: { attempt: 2 },
      context,
    });

    expect(event).toEqual({
      level: "error",
      message: "charge ch_1 failed",
      messageTemplate: "charge %s failed",
      timestamp: 99,
      loggerName: "billing.charges",
      exceptionInfo: undefined,
      extra: { attempt: 2 },
      contextSnapshot: context,
    });
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.extra)).toBe(true);
    expect(Object.isFrozen(event.contextSnapshot)).toBe(true);
  });

  it("should copy extra so later caller mutations do not leak in", () => {
    const extra: Record<string, unknown> = { a: 1 };
    const event = createLogEvent({ level: "info", message: "m", loggerName: "l", extra });
    extra.a = 2;
    expect(event.extra.a).toBe(1);
  });

  it("should copy nested objects and arrays in extra", () => {
    const region = { name: "eu" };
    const tags = ["nightly"];
    const event = createLogEvent({
      level: "error",
      message: "m",
      loggerName: "l",
      extra: { from: region, to: region, tags },
    });

    region.name = "us";
    tags.push("manual");

    expect(event.extra).toEqual({ from: { name: "eu" }, to: { name: "eu" }, tags: ["nightly"] });
    expect(Object.isFrozen(event.extra.from)).toBe(true);
    expect(Object.isFrozen(event.extra.tags)).toBe(true);
  });

  it("should keep errors and class instances in extra by reference", () => {
    const cause = new Error("upstream");
    const when = new Date(0);
    const event = createLogEvent({ level: "error", message: "m", loggerName: "l", extra: { cause, when } });

    expect(event.extra.cause).toBe(cause);
    expect(event.extra.when).toBe(when);
  });

  it("should stop at cycles in extra", () => {
    const node: Record<string, unknown> = { id: 1 };
    node.self = node;
    const event = createLogEvent({ level: "error", message: "m", loggerName: "l", extra: { node } });

    const copy = event.extra.node;
    expect(copy).not.toBe(node);
    expect(copy).toEqual({ id: 1, self: node });
  });

  it("should prefer explicit exception info over exc", () => {
    const event = createLogEvent({
      level: "critical",
      message: "crashed",
      loggerName: "l",
      exc: undefined,
      exceptionInfo: exceptionInfoFrom(undefined),
    });
    expect(event.exceptionInfo).toEqual({ type: "undefined", message: "undefined", stack: "undefined" });
  });

  it("should attach exception info when an error is given", () => {
    const event = createLogEvent({
      level: "critical",
      message: "crashed",
      loggerName: "l",
      exc: new Error("bad"),
    });
    expect(event.exceptionInfo?.type).toBe("Error");
    expect(event.exceptionInfo?.message).toBe("bad");
  });
});
