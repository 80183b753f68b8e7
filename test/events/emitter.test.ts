/**
 * rowscroll - Event Emitter Tests
 * Tests for subscription, one-shot handlers and handler failures
 */

import { describe, it, expect, vi } from "vitest";
import { createEmitter } from "../../src/events";

interface TestEvents {
  "offset:change": { row: number; offset: number };
  resize: { width: number; height: number };
  [key: string]: unknown;
}

const createFakeLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const makeEmitter = () => {
  const logger = createFakeLogger();
  return { emitter: createEmitter<TestEvents>(logger), logger };
};

describe("on / emit", () => {
  it("should call every handler with the payload", () => {
    const { emitter } = makeEmitter();
    const first = vi.fn();
    const second = vi.fn();

    emitter.on("offset:change", first);
    emitter.on("offset:change", second);
    emitter.emit("offset:change", { row: 2, offset: 37 });

    expect(first).toHaveBeenCalledWith({ row: 2, offset: 37 });
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("should not cross events", () => {
    const { emitter } = makeEmitter();
    const onResize = vi.fn();

    emitter.on("resize", onResize);
    emitter.emit("offset:change", { row: 0, offset: 1 });

    expect(onResize).not.toHaveBeenCalled();
  });

  it("should ignore events without listeners", () => {
    const { emitter } = makeEmitter();
    expect(() =>
      emitter.emit("resize", { width: 1, height: 1 }),
    ).not.toThrow();
  });

  it("should let a handler unsubscribe while being notified", () => {
    const { emitter } = makeEmitter();
    const later = vi.fn();
    let unsubscribe = (): void => {};
    unsubscribe = emitter.on("resize", () => {
      unsubscribe();
    });
    emitter.on("resize", later);

    emitter.emit("resize", { width: 1, height: 1 });
    emitter.emit("resize", { width: 2, height: 2 });

    expect(later).toHaveBeenCalledTimes(2);
    expect(emitter.listenerCount("resize")).toBe(1);
  });
});

describe("off / unsubscribe", () => {
  it("should stop notifying a removed handler", () => {
    const { emitter } = makeEmitter();
    const handler = vi.fn();

    const unsubscribe = emitter.on("resize", handler);
    emitter.emit("resize", { width: 1, height: 1 });
    unsubscribe();
    emitter.emit("resize", { width: 2, height: 2 });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("should only remove the given handler", () => {
    const { emitter } = makeEmitter();
    const kept = vi.fn();
    const removed = vi.fn();

    emitter.on("resize", kept);
    emitter.on("resize", removed);
    emitter.off("resize", removed);
    emitter.emit("resize", { width: 1, height: 1 });

    expect(kept).toHaveBeenCalledTimes(1);
    expect(removed).not.toHaveBeenCalled();
  });
});

describe("once", () => {
  it("should call the handler a single time", () => {
    const { emitter } = makeEmitter();
    const handler = vi.fn();

    emitter.once("offset:change", handler);
    emitter.emit("offset:change", { row: 0, offset: 5 });
    emitter.emit("offset:change", { row: 0, offset: 6 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ row: 0, offset: 5 });
  });

  it("should not see an event emitted from inside itself", () => {
    const { emitter } = makeEmitter();
    const handler = vi.fn(() => {
      emitter.emit("offset:change", { row: 1, offset: 9 });
    });

    emitter.once("offset:change", handler);
    emitter.emit("offset:change", { row: 1, offset: 8 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount("offset:change")).toBe(0);
  });
});

describe("clear", () => {
  it("should clear one event or all of them", () => {
    const { emitter } = makeEmitter();
    emitter.on("resize", vi.fn());
    emitter.on("offset:change", vi.fn());

    emitter.clear("resize");
    expect(emitter.listenerCount("resize")).toBe(0);
    expect(emitter.listenerCount("offset:change")).toBe(1);

    emitter.clear();
    expect(emitter.listenerCount("offset:change")).toBe(0);
  });
});

describe("error handling", () => {
  it("should report a throwing handler to the logger and go on", () => {
    const { emitter, logger } = makeEmitter();
    const failure = new Error("Handler error");
    const after = vi.fn();

    emitter.on("resize", () => {
      throw failure;
    });
    emitter.on("resize", after);

    expect(() =>
      emitter.emit("resize", { width: 1, height: 1 }),
    ).not.toThrow();
    expect(logger.error).toHaveBeenCalledWith(
      'Error in event handler for "resize":',
      failure,
    );
    expect(after).toHaveBeenCalledTimes(1);
  });
});
