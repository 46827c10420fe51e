import { describe, it, expect, vi } from "vitest";
import { TypedEventEmitter } from "../../src/utils/typed-emitter.js";

interface TestEvents {
  data: (value: string) => void;
  count: (n: number) => void;
  empty: () => void;
}

describe("TypedEventEmitter", () => {
  it("emits and receives events with correct types", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();
    emitter.on("data", handler);
    emitter.emit("data", "hello");
    expect(handler).toHaveBeenCalledWith("hello");
  });

  it("removes listeners with off", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();
    emitter.on("data", handler);
    emitter.off("data", handler);
    emitter.emit("data", "ignored");
    expect(handler).not.toHaveBeenCalled();
  });

  it("reports whether anyone listened", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    expect(emitter.emit("empty")).toBe(false);
    emitter.on("empty", vi.fn());
    expect(emitter.emit("empty")).toBe(true);
  });

  it("routes listener errors to the handler and keeps delivering", () => {
    const onError = vi.fn();
    const emitter = new TypedEventEmitter<TestEvents>(onError);
    const failure = new Error("listener broke");
    const later = vi.fn();
    emitter.on("count", () => {
      throw failure;
    });
    emitter.on("count", later);

    emitter.emit("count", 42);

    expect(onError).toHaveBeenCalledWith("count", failure);
    expect(later).toHaveBeenCalledWith(42);
  });
});
