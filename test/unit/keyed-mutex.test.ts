import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../../src/utils/keyed-mutex.js";

const tick = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("KeyedMutex", () => {
  it("runs work on one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.run("k", async () => {
        await tick(20);
        order.push("first");
      }),
      mutex.run("k", async () => {
        order.push("second");
      }),
    ]);

    expect(order).toEqual(["first", "second"]);
  });

  it("lets different keys run concurrently", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.run("a", async () => {
        await tick(20);
        order.push("a");
      }),
      mutex.run("b", async () => {
        order.push("b");
      }),
    ]);

    expect(order).toEqual(["b", "a"]);
  });

  it("releases the key when work fails", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run("k", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await mutex.run("k", async () => "after")).toBe("after");
  });
});
