import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { withFileLock } from "../../src/utils/file-lock.js";

describe("withFileLock", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "kestrel-lock-"));
    filePath = join(tempDir, "record.json");
    writeFileSync(filePath, "{}");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("executes function and returns result", async () => {
    const result = await withFileLock(filePath, () => 42);
    expect(result).toBe(42);
  });

  it("locks a file that does not exist yet", async () => {
    const missing = join(tempDir, "new.json");
    expect(await withFileLock(missing, () => "ok")).toBe("ok");
    expect(existsSync(`${missing}.lock`)).toBe(false);
  });

  it("releases lock even on error", async () => {
    await expect(
      withFileLock(filePath, () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    const result = await withFileLock(filePath, () => "after-error");
    expect(result).toBe("after-error");
  });

  it("serializes concurrent access", async () => {
    const order: number[] = [];

    const p1 = withFileLock(filePath, async () => {
      await new Promise((r) => setTimeout(r, 50));
      order.push(1);
    });

    const p2 = withFileLock(filePath, async () => {
      order.push(2);
    });

    await Promise.all([p1, p2]);
    expect(order).toEqual([1, 2]);
  });
});
