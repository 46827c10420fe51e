import { mkdirSync } from "node:fs";
import { readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { RecordDecodeError, StorageError } from "../errors.js";
import { withFileLock } from "../utils/file-lock.js";
import type { RecordStore } from "./types.js";

const EXTENSION = ".json";

/** One JSON file per record under `dir`. Missing records read as `undefined`. */
export class FileRecordStore implements RecordStore {
  constructor(private readonly dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  async get(key: string): Promise<unknown> {
    const filePath = this.pathFor(key);
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw new StorageError(`Failed to read record ${key}`, key, { cause: err });
    }

    try {
      return JSON.parse(raw) as unknown;
    } catch {
      throw new RecordDecodeError(`Record ${key} is not valid JSON`, key);
    }
  }

  async set(key: string, record: unknown): Promise<void> {
    const filePath = this.pathFor(key);
    const tmpPath = `${filePath}.tmp`;
    try {
      await withFileLock(filePath, async () => {
        await writeFile(tmpPath, JSON.stringify(record, null, 2));
        await rename(tmpPath, filePath);
      });
    } catch (err) {
      throw new StorageError(`Failed to write record ${key}`, key, { cause: err });
    }
  }

  async delete(key: string): Promise<boolean> {
    const filePath = this.pathFor(key);
    try {
      return await withFileLock(filePath, async () => {
        try {
          await rm(filePath);
          return true;
        } catch (err) {
          if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
          throw err;
        }
      });
    } catch (err) {
      throw new StorageError(`Failed to delete record ${key}`, key, { cause: err });
    }
  }

  async keys(): Promise<string[]> {
    const entries = await readdir(this.dir);
    return entries
      .filter((name) => name.endsWith(EXTENSION))
      .map((name) => decodeURIComponent(name.slice(0, -EXTENSION.length)));
  }

  private pathFor(key: string): string {
    return join(this.dir, `${encodeURIComponent(key)}${EXTENSION}`);
  }
}
