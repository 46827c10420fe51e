import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { RecordNamespace } from "../persistence/types.js";

export const CONFIG_FILE_NAME = "kestrel.config.json";

/** On-disk layout of one engine's state directory. */
export interface StateLayout {
  readonly root: string;
  /** Where a namespace lives when records are kept as JSON files. */
  recordsDir(namespace: RecordNamespace): string;
}

/** `KESTREL_STATE_DIR` as an absolute path, else `~/.kestrel`. Empty counts as unset. */
export function getStateDir(): string {
  const override = process.env["KESTREL_STATE_DIR"];
  return override ? resolve(override) : join(homedir(), ".kestrel");
}

export function getConfigPath(): string {
  return process.env["KESTREL_CONFIG_PATH"] || CONFIG_FILE_NAME;
}

/** Creates the state directory owner-only: it holds conversation history. */
export function prepareStateDir(stateDir: string): StateLayout {
  const root = resolve(stateDir);
  mkdirSync(root, { recursive: true, mode: 0o700 });
  return { root, recordsDir: (namespace) => join(root, namespace) };
}
