import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ValidationError } from "../errors.js";
import type { KestrelConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export interface LoadedConfig {
  readonly config: KestrelConfig;
  readonly path: string;
  /** False when no file exists at `path` and every value is a default. */
  readonly found: boolean;
}

/**
 * Replaces `${env:VAR}` placeholders. Every missing variable is reported in
 * one `ValidationError`.
 */
export function substituteEnv(raw: string): string {
  const missing = new Set<string>();
  const substituted = raw.replace(ENV_PATTERN, (_match, name: string) => {
    const value = process.env[name];
    if (value === undefined) {
      missing.add(name);
      return "";
    }
    return value;
  });

  if (missing.size > 0) {
    const names = [...missing];
    throw new ValidationError(`Missing environment variables: ${names.join(", ")}`, names);
  }
  return substituted;
}

export function resolveConfig(path?: string): LoadedConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { config: parseConfig({}), path: configPath, found: false };
    }
    throw err;
  }

  const raw = JSON.parse(substituteEnv(content)) as unknown;
  return { config: parseConfig(raw), path: configPath, found: true };
}

export function loadConfig(path?: string): KestrelConfig {
  return resolveConfig(path).config;
}
