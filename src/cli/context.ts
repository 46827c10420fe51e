import { createEngine, type Engine } from "../engine.js";
import { loadConfig } from "../config/loader.js";
import { getStateDir } from "../config/paths.js";
import { createLogger } from "../logging/logger.js";

/** Engine for one CLI invocation: no scheduled maintenance, quiet logs. */
export function openEngine(configPath?: string): Engine {
  const config = loadConfig(configPath);
  const logger = createLogger({ level: "error", json: true });
  return createEngine(
    { ...config, maintenance: { ...config.maintenance, enabled: false } },
    getStateDir(),
    logger,
  );
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
