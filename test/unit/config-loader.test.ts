import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { homedir, tmpdir } from "node:os";
import { ValidationError } from "../../src/errors.js";
import { loadConfig, resolveConfig, substituteEnv } from "../../src/config/loader.js";
import { getConfigPath, getStateDir, prepareStateDir } from "../../src/config/paths.js";
import { DEFAULT_TOPICS, parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TTL"] = "3";
    process.env["TEST_LEVEL"] = "debug";
  });

  afterEach(() => {
    delete process.env["TEST_TTL"];
    delete process.env["TEST_LEVEL"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("ttl: ${env:TEST_TTL}")).toBe("ttl: 3");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_TTL}:${env:TEST_LEVEL}")).toBe("3:debug");
  });

  it("reports every missing env var at once", () => {
    let caught: unknown;
    try {
      substituteEnv("${env:MISSING_A} ${env:TEST_TTL} ${env:MISSING_B} ${env:MISSING_A}");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: "Missing environment variables: MISSING_A, MISSING_B",
      issues: ["MISSING_A", "MISSING_B"],
    });
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("parses minimal config with defaults", () => {
    const config = parseConfig({});
    expect(config.storage).toEqual({ driver: "file", timeoutMs: 5_000 });
    expect(config.session).toEqual({ maxTokenLimit: 3_000, ttlDays: 7 });
    expect(config.memory.topics).toEqual(DEFAULT_TOPICS);
    expect(config.memory.keywordIndex).toBe(true);
    expect(config.tasks).toEqual({ concurrency: 2, maxQueueSize: 200 });
    expect(config.maintenance.enabled).toBe(false);
    expect(config.logging?.level).toBe("info");
  });

  it("keeps explicit values", () => {
    const config = parseConfig({
      storage: { driver: "sqlite" },
      session: { maxTokenLimit: 500 },
      memory: { topics: ["allergy"], keywordIndex: false },
    });
    expect(config.storage.driver).toBe("sqlite");
    expect(config.session.maxTokenLimit).toBe(500);
    expect(config.session.ttlDays).toBe(7);
    expect(config.memory.topics).toEqual(["allergy"]);
    expect(config.memory.keywordIndex).toBe(false);
  });

  it("rejects invalid values with the offending path", () => {
    expect(() => parseConfig({ session: { maxTokenLimit: -1 } })).toThrow(ValidationError);
    expect(() => parseConfig({ session: { maxTokenLimit: -1 } })).toThrow(
      /^Invalid configuration: session\.maxTokenLimit: /,
    );
  });

  it("rejects an unknown storage driver", () => {
    expect(() => parseConfig({ storage: { driver: "postgres" } })).toThrow(ValidationError);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "kestrel-config-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    delete process.env["TEST_TTL"];
  });

  it("falls back to defaults when the file is missing", () => {
    expect(loadConfig(join(tempDir, "missing.json"))).toEqual(parseConfig({}));
  });

  it("says whether the config came from a file", () => {
    const configPath = join(tempDir, "kestrel.config.json");
    writeFileSync(configPath, "{}");

    expect(resolveConfig(configPath)).toMatchObject({ path: configPath, found: true });
    expect(resolveConfig(join(tempDir, "missing.json"))).toMatchObject({
      path: join(tempDir, "missing.json"),
      found: false,
    });
  });

  it("reads the file and substitutes env vars", () => {
    process.env["TEST_TTL"] = "3";
    const configPath = join(tempDir, "kestrel.config.json");
    writeFileSync(configPath, '{ "session": { "ttlDays": ${env:TEST_TTL} } }');

    expect(loadConfig(configPath).session.ttlDays).toBe(3);
  });

  it("throws on malformed JSON", () => {
    const configPath = join(tempDir, "broken.json");
    writeFileSync(configPath, "{ nope");
    expect(() => loadConfig(configPath)).toThrow(SyntaxError);
  });
});

describe("paths", () => {
  afterEach(() => {
    delete process.env["KESTREL_STATE_DIR"];
    delete process.env["KESTREL_CONFIG_PATH"];
  });

  it("honours environment overrides", () => {
    process.env["KESTREL_STATE_DIR"] = "/tmp/kestrel-state";
    process.env["KESTREL_CONFIG_PATH"] = "/tmp/kestrel.json";
    expect(getStateDir()).toBe("/tmp/kestrel-state");
    expect(getConfigPath()).toBe("/tmp/kestrel.json");
  });

  it("defaults the config path to the working directory", () => {
    expect(getConfigPath()).toBe("kestrel.config.json");
  });

  it("treats empty overrides as unset", () => {
    process.env["KESTREL_STATE_DIR"] = "";
    process.env["KESTREL_CONFIG_PATH"] = "";
    expect(getStateDir()).toBe(join(homedir(), ".kestrel"));
    expect(getConfigPath()).toBe("kestrel.config.json");
  });

  it("creates an owner-only state directory and lays out record dirs", () => {
    const parent = mkdtempSync(join(tmpdir(), "kestrel-state-"));
    try {
      const layout = prepareStateDir(join(parent, "state"));

      expect(layout.root).toBe(join(parent, "state"));
      expect(layout.recordsDir("sessions")).toBe(join(parent, "state", "sessions"));
      expect(statSync(layout.root).mode & 0o777).toBe(0o700);
    } finally {
      rmSync(parent, { recursive: true, force: true });
    }
  });
});
