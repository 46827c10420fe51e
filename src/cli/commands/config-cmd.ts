import { Command, Option } from "clipanion";
import { resolve } from "node:path";
import { resolveConfig } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [["Show config", "kestrel config show"]],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    try {
      const { config, path, found } = resolveConfig(this.configFile);
      if (!found) {
        this.context.stdout.write(`No config file at ${path}; showing defaults.\n`);
      }
      this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "kestrel config validate"],
      ["Validate specific file", "kestrel config validate ./kestrel.config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const path = resolve(this.configFile ?? getConfigPath());
    try {
      const loaded = resolveConfig(path);
      if (!loaded.found) {
        this.context.stdout.write(`Config file not found: ${path}\n`);
        process.exitCode = 1;
        return;
      }
      this.context.stdout.write(`Config is valid: ${path}\n`);
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${path}\n` + `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}
