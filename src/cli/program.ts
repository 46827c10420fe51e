import { Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { SessionHistoryCommand, SessionSweepCommand } from "./commands/session.js";
import {
  MemoryConsolidateCommand,
  MemoryListCommand,
  MemorySearchCommand,
} from "./commands/memory.js";
import { PiiScanCommand } from "./commands/pii.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Kestrel",
    binaryName: "kestrel",
    binaryVersion: "0.1.0",
  });

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Session commands
  cli.register(SessionHistoryCommand);
  cli.register(SessionSweepCommand);

  // Memory commands
  cli.register(MemoryListCommand);
  cli.register(MemorySearchCommand);
  cli.register(MemoryConsolidateCommand);

  cli.register(PiiScanCommand);

  return cli;
}
