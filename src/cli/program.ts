import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ItemsListCommand, ItemsShowCommand } from "./commands/items.js";
import { MemoryCycleCommand, RebuildCommand } from "./commands/memory.js";
import { OutboxListCommand, OutboxRequeueCommand } from "./commands/outbox.js";
import { PrefsGetCommand, PrefsSetCommand, PrefsUnsetCommand } from "./commands/prefs.js";
import {
  RulesAddCommand,
  RulesDisableCommand,
  RulesEnableCommand,
  RulesListCommand,
  RulesRemoveCommand,
} from "./commands/rules.js";
import { RunCommand } from "./commands/run.js";
import { SearchCommand } from "./commands/search.js";
import { StatusCommand } from "./commands/status.js";
import { ThreadsListCommand, ThreadsShowCommand } from "./commands/threads.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Steward",
    binaryName: "steward",
    binaryVersion: VERSION,
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  cli.register(RunCommand);
  cli.register(StatusCommand);

  // Items and derived memory
  cli.register(ItemsListCommand);
  cli.register(ItemsShowCommand);
  cli.register(ThreadsListCommand);
  cli.register(ThreadsShowCommand);
  cli.register(MemoryCycleCommand);
  cli.register(RebuildCommand);
  cli.register(SearchCommand);

  // Alert rules
  cli.register(RulesAddCommand);
  cli.register(RulesListCommand);
  cli.register(RulesRemoveCommand);
  cli.register(RulesEnableCommand);
  cli.register(RulesDisableCommand);

  // Preferences
  cli.register(PrefsGetCommand);
  cli.register(PrefsSetCommand);
  cli.register(PrefsUnsetCommand);

  // Trigger queue
  cli.register(OutboxListCommand);
  cli.register(OutboxRequeueCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
