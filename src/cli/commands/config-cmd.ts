import { readFileSync } from "node:fs";
import { Command, Option } from "clipanion";
import { loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { errorMessage } from "../../utils/errors.js";
import { StewardCommand } from "./base.js";

export class ConfigShowCommand extends StewardCommand {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration with defaults applied",
    examples: [["Show config", "steward config show"]],
  });

  async execute(): Promise<number> {
    try {
      this.print(loadConfig(this.config));
      return 0;
    } catch (err) {
      this.context.stderr.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "steward config validate"],
      ["Validate specific file", "steward config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`${JSON.stringify({ valid: false, path: configPath, error: "Config file not found" })}\n`);
        return 1;
      }
      throw err;
    }

    try {
      parseConfigText(content, configPath);
      this.context.stdout.write(`${JSON.stringify({ valid: true, path: configPath })}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`${JSON.stringify({ valid: false, path: configPath, error: errorMessage(err) })}\n`);
      return 1;
    }
  }
}
