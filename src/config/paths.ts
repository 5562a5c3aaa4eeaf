import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { StewardConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["STEWARD_STATE_DIR"] ?? join(homedir(), ".steward");
}

export function getConfigPath(): string {
  return process.env["STEWARD_CONFIG_PATH"] ?? "steward.config.json";
}

export function getTriggersDir(config: StewardConfig, stateDir: string): string {
  return config.triggers.dir ?? join(stateDir, "triggers");
}

export function getPreferencesDir(stateDir: string): string {
  return join(stateDir, "preferences");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
