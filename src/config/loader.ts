import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ValidationError } from "../utils/errors.js";
import type { StewardConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig, stewardConfigSchema } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ValidationError(`Missing environment variable: ${varName} (referenced as ${match})`, { varName });
    }
    return value;
  });
}

/**
 * Substitutes `${env:VAR}` placeholders, then parses and validates one config
 * document. Every failure is a ValidationError naming `source`.
 */
export function parseConfigText(content: string, source: string): StewardConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ValidationError(`${source} is not valid JSON: ${err.message}`, { path: source });
    }
    throw err;
  }

  const parsed = stewardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new ValidationError(`Invalid config ${source}: ${issues.join("; ")}`, { path: source, issues });
  }
  return parsed.data;
}

/** Loads the config file, or the defaults when there is none. */
export function loadConfig(path?: string): StewardConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }
  return parseConfigText(content, configPath);
}
