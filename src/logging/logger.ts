import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export interface LoggerOptions {
  /** Log to stderr, leaving stdout to command output. */
  readonly stderr?: boolean;
}

export function createLogger(config?: LoggingConfig, opts: LoggerOptions = {}): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  const fd = opts.stderr ? 2 : 1;

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: fd },
      };

  const options: pino.LoggerOptions = {
    level,
    base: { app: "steward" },
    ...(transport && !config?.file ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, mkdir: true }));
  }
  if (transport) {
    return pino(options);
  }
  return pino(options, pino.destination(fd));
}
