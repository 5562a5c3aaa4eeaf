import { execFile } from "node:child_process";
import type { CommandPortConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { TransientError } from "../utils/errors.js";

const MAX_BUFFER = 10 * 1024 * 1024;

/** Sends one JSON request to an external command and returns its JSON reply. */
export interface CommandRunner {
  run(request: Record<string, unknown>, signal: AbortSignal): Promise<unknown>;
}

/** Parses a command's stdout; the reply must be a single JSON document. */
export function parseCommandOutput(label: string, stdout: string): unknown {
  const output = stdout.trim();
  if (!output) {
    throw new TransientError(`${label} produced no output`);
  }
  try {
    return JSON.parse(output);
  } catch {
    throw new TransientError(`${label} produced invalid JSON`, { preview: output.slice(0, 200) });
  }
}

/**
 * Runs the configured binary with the request on stdin. Non-zero exits,
 * timeouts and unparseable replies all surface as TransientError.
 */
export class ExecCommandRunner implements CommandRunner {
  private readonly command: string;
  private readonly logger: Logger;

  constructor(
    private readonly label: string,
    private readonly config: CommandPortConfig & { readonly command: string },
    logger: Logger,
  ) {
    this.command = config.command;
    this.logger = logger.child({ component: `command:${label}` });
  }

  run(request: Record<string, unknown>, signal: AbortSignal): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      const child = execFile(
        this.command,
        [...this.config.args],
        { timeout: this.config.timeoutMs, maxBuffer: MAX_BUFFER, signal },
        (error, stdout, stderr) => {
          if (error) {
            if (error.killed || error.name === "AbortError") {
              reject(new TransientError(`${this.label} timed out or was aborted after ${this.config.timeoutMs}ms`));
              return;
            }
            this.logger.debug({ err: error, stderr: stderr.trim().slice(0, 500) }, "Command failed");
            reject(new TransientError(`${this.label} failed: ${stderr.trim() || error.message}`, { exitCode: error.code }));
            return;
          }
          try {
            resolve(parseCommandOutput(this.label, stdout));
          } catch (err) {
            reject(err);
          }
        },
      );
      child.stdin?.on("error", (err) => {
        this.logger.debug({ err }, "Command closed stdin early");
      });
      child.stdin?.end(JSON.stringify(request));
    });
  }
}

/** Builds a runner for a configured port, or null when no command is set. */
export function commandRunnerFor(label: string, config: CommandPortConfig, logger: Logger): CommandRunner | null {
  const command = config.command;
  if (!command) return null;
  return new ExecCommandRunner(label, { ...config, command }, logger);
}
