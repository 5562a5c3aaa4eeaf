import { Command, Option } from "clipanion";
import * as t from "typanion";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import { createContext, type AppContext } from "../../runtime/context.js";
import { toQueryError, type Result } from "../../utils/errors.js";

export const limitOption = (description: string): number | undefined =>
  Option.String("--limit", {
    description,
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isInInclusiveRange(1, 500)]),
  });

/**
 * One-shot commands open the store, run, print JSON to stdout and close.
 * Logs go to stderr so stdout stays parseable.
 */
export abstract class StewardCommand extends Command {
  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  protected async withContext<T>(fn: (ctx: AppContext) => Promise<Result<T>> | Result<T>): Promise<number> {
    let ctx: AppContext | null = null;
    try {
      const config = loadConfig(this.config);
      ctx = createContext({ config, logger: createLogger(config.logging, { stderr: true }) });
      return this.report(await fn(ctx));
    } catch (err) {
      return this.report({ ok: false, error: toQueryError(err) });
    } finally {
      ctx?.close();
    }
  }

  protected report<T>(result: Result<T>): number {
    if (result.ok) {
      this.print(result.data);
      return 0;
    }
    this.context.stderr.write(`${JSON.stringify({ error: result.error })}\n`);
    return 1;
  }

  protected print(value: unknown): void {
    this.context.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
  }
}
