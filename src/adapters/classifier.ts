import { z } from "zod";
import type { RuleParserPort, SemanticMatch, SemanticMatchPort } from "../alerts/types.js";
import type { ClassificationInput, ClassificationPort } from "../organizer/types.js";
import { TransientError } from "../utils/errors.js";
import type { CommandRunner } from "./command-runner.js";

const semanticMatchSchema = z.object({
  matches: z.boolean(),
  reason: z.string().default(""),
  confidence: z.number().min(0).max(1).default(0.5),
});

/**
 * The model-backed ports, all served by one external command. Each request
 * carries an `op` naming the operation. Classification and rule output is
 * returned raw; callers validate it.
 */
export class CommandClassifier implements ClassificationPort, SemanticMatchPort, RuleParserPort {
  constructor(private readonly runner: CommandRunner) {}

  classify(input: ClassificationInput, signal: AbortSignal): Promise<unknown> {
    return this.runner.run({ op: "classify", itemId: input.itemId, text: input.text, context: input.context }, signal);
  }

  async match(input: { rule: string; event: Record<string, unknown> }, signal: AbortSignal): Promise<SemanticMatch> {
    const raw = await this.runner.run({ op: "semantic_match", rule: input.rule, event: input.event }, signal);
    const parsed = semanticMatchSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransientError(`Malformed semantic match output: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  parse(text: string, signal: AbortSignal): Promise<unknown> {
    return this.runner.run({ op: "parse_rule", text }, signal);
  }
}
