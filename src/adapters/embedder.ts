import { z } from "zod";
import type { EmbeddingPort } from "../search/embeddings.js";
import { TransientError } from "../utils/errors.js";
import type { CommandRunner } from "./command-runner.js";

const embeddingsSchema = z.object({
  vectors: z.array(z.array(z.number())),
});

export class CommandEmbedder implements EmbeddingPort {
  constructor(private readonly runner: CommandRunner) {}

  async embed(texts: readonly string[], signal: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const parsed = embeddingsSchema.safeParse(await this.runner.run({ op: "embed", texts }, signal));
    if (!parsed.success) {
      throw new TransientError(`Malformed embedding output: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    if (parsed.data.vectors.length !== texts.length) {
      throw new TransientError(`Expected ${texts.length} embeddings, got ${parsed.data.vectors.length}`);
    }
    return parsed.data.vectors;
  }
}
