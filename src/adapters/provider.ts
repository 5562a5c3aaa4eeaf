import type { ProviderAction, ProviderActionPort } from "../organizer/types.js";
import type { ProviderSyncPort } from "../sync/service.js";
import type { CommandRunner } from "./command-runner.js";

/** Mailbox provider access through the configured provider command. */
export class CommandProvider implements ProviderSyncPort, ProviderActionPort {
  constructor(private readonly runner: CommandRunner) {}

  listChanges(since: string | null, signal: AbortSignal): Promise<unknown> {
    return this.runner.run({ op: "list_changes", since }, signal);
  }

  async applyAction(itemId: string, action: ProviderAction, signal: AbortSignal): Promise<void> {
    await this.runner.run({ op: "apply_action", itemId, action }, signal);
  }
}
