import type { CategoryConfig } from "../config/types.js";
import type { ItemDirection, ItemKind } from "../store/types.js";

export interface ClassificationContext {
  readonly kind: ItemKind;
  readonly direction: ItemDirection;
  /** The owner is only on Cc: extract observations, nothing actionable. */
  readonly ccMode: boolean;
  readonly vip: boolean;
  readonly sender: string;
  readonly subject: string;
  readonly categories: readonly CategoryConfig[];
}

export interface ClassificationInput {
  readonly itemId: string;
  readonly text: string;
  readonly context: ClassificationContext;
}

/**
 * The classifier. Returns raw output which the Organizer validates; must not
 * have side effects, so a failed call can be retried freely.
 */
export interface ClassificationPort {
  classify(input: ClassificationInput, signal: AbortSignal): Promise<unknown>;
}

export type FlagDue = "today" | "this_week";

export interface TagAction {
  readonly type: "tag";
  readonly categories: readonly string[];
  readonly flag: { readonly status: "flagged"; readonly due: FlagDue } | null;
}

export type ProviderAction = TagAction;

/** Applies mailbox-side actions. Applying the same action twice is a no-op. */
export interface ProviderActionPort {
  applyAction(itemId: string, action: ProviderAction, signal: AbortSignal): Promise<void>;
}
