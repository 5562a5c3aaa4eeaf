import type { ItemState } from "../store/types.js";
import { IntegrityError } from "../utils/errors.js";

export type ItemEvent = "claim" | "reclaim" | "succeed" | "fail" | "commit";

const TRANSITIONS: Record<ItemState, Partial<Record<ItemEvent, ItemState>>> = {
  unprocessed: { claim: "classifying" },
  // An expired lease is picked up again by another worker.
  classifying: { reclaim: "classifying", succeed: "actioned", fail: "failed" },
  actioned: { commit: "processed" },
  failed: { commit: "processed" },
  processed: {},
};

export class InvalidTransitionError extends IntegrityError {
  constructor(from: ItemState, event: ItemEvent) {
    super(`Invalid transition: ${event} from ${from}`, { from, event });
    this.name = "InvalidTransitionError";
  }
}

export function nextState(from: ItemState, event: ItemEvent): ItemState {
  const to = TRANSITIONS[from][event];
  if (to === undefined) {
    throw new InvalidTransitionError(from, event);
  }
  return to;
}

export function isTerminal(state: ItemState): boolean {
  return state === "processed";
}
