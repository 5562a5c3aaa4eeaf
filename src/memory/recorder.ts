import type { ExtractedFacts } from "../organizer/schema.js";
import type { Item } from "../store/types.js";
import type { MemoryStore } from "./store.js";

export const CC_OBSERVATION_IMPORTANCE = 0.3;

export interface RecordedFacts {
  readonly decisions: number;
  readonly commitments: number;
  readonly observations: number;
}

/**
 * Stores the facts extracted from one classified item. Cc items only ever
 * produce observations, with a generic one when the classifier found none.
 * Runs inside the Organizer's persistence transaction. Obligations are dated
 * by the source item so reply detection compares message times.
 */
export function recordFacts(memory: MemoryStore, item: Item, facts: ExtractedFacts, now: number): RecordedFacts {
  let observations = 0;
  for (const obs of facts.observations) {
    memory.addObservation({
      sourceItemId: item.id,
      conversationId: item.conversationId,
      type: obs.type,
      content: obs.content,
      importance: obs.importance,
      createdAt: now,
    });
    observations++;
  }

  if (item.isCc) {
    if (observations === 0) {
      memory.addObservation({
        sourceItemId: item.id,
        conversationId: item.conversationId,
        type: "context_learned",
        content: `Observed thread: ${item.subject || "(no subject)"}`,
        importance: CC_OBSERVATION_IMPORTANCE,
        createdAt: now,
      });
      observations++;
    }
    return { decisions: 0, commitments: 0, observations };
  }

  for (const d of facts.decisions) {
    memory.addDecision({
      sourceItemId: item.id,
      conversationId: item.conversationId,
      question: d.question,
      context: d.context ?? null,
      requester: d.requester ?? (item.direction === "inbound" ? item.sender : null),
      options: d.options,
      dueBy: d.dueBy,
      urgency: d.urgency,
      createdAt: item.receivedAt,
    });
  }
  for (const c of facts.commitments) {
    memory.addCommitment({
      sourceItemId: item.id,
      conversationId: item.conversationId,
      description: c.description,
      toWhom: c.toWhom ?? (item.direction === "inbound" ? item.sender : null),
      dueBy: c.dueBy,
      urgency: c.urgency,
      createdAt: item.receivedAt,
    });
  }
  return { decisions: facts.decisions.length, commitments: facts.commitments.length, observations };
}
