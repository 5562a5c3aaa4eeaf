import { maxUrgency, type Item, type Urgency } from "../store/types.js";
import type { Contact, DerivedThread, ThreadStatus } from "./types.js";

export const HOUR_MS = 3_600_000;
export const DAY_MS = 24 * HOUR_MS;

export interface ThreadPolicy {
  readonly staleAfterHours: number;
  readonly closeAfterDays: number;
}

export function threadStatus(lastActivityAt: number, now: number, policy: ThreadPolicy): ThreadStatus {
  const idle = now - lastActivityAt;
  if (idle >= policy.closeAfterDays * DAY_MS) return "closed";
  if (idle >= policy.staleAfterHours * HOUR_MS) return "stale";
  return "active";
}

/**
 * Threads from direct messages (oldest first), one per conversation. The
 * owner is left out of `participants`.
 */
export function deriveThreads(
  messages: readonly Item[],
  owner: string,
  now: number,
  policy: ThreadPolicy,
): DerivedThread[] {
  const byConversation = new Map<string, Item[]>();
  for (const item of messages) {
    if (item.conversationId === null || item.isCc || item.deletedAt !== null) continue;
    const list = byConversation.get(item.conversationId);
    if (list) list.push(item);
    else byConversation.set(item.conversationId, [item]);
  }

  const self = owner.toLowerCase();
  const threads: DerivedThread[] = [];
  for (const [conversationId, items] of byConversation) {
    const latest = items[items.length - 1];
    if (!latest) continue;

    const participants = new Set<string>();
    let urgency: Urgency | null = null;
    for (const item of items) {
      for (const address of [item.sender, ...item.toRecipients, ...item.ccRecipients]) {
        if (address && address !== self) participants.add(address);
      }
      // Only what arrived since the owner last wrote counts towards urgency.
      urgency = item.direction === "outbound" ? null : maxUrgency(urgency, item.urgency);
    }

    threads.push({
      conversationId,
      subject: latest.subject || "(no subject)",
      status: threadStatus(latest.receivedAt, now, policy),
      needsReply: latest.direction === "inbound",
      urgency,
      lastActivityAt: latest.receivedAt,
      lastSender: latest.sender,
      messageCount: items.length,
      participants: [...participants].sort(),
    });
  }
  return threads.sort((a, b) => a.conversationId.localeCompare(b.conversationId));
}

interface ContactTally {
  name: string | null;
  firstSeen: number;
  lastInteraction: number;
  totalMessages: number;
  userInitiated: number;
  theyInitiated: number;
  ccCount: number;
}

/**
 * Contacts from direct and outbound messages. Inbound messages count for the
 * sender, outbound ones for every To recipient; Cc recipients of outbound
 * messages only raise `ccCount`. A message opens a conversation when it is
 * the first one seen for its conversation id (or has none).
 */
export function deriveContacts(
  messages: readonly Item[],
  owner: string,
  isVip: (email: string) => boolean,
): Contact[] {
  const self = owner.toLowerCase();
  const tallies = new Map<string, ContactTally>();
  const seenConversations = new Set<string>();

  const tally = (email: string, at: number): ContactTally => {
    let t = tallies.get(email);
    if (!t) {
      t = { name: null, firstSeen: at, lastInteraction: at, totalMessages: 0, userInitiated: 0, theyInitiated: 0, ccCount: 0 };
      tallies.set(email, t);
    }
    t.firstSeen = Math.min(t.firstSeen, at);
    t.lastInteraction = Math.max(t.lastInteraction, at);
    return t;
  };

  for (const item of messages) {
    if (item.isCc || item.deletedAt !== null) continue;
    let opens = true;
    if (item.conversationId !== null) {
      opens = !seenConversations.has(item.conversationId);
      seenConversations.add(item.conversationId);
    }

    if (item.direction === "inbound") {
      if (!item.sender || item.sender === self) continue;
      const t = tally(item.sender, item.receivedAt);
      t.totalMessages++;
      if (opens) t.theyInitiated++;
      if (item.senderName) t.name = item.senderName;
      continue;
    }

    for (const recipient of new Set(item.toRecipients)) {
      if (recipient === self) continue;
      const t = tally(recipient, item.receivedAt);
      t.totalMessages++;
      if (opens) t.userInitiated++;
    }
    for (const recipient of new Set(item.ccRecipients)) {
      if (recipient === self || item.toRecipients.includes(recipient)) continue;
      tally(recipient, item.receivedAt).ccCount++;
    }
  }

  return [...tallies.entries()]
    .map(([email, t]) => ({ email, ...t, isVip: isVip(email) }))
    .sort((a, b) => a.email.localeCompare(b.email));
}

/** Stable serialization of the derived fields, used to skip no-op writes. */
export function threadFingerprint(t: DerivedThread): string {
  return JSON.stringify([
    t.subject,
    t.status,
    t.needsReply,
    t.urgency,
    t.lastActivityAt,
    t.lastSender,
    t.messageCount,
    t.participants,
  ]);
}

export function contactFingerprint(c: Contact): string {
  return JSON.stringify([
    c.name,
    c.firstSeen,
    c.lastInteraction,
    c.totalMessages,
    c.userInitiated,
    c.theyInitiated,
    c.ccCount,
    c.isVip,
  ]);
}
