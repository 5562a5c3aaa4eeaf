import { z } from "zod";
import { URGENCY_LEVELS } from "../store/types.js";

export const ALERT_EVENT_TYPES = [
  "email_received",
  "email_sent",
  "calendar_event",
  "wm_thread",
  "wm_commitment",
  "wm_decision",
] as const;

const patterns = z.array(z.string().trim().min(1)).min(1);
const keywords = z.array(z.string().trim().min(1)).min(1);

export const alertPredicateSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("sender"), patterns }),
  z.object({ kind: z.literal("recipient"), patterns }),
  z.object({ kind: z.literal("subject_keyword"), keywords }),
  z.object({ kind: z.literal("body_keyword"), keywords }),
  z.object({ kind: z.literal("urgency_at_least"), level: z.enum(URGENCY_LEVELS) }),
  z.object({ kind: z.literal("label"), labels: z.array(z.string().trim().min(1)).min(1) }),
  z.object({ kind: z.literal("category"), categories: z.array(z.string().trim().min(1)).min(1) }),
  z.object({ kind: z.literal("organizer"), patterns }),
  z.object({ kind: z.literal("min_attendees"), count: z.number().int().positive() }),
  z.object({ kind: z.literal("overdue") }),
]);

export const alertConditionSchema = z
  .object({
    eventTypes: z.array(z.enum(ALERT_EVENT_TYPES)).min(1),
    predicates: z.array(alertPredicateSchema).default([]),
    semantic: z.boolean().default(false),
  })
  .refine((c) => c.predicates.length > 0 || c.semantic, {
    message: "A rule needs at least one predicate or a semantic match",
    path: ["predicates"],
  });

export type AlertEventType = (typeof ALERT_EVENT_TYPES)[number];
export type AlertPredicate = z.infer<typeof alertPredicateSchema>;
export type AlertPredicateKind = AlertPredicate["kind"];
export type AlertCondition = z.infer<typeof alertConditionSchema>;
