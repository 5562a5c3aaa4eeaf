import { z } from "zod";

export const TRIGGER_TYPES = [
  "urgent_email",
  "reply_needed",
  "availability_requested",
  "no_reply_after_n_days",
  "weekly_digest_ready",
  "meeting_prep_ready",
  "daily_briefing",
  "working_memory_nudge",
  "alert_rule_triggered",
] as const;

export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const routingSchema = z.object({
  channel: z.string().min(1),
  target: z.string().optional(),
});

export const triggerEnvelopeSchema = z.object({
  id: z.string().uuid(),
  capability: z.string().min(1),
  user: z.string(),
  type: z.enum(TRIGGER_TYPES),
  created_at: z.string().datetime(),
  dedupe_key: z.string().min(1),
  payload: z.record(z.unknown()),
  routing: routingSchema.optional(),
});

export type Routing = z.infer<typeof routingSchema>;
export type TriggerEnvelope = z.infer<typeof triggerEnvelopeSchema>;

export interface PublishRequest {
  readonly type: TriggerType;
  /** Entity the trigger is about; becomes the last segment of the dedupe key. */
  readonly primaryId: string;
  readonly payload: Record<string, unknown>;
  readonly routing?: Routing;
  /** Skip the local dedupe marker check (default false). */
  readonly skipDedupe?: boolean;
}

export interface PublishResult {
  readonly trigger: TriggerEnvelope;
  /** False when a fresh dedupe marker suppressed the write. */
  readonly published: boolean;
}

/** Anything that accepts outbound triggers. */
export interface TriggerSink {
  publish(request: PublishRequest): Promise<PublishResult>;
}
