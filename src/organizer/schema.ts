import { z } from "zod";
import { URGENCY_LEVELS } from "../store/types.js";
import { OBSERVATION_TYPES } from "../memory/types.js";

const dueBySchema = z
  .union([z.string().datetime({ offset: true }), z.number().int().nonnegative()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    return typeof value === "number" ? value : Date.parse(value);
  });

export const decisionFactSchema = z.object({
  question: z.string().min(1),
  context: z.string().nullish(),
  requester: z.string().nullish(),
  options: z.array(z.string()).default([]),
  dueBy: dueBySchema,
  urgency: z.enum(URGENCY_LEVELS).default("this_week"),
});

export const commitmentFactSchema = z.object({
  description: z.string().min(1),
  toWhom: z.string().nullish(),
  dueBy: dueBySchema,
  urgency: z.enum(URGENCY_LEVELS).default("this_week"),
});

export const observationFactSchema = z.object({
  type: z.enum(OBSERVATION_TYPES),
  content: z.string().min(1),
  importance: z.number().min(0).max(1).default(0.5),
});

export const availabilitySchema = z.object({
  timeWindow: z.string().nullish(),
  durationMinutes: z.number().int().positive().nullish(),
  timezone: z.string().nullish(),
  constraints: z.string().nullish(),
  proposedSlots: z.array(z.string()).default([]),
});

export const classificationSchema = z.object({
  categories: z.array(z.string().min(1)).default([]),
  urgency: z.enum(URGENCY_LEVELS),
  requiresReply: z.boolean().default(false),
  replyReason: z.string().nullish(),
  cleanupAction: z.enum(["keep", "archive", "delete"]).default("keep"),
  reason: z.string().default(""),
  labels: z.array(z.string().min(1)).default([]),
  confidence: z.number().min(0).max(1).default(0.5),
  availability: availabilitySchema.nullish(),
  facts: z
    .object({
      decisions: z.array(decisionFactSchema).default([]),
      commitments: z.array(commitmentFactSchema).default([]),
      observations: z.array(observationFactSchema).default([]),
    })
    .default({}),
});

export type Classification = z.infer<typeof classificationSchema>;
export type DecisionFact = z.infer<typeof decisionFactSchema>;
export type CommitmentFact = z.infer<typeof commitmentFactSchema>;
export type ObservationFact = z.infer<typeof observationFactSchema>;
export type Availability = z.infer<typeof availabilitySchema>;
export type ExtractedFacts = Classification["facts"];
