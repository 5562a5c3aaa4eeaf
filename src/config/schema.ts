import { z } from "zod";
import type { StewardConfig } from "./types.js";
import { URGENCY_LEVELS } from "../store/types.js";

export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

const mailboxSchema = z.object({
  owner: z.string().default(""),
  backfill: z.boolean().default(false),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const categorySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  flag: z.enum(["today", "this_week"]).optional(),
});

const DEFAULT_CATEGORIES = [
  { name: "Action Required", description: "Needs the owner to act", flag: "today" as const },
  { name: "Follow Up", description: "Needs a follow-up this week", flag: "this_week" as const },
  { name: "Work", description: "Work-related correspondence" },
  { name: "FYI", description: "Informational, no action needed" },
  { name: "Personal", description: "Personal correspondence" },
];

const organizerSchema = z.object({
  intervalMs: z.number().int().positive().default(5_000),
  batchSize: z.number().int().positive().default(20),
  concurrency: z.number().int().positive().default(5),
  leaseMs: z.number().int().positive().default(120_000),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  maxClaims: z.number().int().min(1).default(5),
  classifyTimeoutMs: z.number().int().positive().default(30_000),
  retryBaseDelayMs: z.number().int().min(0).default(200),
  urgentAt: z.enum(URGENCY_LEVELS).default("immediate"),
  categoryPriority: z
    .array(z.string())
    .default(["Action Required", "Follow Up", "Work", "Personal", "FYI"]),
  categories: z.array(categorySchema).default(DEFAULT_CATEGORIES),
});

const memorySchema = z.object({
  schedule: z.string().min(1).default("*/5 * * * *"),
  staleAfterHours: z.number().positive().default(72),
  closeAfterDays: z.number().positive().default(30),
  replyNudgeDays: z.number().positive().default(2),
  decisionNudgeDays: z.number().positive().default(3),
  urgentStaleHours: z.number().positive().default(24),
  escalateAfterDays: z.number().positive().default(2),
  expireAfterDays: z.number().positive().default(30),
  nudgeCooldownHours: z.number().positive().default(24),
  maxNudgesPerKind: z.number().int().positive().default(5),
  observationRetentionDays: z.number().positive().default(30),
});

const alertsSchema = z.object({
  defaultCooldownMinutes: z.number().int().min(0).default(30),
  semanticTimeoutMs: z.number().int().positive().default(20_000),
});

const triggersSchema = z.object({
  dir: z.string().optional(),
  capability: z.string().min(1).default("steward"),
  dedupeTtlDays: z.number().min(0).default(7),
  channel: z.string().min(1).default("default"),
  target: z.string().optional(),
});

const searchSchema = z.object({
  chunkSize: z.number().int().min(100).default(1_500),
  chunkOverlap: z.number().int().min(0).default(200),
  minVectorScore: z.number().min(-1).max(1).default(0.25),
  rrfK: z.number().int().positive().default(60),
  missingRank: z.number().int().positive().default(1_000),
  defaultLimit: z.number().int().positive().default(20),
  indexBatchSize: z.number().int().positive().default(50),
});

const digestSchema = z.object({
  enabled: z.boolean().default(false),
  day: z.enum(WEEKDAYS).default("friday"),
  time: z.string().regex(TIME_OF_DAY).default("08:30"),
  windowMinutes: z.number().int().positive().default(30),
  timezone: z.string().min(1).default("UTC"),
});

const meetingRuleSchema = z.object({
  name: z.string().min(1),
  externalOnly: z.boolean().default(false),
  /** 0 turns the attendee-count test off. */
  minAttendees: z.number().int().min(0).default(0),
  keywords: z.array(z.string().min(1)).default([]),
  organizerDomains: z.array(z.string().min(1)).default([]),
  vipAttendees: z.array(z.string().min(1)).default([]),
  prepMinutesBefore: z.number().int().positive().default(15),
});

export const DEFAULT_MEETING_RULES: z.input<typeof meetingRuleSchema>[] = [
  { name: "external_meetings", externalOnly: true, prepMinutesBefore: 15 },
  { name: "large_meetings", minAttendees: 5, prepMinutesBefore: 30 },
  {
    name: "important_keywords",
    keywords: ["interview", "review", "board", "exec", "client", "partner"],
    prepMinutesBefore: 30,
  },
];

const meetingsSchema = z.object({
  enabled: z.boolean().default(false),
  briefingTime: z.string().regex(TIME_OF_DAY).default("08:00"),
  briefingWindowMinutes: z.number().int().positive().default(30),
  workdayStart: z.string().regex(TIME_OF_DAY).default("09:00"),
  workdayEnd: z.string().regex(TIME_OF_DAY).default("17:00"),
  minDurationMinutes: z.number().int().min(0).default(15),
  contextDays: z.number().int().positive().default(30),
  rules: z.array(meetingRuleSchema).default(DEFAULT_MEETING_RULES),
});

const commandPortSchema = z.object({
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().default(60_000),
});

export const stewardConfigSchema = z
  .object({
    mailbox: mailboxSchema.default({}),
    logging: loggingSchema.default({}),
    organizer: organizerSchema.default({}),
    memory: memorySchema.default({}),
    alerts: alertsSchema.default({}),
    triggers: triggersSchema.default({}),
    search: searchSchema.default({}),
    digest: digestSchema.default({}),
    meetings: meetingsSchema.default({}),
    followups: z.object({ days: z.number().int().min(0).default(2) }).default({}),
    query: z
      .object({
        enabled: z.boolean().default(false),
        port: z.number().int().positive().default(19877),
        hostname: z.string().default("127.0.0.1"),
      })
      .default({}),
    classifier: commandPortSchema.default({}),
    provider: commandPortSchema.default({}),
    embeddings: commandPortSchema.default({}),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.search.chunkOverlap >= cfg.search.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["search", "chunkOverlap"],
        message: "chunkOverlap must be smaller than chunkSize",
      });
    }
    if (cfg.meetings.workdayEnd <= cfg.meetings.workdayStart) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["meetings", "workdayEnd"],
        message: "workdayEnd must be later than workdayStart",
      });
    }
  });

export function parseConfig(raw: unknown): StewardConfig {
  return stewardConfigSchema.parse(raw);
}
