import { z } from "zod";

const timestampSchema = z
  .union([z.string().datetime({ offset: true }), z.number().int().nonnegative()])
  .transform((value) => (typeof value === "number" ? value : Date.parse(value)));

const address = z.string().trim().min(1);

export const incomingAttachmentSchema = z.object({
  id: z.string().min(1),
  filename: z.string().min(1),
  contentType: z.string().nullish(),
  size: z.number().int().nonnegative().default(0),
  extractedText: z.string().nullish(),
  extractionStatus: z.enum(["pending", "complete"]).default("complete"),
});

/** One item as the provider reports it, after HTML-to-text conversion. */
export const incomingItemSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["message", "event"]).default("message"),
  conversationId: z.string().min(1).nullish(),
  sender: address,
  senderName: z.string().nullish(),
  toRecipients: z.array(address).default([]),
  ccRecipients: z.array(address).default([]),
  subject: z.string().default(""),
  bodyPreview: z.string().default(""),
  bodyText: z.string().nullish(),
  receivedAt: timestampSchema,
  organizer: z.string().nullish(),
  attendees: z.array(address).default([]),
  location: z.string().nullish(),
  startAt: timestampSchema.nullish(),
  endAt: timestampSchema.nullish(),
  extractionStatus: z.enum(["pending", "complete"]).optional(),
  attachments: z.array(incomingAttachmentSchema).default([]),
});

export const deletionSchema = z.object({
  id: z.string().min(1),
  mode: z.enum(["hard", "soft"]).default("hard"),
});

/** Items stay `unknown` here so one bad item does not reject the whole batch. */
export const syncBatchSchema = z.object({
  items: z.array(z.unknown()).default([]),
  deletions: z.array(deletionSchema).default([]),
  cursor: z.string().nullable().default(null),
});

export type IncomingItem = z.infer<typeof incomingItemSchema>;
export type SyncBatch = z.infer<typeof syncBatchSchema>;
