import type { Logger } from "../logging/logger.js";
import { ValidationError } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import { alertConditionSchema, type AlertCondition, type AlertEventType, type AlertPredicate } from "./schema.js";
import type { RuleParserPort } from "./types.js";

const TERM = String.raw`(?:"([^"]+)"|'([^']+)'|([^\s,;]+))`;

function term(match: RegExpExecArray, offset = 1): string {
  return (match[offset] ?? match[offset + 1] ?? match[offset + 2] ?? "").trim();
}

/** Runs `re` over `text`, blanking each match so later phrases do not see it again. */
function take(text: string, re: RegExp): { rest: string; matches: RegExpExecArray[] } {
  const global = new RegExp(re.source, re.flags.includes("g") ? re.flags : `${re.flags}g`);
  const matches: RegExpExecArray[] = [];
  let m: RegExpExecArray | null;
  while ((m = global.exec(text)) !== null) {
    matches.push(m);
  }
  let rest = text;
  for (const found of matches) {
    rest = rest.replace(found[0], " ".repeat(found[0].length));
  }
  return { rest, matches };
}

/**
 * Deterministic phrase parser for common rule shapes, e.g.
 * "from *@legal.example subject contains contract" or
 * "meetings with more than 5 people". Text it cannot map to a predicate
 * makes the rule semantic.
 */
export function parseRulePhrases(ruleText: string): AlertCondition {
  let text = ruleText;
  const predicates: AlertPredicate[] = [];
  const eventTypes = new Set<AlertEventType>();

  const subject = take(text, new RegExp(String.raw`\bsubject\s+(?:contains|includes|mentions|has)\s+${TERM}`, "i"));
  text = subject.rest;
  const about = take(text, new RegExp(String.raw`\babout\s+${TERM}`, "i"));
  text = about.rest;
  const subjectKeywords = [...subject.matches, ...about.matches].map((m) => term(m));
  if (subjectKeywords.length > 0) predicates.push({ kind: "subject_keyword", keywords: subjectKeywords });

  const body = take(
    text,
    new RegExp(String.raw`\b(?:body\s+(?:contains|includes|mentions)|mentions|mentioning)\s+${TERM}`, "i"),
  );
  text = body.rest;
  if (body.matches.length > 0) predicates.push({ kind: "body_keyword", keywords: body.matches.map((m) => term(m)) });

  const organizer = take(text, new RegExp(String.raw`\borganized\s+by\s+${TERM}`, "i"));
  text = organizer.rest;
  if (organizer.matches.length > 0) {
    predicates.push({ kind: "organizer", patterns: organizer.matches.map((m) => term(m)) });
    eventTypes.add("calendar_event");
  }

  const vip = take(text, /\b(?:from\s+)?(?:a\s+)?vips?\b/i);
  text = vip.rest;

  const sender = take(text, new RegExp(String.raw`\bfrom\s+${TERM}`, "i"));
  text = sender.rest;
  if (sender.matches.length > 0) predicates.push({ kind: "sender", patterns: sender.matches.map((m) => term(m)) });

  const recipient = take(text, /\bto\s+([^\s,;]*[@*][^\s,;]*)/i);
  text = recipient.rest;
  if (recipient.matches.length > 0) {
    predicates.push({ kind: "recipient", patterns: recipient.matches.map((m) => (m[1] ?? "").trim()) });
  }

  const moreThan = take(text, /\b(?:more\s+than|over|>)\s*(\d+)\s+(?:people|attendees|participants)/i);
  text = moreThan.rest;
  const atLeast = take(text, /\bat\s+least\s+(\d+)\s+(?:people|attendees|participants)/i);
  text = atLeast.rest;
  const minAttendees = [
    ...moreThan.matches.map((m) => Number(m[1]) + 1),
    ...atLeast.matches.map((m) => Number(m[1])),
  ];
  if (minAttendees.length > 0) {
    predicates.push({ kind: "min_attendees", count: Math.max(...minAttendees) });
    eventTypes.add("calendar_event");
  }

  const label = take(text, new RegExp(String.raw`\blabel(?:l?ed)?\s+${TERM}`, "i"));
  text = label.rest;
  const labels = label.matches.map((m) => term(m));
  if (vip.matches.length > 0) labels.push("vip");
  if (labels.length > 0) predicates.push({ kind: "label", labels });

  const category = take(text, new RegExp(String.raw`\bcategor(?:y|ized\s+as)\s+${TERM}`, "i"));
  text = category.rest;
  if (category.matches.length > 0) {
    predicates.push({ kind: "category", categories: category.matches.map((m) => term(m)) });
  }

  if (/\b(?:immediate|urgent)\b/i.test(text)) predicates.push({ kind: "urgency_at_least", level: "immediate" });
  if (/\boverdue\b/i.test(text)) predicates.push({ kind: "overdue" });

  if (/\bcommitments?\b/i.test(text)) eventTypes.add("wm_commitment");
  if (/\bdecisions?\b/i.test(text)) eventTypes.add("wm_decision");
  if (/\bthreads?\b/i.test(text)) eventTypes.add("wm_thread");
  if (/\b(?:meetings?|calendar|invites?|events?)\b/i.test(text)) eventTypes.add("calendar_event");
  if (/\b(?:i\s+send|i\s+sent|outgoing|sent\s+by\s+me)\b/i.test(text)) eventTypes.add("email_sent");
  if (eventTypes.size === 0) eventTypes.add("email_received");

  return validateCondition({
    eventTypes: [...eventTypes],
    predicates,
    semantic: predicates.length === 0,
  });
}

/** Validates a raw condition, rejecting it with a ValidationError that names the problem. */
export function validateCondition(raw: unknown): AlertCondition {
  const parsed = alertConditionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "condition"}: ${i.message}`);
    throw new ValidationError(`Invalid alert condition: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

export interface RuleParserOptions {
  port?: RuleParserPort;
  timeoutMs: number;
  logger: Logger;
}

export class RuleParser {
  private readonly logger: Logger;

  constructor(private readonly opts: RuleParserOptions) {
    this.logger = opts.logger.child({ component: "rule-parser" });
  }

  async parse(ruleText: string): Promise<AlertCondition> {
    const trimmed = ruleText.trim();
    if (trimmed === "") {
      throw new ValidationError("Rule text is empty");
    }
    const port = this.opts.port;
    if (!port) {
      return parseRulePhrases(trimmed);
    }
    const raw = await withTimeout("rule parser", this.opts.timeoutMs, (signal) => port.parse(trimmed, signal));
    const condition = validateCondition(raw);
    this.logger.debug({ predicates: condition.predicates.length }, "Rule parsed");
    return condition;
  }
}
