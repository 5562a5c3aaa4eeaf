import type { Urgency } from "../store/types.js";

export interface StewardConfig {
  readonly mailbox: MailboxConfig;
  readonly logging: LoggingConfig;
  readonly organizer: OrganizerConfig;
  readonly memory: MemoryConfig;
  readonly alerts: AlertsConfig;
  readonly triggers: TriggersConfig;
  readonly search: SearchConfig;
  readonly digest: DigestConfig;
  readonly meetings: MeetingsConfig;
  readonly followups: FollowupsConfig;
  readonly query: QueryServerConfig;
  readonly classifier: CommandPortConfig;
  readonly provider: CommandPortConfig;
  readonly embeddings: CommandPortConfig;
}

export interface MailboxConfig {
  readonly owner: string;
  readonly backfill: boolean;
}

export interface LoggingConfig {
  readonly level?: "debug" | "info" | "warn" | "error" | "silent";
  readonly file?: string;
  readonly json?: boolean;
}

export interface CategoryConfig {
  readonly name: string;
  readonly description: string;
  readonly flag?: "today" | "this_week";
}

export interface OrganizerConfig {
  readonly intervalMs: number;
  readonly batchSize: number;
  readonly concurrency: number;
  readonly leaseMs: number;
  readonly maxAttempts: number;
  readonly maxClaims: number;
  readonly classifyTimeoutMs: number;
  readonly retryBaseDelayMs: number;
  readonly urgentAt: Urgency;
  readonly categoryPriority: readonly string[];
  readonly categories: readonly CategoryConfig[];
}

export interface MemoryConfig {
  readonly schedule: string;
  readonly staleAfterHours: number;
  readonly closeAfterDays: number;
  readonly replyNudgeDays: number;
  readonly decisionNudgeDays: number;
  readonly urgentStaleHours: number;
  readonly escalateAfterDays: number;
  readonly expireAfterDays: number;
  readonly nudgeCooldownHours: number;
  readonly maxNudgesPerKind: number;
  readonly observationRetentionDays: number;
}

export interface AlertsConfig {
  readonly defaultCooldownMinutes: number;
  readonly semanticTimeoutMs: number;
}

export interface TriggersConfig {
  readonly dir?: string;
  readonly capability: string;
  readonly dedupeTtlDays: number;
  readonly channel: string;
  readonly target?: string;
}

export interface SearchConfig {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly minVectorScore: number;
  readonly rrfK: number;
  readonly missingRank: number;
  readonly defaultLimit: number;
  readonly indexBatchSize: number;
}

export interface DigestConfig {
  readonly enabled: boolean;
  readonly day: Weekday;
  readonly time: string;
  readonly windowMinutes: number;
  readonly timezone: string;
}

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

export interface MeetingsConfig {
  readonly enabled: boolean;
  readonly briefingTime: string;
  readonly briefingWindowMinutes: number;
  readonly workdayStart: string;
  readonly workdayEnd: string;
  /** Shorter events get no prep. */
  readonly minDurationMinutes: number;
  /** How far back attendee correspondence is counted. */
  readonly contextDays: number;
  readonly rules: readonly MeetingRuleConfig[];
}

/** An event matches a rule when any of its configured tests passes. */
export interface MeetingRuleConfig {
  readonly name: string;
  readonly externalOnly: boolean;
  readonly minAttendees: number;
  readonly keywords: readonly string[];
  readonly organizerDomains: readonly string[];
  readonly vipAttendees: readonly string[];
  readonly prepMinutesBefore: number;
}

export interface FollowupsConfig {
  readonly days: number;
}

export interface QueryServerConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}

export interface CommandPortConfig {
  readonly command?: string;
  readonly args: readonly string[];
  readonly timeoutMs: number;
}
