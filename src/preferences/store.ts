import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { TIME_OF_DAY, WEEKDAYS } from "../config/schema.js";
import { withFileLock } from "../utils/file-lock.js";
import { ValidationError } from "../utils/errors.js";

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const PREFERENCE_SCHEMAS = {
  vipSenders: z.array(z.string().trim().toLowerCase().min(1)),
  timezone: z.string().refine(isValidTimezone, "Unknown IANA timezone"),
  followupDays: z.number().int().min(0).max(90),
  digestEnabled: z.boolean(),
  digestDay: z.enum(WEEKDAYS),
  digestTime: z.string().regex(TIME_OF_DAY, "Expected HH:MM"),
  replyNudgeDays: z.number().positive().max(90),
  decisionNudgeDays: z.number().positive().max(90),
} as const;

export const preferencesSchema = z.object(PREFERENCE_SCHEMAS).partial();

export type Preferences = z.infer<typeof preferencesSchema>;
export type PreferenceKey = keyof typeof PREFERENCE_SCHEMAS;
export const PREFERENCE_KEYS = Object.keys(PREFERENCE_SCHEMAS).filter(isPreferenceKey);

export function isPreferenceKey(key: string): key is PreferenceKey {
  return Object.prototype.hasOwnProperty.call(PREFERENCE_SCHEMAS, key);
}

function fileName(user: string): string {
  return `${user.toLowerCase().replace(/[^a-z0-9@._-]/g, "_")}.json`;
}

/**
 * One JSON document per managed user. Reads are lock-free; writes hold a
 * file lock so concurrent `prefs set` calls do not lose updates.
 */
export class PreferenceStore {
  constructor(private readonly dir: string) {}

  async get(user: string): Promise<Preferences> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(user), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
      throw err;
    }
    const parsed = preferencesSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new ValidationError(`Preferences for ${user} are invalid: ${parsed.error.message}`, { user });
    }
    return parsed.data;
  }

  /** Validates and stores one key. Accepts a JSON string for CLI input. */
  async set(user: string, key: string, value: unknown): Promise<Preferences> {
    if (!isPreferenceKey(key)) {
      throw new ValidationError(`Unknown preference: ${key}`, { key, known: PREFERENCE_KEYS });
    }
    const parsed = PREFERENCE_SCHEMAS[key].safeParse(value);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => i.message).join("; ");
      throw new ValidationError(`Invalid value for ${key}: ${message}`, { key });
    }
    return this.update(user, (current) => ({ ...current, [key]: parsed.data }));
  }

  async unset(user: string, key: string): Promise<Preferences> {
    if (!isPreferenceKey(key)) {
      throw new ValidationError(`Unknown preference: ${key}`, { key, known: PREFERENCE_KEYS });
    }
    return this.update(user, (current) => {
      const next = { ...current };
      delete next[key];
      return next;
    });
  }

  private async update(user: string, fn: (current: Preferences) => Preferences): Promise<Preferences> {
    const path = this.pathFor(user);
    return withFileLock(path, async () => {
      const next = preferencesSchema.parse(fn(await this.get(user)));
      await mkdir(this.dir, { recursive: true });
      const tmp = `${path}.tmp`;
      await writeFile(tmp, JSON.stringify(next, null, 2) + "\n", "utf-8");
      await rename(tmp, path);
      return next;
    });
  }

  private pathFor(user: string): string {
    return join(this.dir, fileName(user));
  }
}
