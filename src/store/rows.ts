import { IntegrityError } from "../utils/errors.js";

/** A row as returned by better-sqlite3: column name to value. */
export type Row = Record<string, unknown>;

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toRows(values: unknown[]): Row[] {
  return values.filter(isRow);
}

export function toRow(value: unknown): Row | undefined {
  return isRow(value) ? value : undefined;
}

function mismatch(key: string, expected: string, value: unknown): IntegrityError {
  return new IntegrityError(`Column ${key}: expected ${expected}, got ${typeof value}`, { column: key });
}

export function text(row: Row, key: string): string {
  const value = row[key];
  if (typeof value !== "string") throw mismatch(key, "text", value);
  return value;
}

export function textOrNull(row: Row, key: string): string | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") throw mismatch(key, "text", value);
  return value;
}

export function num(row: Row, key: string): number {
  const value = row[key];
  if (typeof value === "bigint") return Number(value);
  if (typeof value !== "number") throw mismatch(key, "number", value);
  return value;
}

export function numOrNull(row: Row, key: string): number | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  return num(row, key);
}

export function bool(row: Row, key: string): boolean {
  return num(row, key) !== 0;
}

export function oneOf<T extends string>(row: Row, key: string, allowed: readonly T[]): T {
  const value = text(row, key);
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) throw mismatch(key, allowed.join("|"), value);
  return found;
}

export function oneOfOrNull<T extends string>(row: Row, key: string, allowed: readonly T[]): T | null {
  if (row[key] === null || row[key] === undefined) return null;
  return oneOf(row, key, allowed);
}

export function stringList(row: Row, key: string): string[] {
  const raw = textOrNull(row, key);
  if (raw === null || raw === "") return [];
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) throw mismatch(key, "JSON array", parsed);
  return parsed.filter((v): v is string => typeof v === "string");
}

export function blobOrNull(row: Row, key: string): Uint8Array | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  if (!(value instanceof Uint8Array)) throw mismatch(key, "blob", value);
  return value;
}

export function count(value: unknown, key = "cnt"): number {
  const row = toRow(value);
  return row ? num(row, key) : 0;
}
