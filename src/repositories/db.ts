import type { Pool } from 'pg';

export type DbExecutor = Pick<Pool, 'query'>;

export type DbRow = Record<string, unknown>;

export function mapTimestamps(row: DbRow): DbRow {
  const out: DbRow = { ...row };
  for (const [key, value] of Object.entries(out)) {
    if (value instanceof Date) {
      out[key] = value.toISOString();
    }
  }
  return out;
}

export function nullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function nullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : Number(value);
}
