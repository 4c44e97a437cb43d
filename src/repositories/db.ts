import type { Pool } from 'pg';
import { toCents, type Cents } from '../lib/money.js';

export type DbExecutor = Pick<Pool, 'query'>;

export type DbRow = Record<string, unknown>;

export function mapTimestamps(row: DbRow): DbRow {
  const out: DbRow = {};
  for (const [key, value] of Object.entries(row)) {
    out[key] = value instanceof Date ? value.toISOString() : value;
  }
  return out;
}

// pg hands NUMERIC columns back as strings; they go straight to cents without a float hop
export function numericToCents(value: unknown): Cents {
  if (typeof value === 'string' || typeof value === 'number') {
    return toCents(value);
  }
  throw new TypeError(`expected NUMERIC column value, got ${typeof value}`);
}

export function nullableNumericToCents(value: unknown): Cents | null {
  return value === null || value === undefined ? null : numericToCents(value);
}

export function nullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}
