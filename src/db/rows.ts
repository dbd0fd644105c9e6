/**
 * Typed column readers for sql.js result rows.
 *
 * sql.js hands back `number | string | Uint8Array | null` per column; these
 * helpers narrow a column to the shape a record field expects.
 */

import type { SqlRow } from './index';

export type JsonObject = Record<string, unknown>;

export function readString(row: SqlRow, column: string, fallback = ''): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

export function readNullableString(row: SqlRow, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

export function readNumber(row: SqlRow, column: string, fallback = 0): number {
  const value = row[column];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function readNullableNumber(row: SqlRow, column: string): number | null {
  const value = row[column];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readBoolean(row: SqlRow, column: string): boolean {
  return readNumber(row, column) !== 0;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a JSON text column; malformed or missing text yields `undefined`. */
function readJson(row: SqlRow, column: string): unknown {
  const value = row[column];
  if (typeof value !== 'string' || value.length === 0) return undefined;
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

export function readJsonObject(row: SqlRow, column: string): JsonObject {
  const parsed = readJson(row, column);
  return isJsonObject(parsed) ? parsed : {};
}

export function readNullableJsonObject(row: SqlRow, column: string): JsonObject | null {
  const parsed = readJson(row, column);
  return isJsonObject(parsed) ? parsed : null;
}

export function readJsonArray(row: SqlRow, column: string): unknown[] {
  const parsed = readJson(row, column);
  return Array.isArray(parsed) ? parsed : [];
}

export function readJsonValue(row: SqlRow, column: string): unknown {
  return readJson(row, column) ?? null;
}

export function toJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}
