/**
 * Column readers for untyped driver rows.
 * pg returns BIGINT and NUMERIC columns as strings, so numbers are coerced.
 */

import type { DbRow } from "./driver";

export function readNumber(row: DbRow, column: string): number {
  const value = row[column];
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  throw new Error(`Column ${column} is not numeric: ${String(value)}`);
}

export function readOptionalNumber(row: DbRow, column: string): number | undefined {
  const value = row[column];
  if (value === null || value === undefined) {
    return undefined;
  }
  return readNumber(row, column);
}

export function readString(row: DbRow, column: string): string {
  const value = row[column];
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

export function readOptionalString(row: DbRow, column: string): string | undefined {
  const value = row[column];
  if (value === null || value === undefined || value === "") {
    return undefined;
  }
  return typeof value === "string" ? value : String(value);
}

export function readBoolean(row: DbRow, column: string): boolean {
  const value = row[column];
  if (typeof value === "boolean") {
    return value;
  }
  return value === 1 || value === "1" || value === "t" || value === "true";
}

export function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function readOptionalDate(row: DbRow, column: string): Date | undefined {
  const seconds = readOptionalNumber(row, column);
  return seconds === undefined ? undefined : fromUnixSeconds(seconds);
}

/**
 * Parse a JSON text column into an object record, or null when absent or malformed
 */
export function readJsonRecord(row: DbRow, column: string): Record<string, unknown> | null {
  const value = row[column];
  if (typeof value !== "string" || value === "") {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
