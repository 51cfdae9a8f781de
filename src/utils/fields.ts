/**
 * Field Extraction Utility
 * Reads typed values out of loosely-shaped JSON payloads returned by
 * third-party APIs. Missing or mistyped fields fall back to defaults.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown value to a record, using an empty record otherwise.
 */
export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function readRecord(record: JsonRecord, key: string): JsonRecord {
  return asRecord(record[key]);
}

export function readArray(record: JsonRecord, key: string): unknown[] {
  const value = record[key];
  return Array.isArray(value) ? value : [];
}

export function readNumber(record: JsonRecord, key: string, fallback: number = 0): number {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function readString(record: JsonRecord, key: string, fallback: string = ''): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

export function readBoolean(record: JsonRecord, key: string, fallback: boolean = false): boolean {
  const value = record[key];
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Read an identifier that some APIs return as a number and others as a string.
 */
export function readId(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.length > 0) return value;
  return undefined;
}
