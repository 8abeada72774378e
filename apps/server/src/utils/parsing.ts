/**
 * Defensive parsing helpers for media server responses.
 *
 * Plex reports numbers as numbers in JSON and as strings in XML-derived
 * payloads, and a child may arrive as a single record, a list, or not at all.
 * These helpers resolve all of that once, at the boundary.
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a value to string, empty string when absent
 */
export function parseString(value: unknown, defaultValue = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return defaultValue;
}

/**
 * Parse a value to a finite number, defaultValue when absent or not numeric
 */
export function parseNumber(value: unknown, defaultValue = 0): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : defaultValue;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : defaultValue;
  }
  return defaultValue;
}

export function parseOptionalNumber(value: unknown): number | undefined {
  const parsed = parseNumber(value, Number.NaN);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Collapse a child that may be absent, a single record or a list of records
 * into a list of records. Non-record entries are dropped.
 */
export function asRecordList(value: unknown): UnknownRecord[] {
  if (Array.isArray(value)) return value.filter(isRecord);
  if (isRecord(value)) return [value];
  return [];
}

/**
 * First record of a maybe-list child
 */
export function firstRecord(value: unknown): UnknownRecord | undefined {
  return asRecordList(value)[0];
}
