/**
 * Narrowing helpers for JSON payloads from the catalog and the streams.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(obj: JsonRecord, key: string): string | undefined {
  const v = obj[key];
  return typeof v === 'string' ? v : undefined;
}

/** String field, or a numeric one rendered as a string (ids come both ways) */
export function getId(obj: JsonRecord, key: string): string | undefined {
  const v = obj[key];
  if (typeof v === 'string' && v.length > 0) return v;
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return undefined;
}

/** Finite number, accepting numeric strings */
export function getNumber(obj: JsonRecord, key: string): number | undefined {
  return toNumber(obj[key]);
}

export function toNumber(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function getArray(obj: JsonRecord, key: string): unknown[] {
  const v = obj[key];
  return Array.isArray(v) ? v : [];
}

/** JSON.parse that reports failure as undefined */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
