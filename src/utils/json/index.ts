/**
 * JSON helpers for narrowing untyped API payloads
 */

type JSONPrimitive = string | number | boolean | null;
type JSONArray = JSONValue[];
interface JSONObject { [key: string]: JSONValue }

/** Any JSON-compatible value */
export type JSONValue = JSONPrimitive | JSONArray | JSONObject;

/**
 * Check for a plain object (not null, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a string field, null when absent or of another type
 */
export function readString(obj: Record<string, unknown>, key: string): string | null {
  const value = obj[key];
  return typeof value === 'string' ? value : null;
}

/**
 * Read a finite number field, null when absent or of another type
 */
export function readNumber(obj: Record<string, unknown>, key: string): number | null {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Read a boolean field, null when absent or of another type
 */
export function readBoolean(obj: Record<string, unknown>, key: string): boolean | null {
  const value = obj[key];
  return typeof value === 'boolean' ? value : null;
}

/**
 * Read a nested object field, null when absent or not an object
 */
export function readRecord(obj: Record<string, unknown>, key: string): Record<string, unknown> | null {
  const value = obj[key];
  return isRecord(value) ? value : null;
}

/**
 * Parse JSON text without trusting its shape
 * @throws {SyntaxError} If the text is not valid JSON
 */
export function parseJson(text: string): unknown {
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
