export type UnknownRecord = Record<string, unknown>;

/**
 * Narrows parsed JSON to a plain object (arrays excluded)
 */
export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
