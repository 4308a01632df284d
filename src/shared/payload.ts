// Narrowing helpers for untyped Garmin Connect JSON

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Several endpoints answer with either an object or a list holding one
 */
export function firstRecord(value: unknown): JsonObject | undefined {
  if (Array.isArray(value)) {
    return value.length > 0 && isRecord(value[0]) ? value[0] : undefined;
  }
  return isRecord(value) ? value : undefined;
}

export function lastRecord(value: unknown): JsonObject | undefined {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const last = value[value.length - 1];
  return isRecord(last) ? last : undefined;
}

export function recordAt(source: JsonObject | undefined, key: string): JsonObject | undefined {
  const value = source?.[key];
  return isRecord(value) ? value : undefined;
}

export function numberAt(source: JsonObject | undefined, key: string): number | undefined {
  const value = source?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function stringAt(source: JsonObject | undefined, key: string): string | undefined {
  const value = source?.[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

