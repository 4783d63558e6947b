/**
 * Record model: raw entries with their resolved id and type
 */

import type { GameRecord, JsonObject, JsonValue } from "./types.js";

/**
 * Narrow a JSON value to an object node
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a top-level string field, or undefined when absent or not a string
 */
export function getStringField(value: JsonValue, field: string): string | undefined {
  if (!isJsonObject(value) || !Object.hasOwn(value, field)) {
    return undefined;
  }
  const v = value[field];
  return typeof v === "string" ? v : undefined;
}

/**
 * Freeze a JSON tree and everything nested in it
 */
function deepFreeze(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (isJsonObject(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * Build a record from a raw entry
 *
 * The id prefers a non-empty `id` field and falls back to `abstract`.
 * The record keeps a frozen copy of `raw`; later edits to `raw` do not reach it.
 */
export function createRecord(raw: JsonValue): GameRecord {
  const value = deepFreeze(structuredClone(raw));
  const id = getStringField(value, "id") ?? "";
  const abstract = getStringField(value, "abstract") ?? "";
  const isAbstract = id === "" && abstract !== "";

  return Object.freeze({
    value,
    id: isAbstract ? abstract : id,
    itemType: getStringField(value, "type") ?? "",
    isAbstract,
  });
}

/**
 * Order records by (type, id) using code-unit comparison
 */
export function compareRecords(a: GameRecord, b: GameRecord): number {
  if (a.itemType !== b.itemType) {
    return a.itemType < b.itemType ? -1 : 1;
  }
  if (a.id !== b.id) {
    return a.id < b.id ? -1 : 1;
  }
  return 0;
}
