/**
 * Human-readable labels for records
 */

import { getStringField, isJsonObject } from "./record.js";
import type { GameRecord, JsonValue } from "./types.js";

/**
 * Read a name that is either a plain string or a { str } / { str_sp } object
 */
function nameValue(value: JsonValue | undefined): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (isJsonObject(value)) {
    return getStringField(value, "str") ?? getStringField(value, "str_sp");
  }
  return undefined;
}

/**
 * Labels for records that carry neither id nor name
 */
function fallbackDisplayName(record: GameRecord): string | undefined {
  const field = (name: string): string => getStringField(record.value, name) ?? "";

  switch (record.itemType) {
    case "recipe": {
      const result = field("result");
      if (result === "") return undefined;
      const suffix = field("id_suffix");
      return suffix === "" ? `result: ${result}` : `result: ${result} (suffix: ${suffix})`;
    }
    case "uncraft": {
      const result = field("result");
      return result === "" ? undefined : `result: ${result}`;
    }
    case "profession_item_substitutions": {
      const trait = field("trait");
      if (trait !== "") return `trait: ${trait}`;
      const item = field("item");
      return item === "" ? undefined : `item: ${item}`;
    }
    default:
      return undefined;
  }
}

/**
 * Best label for a record: id, "(abs) <abstract>", name, or a type-specific fallback
 * @returns "(?)" when nothing identifies the record
 */
export function displayNameFor(record: GameRecord): string {
  if (record.id !== "") {
    return record.isAbstract ? `(abs) ${record.id}` : record.id;
  }

  const name = isJsonObject(record.value) ? nameValue(record.value["name"]) : undefined;
  if (name) {
    return name;
  }

  return fallbackDisplayName(record) ?? "(?)";
}
