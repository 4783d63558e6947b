/**
 * Query language parsing and evaluation
 *
 * Grammar: term := [classifier ":"] (quoted | bare), quoted := "'" text "'".
 * Whitespace-separated terms are ANDed. Classifiers id/abstract/i, type/t and
 * category/c are served by the inverted index; any other classifier is a
 * dot-separated field path evaluated by walking every record.
 */

import type { FieldKind, SearchIndex } from "./search-index.js";
import type { GameRecord, JsonValue, SearchTerm } from "./types.js";
import { isJsonObject } from "./record.js";
import { metrics } from "./observability/metrics.js";

const WHITESPACE = /\s/;

const FIELD_CLASSIFIERS: ReadonlyMap<string, FieldKind> = new Map<string, FieldKind>([
  ["id", "byId"],
  ["abstract", "byId"],
  ["i", "byId"],
  ["type", "byType"],
  ["t", "byType"],
  ["category", "byCategory"],
  ["c", "byCategory"],
]);

/**
 * True if the character at `index` is preceded by an odd number of backslashes
 */
function isEscaped(input: string, index: number): boolean {
  let backslashes = 0;
  for (let i = index - 1; i >= 0 && input[i] === "\\"; i--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

/**
 * Split a query into terms, keeping quoted segments whole
 *
 * A quote opens an exact segment only at the start of a term or right after
 * a ":", and closes only when followed by whitespace or the end of input, so
 * apostrophes inside words are kept as they are.
 * @example splitQueryTerms("id:test snippet:'exact phrase'") → ["id:test", "snippet:'exact phrase'"]
 */
export function splitQueryTerms(query: string): string[] {
  const terms: string[] = [];
  let start = -1;
  let inQuotes = false;

  for (let i = 0; i < query.length; i++) {
    const ch = query.charAt(i);

    if (!inQuotes && WHITESPACE.test(ch)) {
      if (start !== -1) {
        terms.push(query.slice(start, i));
        start = -1;
      }
      continue;
    }

    if (start === -1) {
      start = i;
    }

    if (ch !== "'" || isEscaped(query, i)) {
      continue;
    }

    if (!inQuotes) {
      inQuotes = i === start || query.slice(start, i).endsWith(":");
    } else {
      const next = query.charAt(i + 1);
      if (next === "" || WHITESPACE.test(next)) {
        inQuotes = false;
      }
    }
  }

  if (start !== -1) {
    terms.push(query.slice(start));
  }

  return terms;
}

/**
 * Resolve \' and \\ inside a quoted pattern; other backslashes stay
 */
function unescapeExactPattern(raw: string): string {
  let out = "";
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (ch !== "\\") {
      out += ch;
      continue;
    }

    const next = raw.charAt(i + 1);
    if (next === "'" || next === "\\") {
      out += next;
      i++;
    } else {
      out += ch;
    }
  }
  return out;
}

function isQuoted(text: string): boolean {
  return text.length >= 2 && text.startsWith("'") && text.endsWith("'");
}

/**
 * Parse one query term; never fails
 * @example parseSearchTerm("str_min:'30'") → { classifier: "str_min", pattern: "30", exact: true }
 */
export function parseSearchTerm(term: string): SearchTerm {
  const colon = term.indexOf(":");
  const classifier = colon === -1 ? null : term.slice(0, colon);
  const valuePart = colon === -1 ? term : term.slice(colon + 1);

  if (isQuoted(valuePart)) {
    return {
      classifier,
      pattern: unescapeExactPattern(valuePart.slice(1, -1)),
      exact: true,
    };
  }

  return { classifier, pattern: valuePart, exact: false };
}

/**
 * Parse a whole query into terms
 */
export function parseQuery(query: string): SearchTerm[] {
  return splitQueryTerms(query).map(parseSearchTerm);
}

/**
 * Compare a scalar's text form with a pattern
 */
function matchesText(text: string, pattern: string, exact: boolean): boolean {
  return exact ? text === pattern : text.toLowerCase().includes(pattern);
}

/**
 * Check whether a JSON value, or anything nested in it, matches a pattern
 *
 * Exact matches compare the value's text form for equality; inexact matches
 * look for the pattern as a substring, ignoring case. Object keys are never
 * matched.
 *
 * The caller lower-cases `pattern` for inexact matches.
 */
export function matchesValue(value: JsonValue, pattern: string, exact: boolean): boolean {
  if (value === null) {
    return matchesText("null", pattern, exact);
  }

  if (typeof value === "string") {
    return matchesText(value, pattern, exact);
  }

  // '30' matches 30 exactly, '3' only as a substring
  if (typeof value === "number" || typeof value === "boolean") {
    return matchesText(String(value), pattern, exact);
  }

  if (Array.isArray(value)) {
    return value.some((item) => matchesValue(item, pattern, exact));
  }

  return Object.values(value).some((item) => matchesValue(item, pattern, exact));
}

function matchesFieldParts(
  value: JsonValue,
  parts: readonly string[],
  pattern: string,
  exact: boolean
): boolean {
  let current = value;

  for (let i = 0; i < parts.length; i++) {
    if (Array.isArray(current)) {
      // The rest of the path applies to every element
      const remaining = parts.slice(i);
      return current.some((item) => matchesFieldParts(item, remaining, pattern, exact));
    }

    const part = parts[i];
    if (part === undefined || !isJsonObject(current) || !Object.hasOwn(current, part)) {
      return false;
    }

    const next = current[part];
    if (next === undefined) {
      return false;
    }
    if (i === parts.length - 1) {
      return matchesValue(next, pattern, exact);
    }
    current = next;
  }

  return false;
}

/**
 * Check whether the value at a dot-separated path matches a pattern
 *
 * Arrays along the path fan out: `bash.items.count` matches when any element
 * of `bash.items` has a matching `count`.
 *
 * The caller lower-cases `pattern` for inexact matches.
 */
export function matchesField(
  value: JsonValue,
  fieldPath: string,
  pattern: string,
  exact: boolean
): boolean {
  return matchesFieldParts(value, fieldPath.split("."), pattern, exact);
}

/**
 * Slow path: walk every record
 */
function scanRecords(
  records: readonly GameRecord[],
  predicate: (value: JsonValue) => boolean
): Set<number> {
  const result = new Set<number>();
  records.forEach((record, position) => {
    if (predicate(record.value)) {
      result.add(position);
    }
  });
  return result;
}

/**
 * Resolve one term to the set of matching positions
 */
export function resolveTerm(
  term: SearchTerm,
  records: readonly GameRecord[],
  index: SearchIndex
): Set<number> {
  const pattern = term.exact ? term.pattern : term.pattern.toLowerCase();

  if (term.classifier !== null) {
    const kind = FIELD_CLASSIFIERS.get(term.classifier);
    if (kind) {
      metrics.recordFastPath();
      return index.lookupField(kind, term.pattern, term.exact);
    }

    metrics.recordSlowPath();
    const parts = term.classifier.split(".");
    return scanRecords(records, (value) => matchesFieldParts(value, parts, pattern, term.exact));
  }

  if (!term.exact) {
    metrics.recordFastPath();
    return index.searchWords(term.pattern);
  }

  metrics.recordSlowPath();
  return scanRecords(records, (value) => matchesValue(value, pattern, true));
}

/**
 * Intersect two sets, iterating the smaller one
 */
function intersect(a: Set<number>, b: Set<number>): Set<number> {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  const result = new Set<number>();
  for (const position of small) {
    if (large.has(position)) {
      result.add(position);
    }
  }
  return result;
}

/**
 * Find the positions of records matching every term of a query
 *
 * `index` must have been built from `records`; positions are meaningless
 * against any other array.
 * @returns Ascending, deduplicated positions; every position for an empty query
 */
export function findMatches(
  query: string,
  records: readonly GameRecord[],
  index: SearchIndex
): number[] {
  const terms = parseQuery(query);

  if (terms.length === 0) {
    return records.map((_, position) => position);
  }

  let results: Set<number> | undefined;

  for (const term of terms) {
    const matches = resolveTerm(term, records, index);
    results = results === undefined ? matches : intersect(results, matches);

    // Later terms cannot widen an empty result
    if (results.size === 0) {
      return [];
    }
  }

  return [...(results ?? [])].sort((a, b) => a - b);
}
