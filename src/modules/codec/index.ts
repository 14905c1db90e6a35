import { DecodeError } from '../../errors';
import type { JsonValue } from '../../types';

const INDENT = '  ';

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Structural JSON check that never rebuilds the value, so own `__proto__`
 * members (as produced by JSON.parse) survive.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isPlainObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * True when `value` holds an integer JSON.parse could not represent exactly.
 */
export function hasUnsafeInteger(value: JsonValue): boolean {
  if (typeof value === 'number') return Number.isInteger(value) && !Number.isSafeInteger(value);
  if (value === null || typeof value !== 'object') return false;
  return Object.values(value).some(hasUnsafeInteger);
}

/**
 * Renders a JSON value with object keys in lexical order at every depth and
 * 2-space indentation. Unlike JSON.stringify, integer-like keys ("10", "9")
 * are not hoisted ahead of the others.
 */
export function stringifyCanonical(value: JsonValue, depth = 0): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  const pad = INDENT.repeat(depth + 1);
  const closePad = INDENT.repeat(depth);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const items = value.map((item) => `${pad}${stringifyCanonical(item, depth + 1)}`);
    return `[\n${items.join(',\n')}\n${closePad}]`;
  }

  const keys = Object.keys(value).sort();
  if (keys.length === 0) return '{}';
  const members = keys.map(
    (key) => `${pad}${JSON.stringify(key)}: ${stringifyCanonical(value[key], depth + 1)}`,
  );
  return `{\n${members.join(',\n')}\n${closePad}}`;
}

/**
 * Checks that `value` is JSON-representable (finite numbers, plain objects, arrays).
 */
export function assertJsonValue(key: string, value: unknown): JsonValue {
  if (!isJsonValue(value)) {
    throw new DecodeError(key, 'value is not JSON-representable');
  }
  return value;
}

/**
 * Persisted form of a value: strings verbatim, everything else canonical JSON.
 */
export function encodeValue(value: JsonValue): string {
  return typeof value === 'string' ? value : stringifyCanonical(value);
}

/**
 * Persisted form when the caller asks for JSON explicitly; strings get quoted.
 */
export function encodeJson(value: JsonValue): string {
  return stringifyCanonical(value);
}

export function decodeValue(
  raw: string,
  options: { key: string; deserializeJson?: boolean },
): JsonValue {
  if (!options.deserializeJson) return raw;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeError(options.key, `malformed JSON (${reason})`, err);
  }
  return assertJsonValue(options.key, parsed);
}

const INTEGER_LITERAL_RE = /^-?\d+$/;

/**
 * Best-effort decode used by export: JSON when the text parses, the raw string
 * otherwise. Integer literals beyond the safe range stay strings so that no
 * digits are lost on the way out.
 */
export function decodeRichest(raw: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }

  if (
    typeof parsed === 'number' &&
    !Number.isSafeInteger(parsed) &&
    INTEGER_LITERAL_RE.test(raw.trim())
  ) {
    return raw;
  }

  return isJsonValue(parsed) ? parsed : raw;
}
