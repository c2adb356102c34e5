export type JsonPrimitive = string | number | boolean | null;
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export const WILDCARD = '*';

const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const tryParseJson = (text: string): { ok: true; value: JsonValue } | { ok: false } => {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
};

/**
 * Subset comparison: objects only need the pattern's keys, arrays match
 * positionally with equal length, and the string `"*"` accepts any value.
 */
export const jsonSubsetMatches = (pattern: JsonValue, actual: JsonValue): boolean => {
  if (pattern === WILDCARD) {
    return true;
  }

  if (Array.isArray(pattern)) {
    if (!Array.isArray(actual) || actual.length !== pattern.length) {
      return false;
    }
    return pattern.every((item, index) => jsonSubsetMatches(item, actual[index]));
  }

  if (isJsonObject(pattern)) {
    if (!isJsonObject(actual)) {
      return false;
    }
    return Object.entries(pattern).every(
      ([key, value]) => Object.hasOwn(actual, key) && jsonSubsetMatches(value, actual[key])
    );
  }

  return pattern === actual;
};
