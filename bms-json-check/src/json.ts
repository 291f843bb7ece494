import { ParseError, describeError } from './errors.js';
import type { CheckOutcome, JsonCodec, JsonObject, JsonValue } from './types.js';

export const standardCodec: JsonCodec = {
  parse: (text) => JSON.parse(text),
  stringify: (value, indent) => JSON.stringify(value, null, indent)
};

export const parseDocument = (text: string, codec: JsonCodec = standardCodec): CheckOutcome<JsonValue> => {
  try {
    return { ok: true, value: codec.parse(text) };
  } catch (error) {
    return { ok: false, error: new ParseError(describeError(error)) };
  }
};

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

// Own keys only.
export const getField = (value: JsonValue | undefined, key: string): JsonValue | undefined => {
  if (!isJsonObject(value) || !Object.hasOwn(value, key)) {
    return undefined;
  }
  return value[key];
};

export const getObject = (value: JsonValue | undefined, key: string): JsonObject => {
  const field = getField(value, key);
  return isJsonObject(field) ? field : {};
};

export const getArray = (value: JsonValue | undefined, key: string): JsonValue[] => {
  const field = getField(value, key);
  return Array.isArray(field) ? field : [];
};

// Missing or non-mapping levels read as an empty mapping.
export const descend = (value: JsonValue | undefined, path: readonly string[]): JsonObject => {
  let current: JsonObject = isJsonObject(value) ? value : {};
  for (const key of path) {
    current = getObject(current, key);
  }
  return current;
};

export const readNumber = (value: JsonValue | undefined, key: string): number | null => {
  const field = getField(value, key);
  return typeof field === 'number' ? field : null;
};

export const readString = (value: JsonValue | undefined, key: string): string | null => {
  const field = getField(value, key);
  return typeof field === 'string' ? field : null;
};

export const readBoolean = (value: JsonValue | undefined, key: string): boolean | null => {
  const field = getField(value, key);
  return typeof field === 'boolean' ? field : null;
};

export const jsonEquals = (left: JsonValue | undefined, right: JsonValue | undefined): boolean => {
  if (left === right) {
    return true;
  }

  if (Array.isArray(left)) {
    if (!Array.isArray(right) || left.length !== right.length) {
      return false;
    }
    const items: JsonValue[] = right;
    return left.every((item, index) => jsonEquals(item, items[index]));
  }

  if (isJsonObject(left)) {
    if (!isJsonObject(right)) {
      return false;
    }
    const source: JsonObject = left;
    const target: JsonObject = right;
    const keys = Object.keys(source);
    if (keys.length !== Object.keys(target).length) {
      return false;
    }
    return keys.every((key) => Object.hasOwn(target, key) && jsonEquals(source[key], target[key]));
  }

  return false;
};

export const utf8Length = (text: string): number => Buffer.byteLength(text, 'utf8');
