import { InvalidKeyFormatError, TypeMismatchError, UnsupportedTypeError } from "../errors";

/**
 * Key grammar of the typed cache:
 *
 *   ris:<tag>:<name>
 *
 * where <tag> is a scalar type letter (s, i, f, b, j), optionally prefixed with
 * the scalar container letter `s`, or `x` followed by a set element letter
 * (s, i, f, b). Keys are written with the two-letter form.
 */
export const KEY_NAMESPACE = "ris";

const KEY_REGEX = /^ris:(x[sifb]|s[sifbj]|[sifbj]):(.+)$/s;

export type CacheScalarType = "string" | "int" | "float" | "bool" | "json";
export type SetElementType = Exclude<CacheScalarType, "json">;

export type CacheTag =
  | { container: "scalar"; type: CacheScalarType }
  | { container: "set"; type: SetElementType };

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonContainer = JsonValue[] | { [key: string]: JsonValue };
export type ScalarValue = string | number | boolean;
export type CacheValue = ScalarValue | JsonContainer | Set<ScalarValue>;

const TYPE_LETTERS: Record<CacheScalarType, string> = {
  string: "s",
  int: "i",
  float: "f",
  bool: "b",
  json: "j",
};

const LETTER_TYPES: Record<string, CacheScalarType> = {
  s: "string",
  i: "int",
  f: "float",
  b: "bool",
  j: "json",
};

// Glob fragments matching every tag form, used to resolve bare keys
export const TAG_GLOBS = ["[sifbj]", "s[sifbj]", "x[sifb]"] as const;

export interface ParsedKey {
  tag: CacheTag;
  name: string;
}

/**
 * Returns null for a bare key. Throws for a key in the `ris:` namespace that
 * does not follow the grammar.
 */
export function parseKey(key: string): ParsedKey | null {
  if (!key.startsWith(`${KEY_NAMESPACE}:`)) {
    return null;
  }
  const match = KEY_REGEX.exec(key);
  if (!match) {
    throw new InvalidKeyFormatError(key);
  }
  const [, token, name] = match;
  return { tag: tagFromToken(token), name };
}

function tagFromToken(token: string): CacheTag {
  if (token.length === 1) {
    return { container: "scalar", type: LETTER_TYPES[token] };
  }
  const type = LETTER_TYPES[token[1]];
  if (token[0] === "x") {
    if (type === "json") {
      throw new InvalidKeyFormatError(`${KEY_NAMESPACE}:${token}`);
    }
    return { container: "set", type };
  }
  return { container: "scalar", type };
}

export function tagToken(tag: CacheTag): string {
  return `${tag.container === "set" ? "x" : "s"}${TYPE_LETTERS[tag.type]}`;
}

export function formatKey(tag: CacheTag, name: string): string {
  return `${KEY_NAMESPACE}:${tagToken(tag)}:${name}`;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const constructorName = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof constructorName === "string" ? constructorName : "object";
  }
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Tag for a value written under a bare key.
 */
export function inferTag(value: unknown, setElementType: SetElementType = "string"): CacheTag {
  if (value instanceof Set) {
    return { container: "set", type: setElementType };
  }
  switch (typeof value) {
    case "string":
      return { container: "scalar", type: "string" };
    case "boolean":
      return { container: "scalar", type: "bool" };
    case "number":
      return { container: "scalar", type: Number.isSafeInteger(value) ? "int" : "float" };
  }
  if (Array.isArray(value) || isPlainObject(value)) {
    return { container: "scalar", type: "json" };
  }
  throw new UnsupportedTypeError(describe(value));
}

// Nested values JSON would drop or flatten to `{}`
function rejectUnsupported(_key: string, value: unknown): unknown {
  if (
    value === undefined ||
    value instanceof Map ||
    value instanceof Set ||
    typeof value === "function" ||
    typeof value === "bigint" ||
    typeof value === "symbol"
  ) {
    throw new UnsupportedTypeError(describe(value));
  }
  return value;
}

export function encodeScalar(key: string, type: CacheScalarType, value: unknown): string {
  switch (type) {
    case "string":
      if (typeof value !== "string") break;
      return value;
    case "int":
      if (typeof value !== "number" || !Number.isSafeInteger(value)) break;
      return String(value);
    case "float":
      if (typeof value !== "number") break;
      return String(value);
    case "bool":
      if (typeof value !== "boolean") break;
      return value ? "1" : "0";
    case "json": {
      if (value === undefined || typeof value === "function" || typeof value === "bigint" || typeof value === "symbol") {
        throw new UnsupportedTypeError(describe(value));
      }
      if (value instanceof Set || value instanceof Map) break;
      return JSON.stringify(value, rejectUnsupported);
    }
  }
  throw new TypeMismatchError(key, `expected ${type}, got ${describe(value)}`);
}

const INT_REGEX = /^[+-]?\d+$/;
const FLOAT_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOATS: Record<string, number> = {
  inf: Infinity,
  "+inf": Infinity,
  "-inf": -Infinity,
  infinity: Infinity,
  "+infinity": Infinity,
  "-infinity": -Infinity,
  nan: NaN,
};

export function decodeScalar(key: string, type: CacheScalarType, raw: string): ScalarValue | JsonValue {
  switch (type) {
    case "string":
      return raw;
    case "int": {
      const value = Number(raw.trim());
      if (!INT_REGEX.test(raw.trim()) || !Number.isSafeInteger(value)) {
        throw new TypeMismatchError(key, `'${raw}' is not an integer`);
      }
      return value;
    }
    case "float": {
      const trimmed = raw.trim();
      const special = SPECIAL_FLOATS[trimmed.toLowerCase()];
      if (special !== undefined) return special;
      if (!FLOAT_REGEX.test(trimmed)) {
        throw new TypeMismatchError(key, `'${raw}' is not a number`);
      }
      return Number(trimmed);
    }
    case "bool": {
      if (!INT_REGEX.test(raw.trim())) {
        throw new TypeMismatchError(key, `'${raw}' is not a boolean`);
      }
      return Number(raw.trim()) !== 0;
    }
    case "json":
      try {
        const parsed: JsonValue = JSON.parse(raw);
        return parsed;
      } catch {
        throw new TypeMismatchError(key, "stored value is not valid JSON");
      }
  }
}

export function encodeSetMembers(key: string, type: SetElementType, members: Iterable<unknown>): string[] {
  const encoded = new Set<string>();
  for (const member of members) {
    encoded.add(encodeScalar(key, type, member));
  }
  return Array.from(encoded);
}

export function decodeSetMembers(key: string, type: SetElementType, members: string[]): Set<ScalarValue> {
  const decoded = new Set<ScalarValue>();
  for (const member of members) {
    const value = decodeScalar(key, type, member);
    // element types are scalar, never JSON containers
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      decoded.add(value);
    }
  }
  return decoded;
}

/**
 * Decodes a scalar row into the value the store hands back. JSON rows must hold
 * a container; scalars decode to their primitive.
 */
export function decodeStoredScalar(key: string, type: CacheScalarType, raw: string): CacheValue {
  const value = decodeScalar(key, type, raw);
  if (value === null) {
    throw new TypeMismatchError(key, "stored JSON is null");
  }
  return value;
}

export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, "\\$&");
}
