/**
 * Parameter maps: validation, comparison and merging.
 *
 * A missing parameter map (null) and an empty one are the same thing everywhere
 * in this module.
 */

import { isDeepStrictEqual } from "node:util";
import type { JSONValue, Parameters } from "../types.ts";
import { deepFreeze, describeValue, isPlainObject } from "../util.ts";

/**
 * (key, value) pairs with system-defined meaning: strings, bytestrings and their
 * characters, sorted maps, categoricals.
 */
const RESERVED_NOMINAL_PARAMETERS: Readonly<Record<string, readonly string[]>> = {
  __array__: ["string", "bytestring", "char", "byte", "sorted_map", "categorical"],
};

/** Keys compared by type equality when other parameters are ignored. */
export const TYPE_PARAMETER_KEYS = ["__array__", "__list__", "__record__", "__categorical__"] as const;

export function isReservedParameter(key: string, value: JSONValue): boolean {
  if (!Object.hasOwn(RESERVED_NOMINAL_PARAMETERS, key)) return false;
  return typeof value === "string" && RESERVED_NOMINAL_PARAMETERS[key].includes(value);
}

export function isJSONValue(value: unknown): value is JSONValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJSONValue);
      return isPlainObject(value) && Object.values(value).every(isJSONValue);
    default:
      return false;
  }
}

export function isParameters(value: unknown): value is Parameters {
  return isPlainObject(value) && Object.values(value).every(isJSONValue);
}

/**
 * Validate an optional parameter map for `owner`; undefined becomes null.
 * The result is a frozen copy, never the caller's object.
 */
export function checkParameters(owner: string, value: unknown): Parameters | null {
  if (value === null || value === undefined) return null;
  if (!isParameters(value)) {
    throw new TypeError(
      `${owner} 'parameters' must be of type dict or None, not ${describeValue(value)}`,
    );
  }
  return deepFreeze(structuredClone(value));
}

function size(params: Parameters | null): number {
  return params === null ? 0 : Object.keys(params).length;
}

export function jsonEqual(a: JSONValue, b: JSONValue): boolean {
  return isDeepStrictEqual(a, b);
}

/** Exact comparison of every key. */
export function parametersEqual(a: Parameters | null, b: Parameters | null): boolean {
  if (size(a) === 0 || size(b) === 0) return size(a) === size(b);
  return isDeepStrictEqual(a, b);
}

/** Comparison restricted to the type-level keys. */
export function typeParametersEqual(a: Parameters | null, b: Parameters | null): boolean {
  for (const key of TYPE_PARAMETER_KEYS) {
    const x = a?.[key] ?? null;
    const y = b?.[key] ?? null;
    if (!isDeepStrictEqual(x, y)) return false;
  }
  return true;
}

/** Merge two maps; keys of `outer` win. Returns null when the result is empty. */
export function parametersUnion(
  inner: Parameters | null,
  outer: Parameters | null,
): Parameters | null {
  if (size(outer) === 0) return size(inner) === 0 ? null : inner;
  if (size(inner) === 0) return outer;
  return { ...inner, ...outer };
}

export function arrayParameter(params: Parameters | null): JSONValue {
  return params?.__array__ ?? null;
}

/** True for list parameters marking a string or bytestring. */
export function isStringLike(params: Parameters | null): boolean {
  const a = arrayParameter(params);
  return a === "string" || a === "bytestring";
}

/** Render as `{"key": value, ...}` with the spacing used in type strings. */
export function formatParameters(params: Parameters): string {
  const items = Object.entries(params).map(
    ([k, v]) => `${JSON.stringify(k)}: ${JSON.stringify(v)}`,
  );
  return `{${items.join(", ")}}`;
}
