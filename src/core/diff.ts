import { toJsonValue, type Expression, type JsonValue } from "./tokens.js";
import type { StateAttributes } from "./types.js";

const isList = (value: JsonValue): value is readonly JsonValue[] => Array.isArray(value);

export const deepEqual = (a: JsonValue | undefined, b: JsonValue | undefined): boolean => {
  if (a === b) {
    return true;
  }
  if (a === undefined || b === undefined || a === null || b === null) {
    return false;
  }
  if (typeof a !== "object" || typeof b !== "object") {
    return false;
  }
  if (isList(a) || isList(b)) {
    if (!isList(a) || !isList(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => deepEqual(item, b[i]));
  }
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) {
    return false;
  }
  return aKeys.every((key) => deepEqual(a[key], b[key]));
};

/**
 * Names of top-level attributes whose desired value differs from the recorded one.
 * Only attributes the declaration sets are compared, so provider-computed outputs in
 * state never show up. A value that is still unknown always counts as changed.
 */
export const changedAttributes = (
  desired: Readonly<Record<string, Expression>>,
  prior: StateAttributes,
  ignore: readonly string[] | "all" = [],
): readonly string[] => {
  if (ignore === "all") {
    return [];
  }
  const changed: string[] = [];
  for (const [key, value] of Object.entries(desired)) {
    if (ignore.includes(key)) continue;
    const json = toJsonValue(value);
    if (json === undefined || !deepEqual(json, prior[key])) {
      changed.push(key);
    }
  }
  return changed.sort();
};
