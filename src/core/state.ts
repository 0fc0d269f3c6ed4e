import { randomUUID } from "node:crypto";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { JsonValue } from "./tokens.js";
import type { DeposedObject, StateEntry, StateSnapshot } from "./types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

const StateEntrySchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  attributes: z.record(z.string(), JsonValueSchema),
  dependencies: z.array(z.string()).default([]),
});

const DeposedObjectSchema = StateEntrySchema.extend({
  address: z.string().min(1),
});

const StateSnapshotSchema = z.object({
  version: z.literal(1),
  serial: z.number().int().nonnegative(),
  lineage: z.string().min(1),
  resources: z.record(z.string(), StateEntrySchema),
  deposed: z.array(DeposedObjectSchema).default([]),
});

export const emptyState = (lineage: string = randomUUID()): StateSnapshot => ({
  version: 1,
  serial: 0,
  lineage,
  resources: {},
  deposed: [],
});

export const decodeState = (value: unknown): Result<StateSnapshot, string> => {
  const result = StateSnapshotSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") || "root";
    return err(`${field}: ${issue?.message ?? "invalid state"}`);
  }
  return ok(result.data);
};

export const encodeState = (state: StateSnapshot): string => JSON.stringify(state, null, 2);

// --- Per-node transactions. Each returns a new snapshot with the serial bumped. ---

const bump = (state: StateSnapshot, changes: Partial<StateSnapshot>): StateSnapshot => ({
  ...state,
  ...changes,
  serial: state.serial + 1,
});

export const putResource = (
  state: StateSnapshot,
  address: string,
  entry: StateEntry,
): StateSnapshot => bump(state, { resources: { ...state.resources, [address]: entry } });

export const removeResource = (state: StateSnapshot, address: string): StateSnapshot => {
  const { [address]: _removed, ...rest } = state.resources;
  return bump(state, { resources: rest });
};

/** Moves the current object at `address` to the deposed list and records its replacement. */
export const replaceResource = (
  state: StateSnapshot,
  address: string,
  entry: StateEntry,
): StateSnapshot => {
  const prior = state.resources[address];
  const deposed = prior === undefined ? state.deposed : [...state.deposed, { ...prior, address }];
  return bump(state, { resources: { ...state.resources, [address]: entry }, deposed });
};

export const removeDeposed = (state: StateSnapshot, address: string, id: string): StateSnapshot =>
  bump(state, {
    deposed: state.deposed.filter((d) => !(d.address === address && d.id === id)),
  });

export const findDeposed = (
  state: StateSnapshot,
  address: string,
): readonly DeposedObject[] => state.deposed.filter((d) => d.address === address);

// --- Attribute paths ---

const PATH_SEGMENT = /([^.[\]]+)|\[(\d+)\]/g;

export const splitAttributePath = (path: string): readonly (string | number)[] => {
  const segments: (string | number)[] = [];
  PATH_SEGMENT.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = PATH_SEGMENT.exec(path)) !== null) {
    const [, key, index] = match;
    segments.push(index !== undefined ? parseInt(index, 10) : (key ?? ""));
  }
  return segments;
};

const isList = (value: JsonValue): value is readonly JsonValue[] => Array.isArray(value);

const step = (value: JsonValue | undefined, segment: string | number): JsonValue | undefined => {
  if (value === null || value === undefined || typeof value !== "object") {
    return undefined;
  }
  if (isList(value)) {
    return typeof segment === "number" ? value[segment] : undefined;
  }
  if (typeof segment === "number") {
    return undefined;
  }
  return Object.prototype.hasOwnProperty.call(value, segment) ? value[segment] : undefined;
};

/**
 * Reads `id`, `tags.Name` or `ips[0]` from a recorded object. `id` falls back to the
 * provider-assigned identifier.
 */
export const readAttribute = (entry: StateEntry, path: string): JsonValue | undefined => {
  const [head, ...rest] = splitAttributePath(path);
  if (head === undefined || typeof head === "number") {
    return undefined;
  }
  let value: JsonValue | undefined = entry.attributes[head];
  if (value === undefined && head === "id") {
    value = entry.id;
  }
  for (const segment of rest) {
    value = step(value, segment);
  }
  return value;
};
