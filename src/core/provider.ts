import { err, type Result } from "neverthrow";
import { z } from "zod";
import { fatalError, type ProviderError } from "./errors.js";
import type { JsonValue } from "./tokens.js";
import type { StateAttributes } from "./types.js";

export type ProviderAttributes = Readonly<Record<string, JsonValue>>;

export type CreatedObject = {
  readonly id: string;
  readonly attributes: ProviderAttributes;
};

/**
 * Remote API for one resource type. Each call is atomic from the engine's point of
 * view: it either took effect and returned `Ok`, or it did not.
 */
export type ResourceProvider = {
  create(attributes: ProviderAttributes): Promise<Result<CreatedObject, ProviderError>>;
  read(id: string): Promise<Result<ProviderAttributes, ProviderError>>;
  update(
    id: string,
    attributes: ProviderAttributes,
    prior: StateAttributes,
  ): Promise<Result<ProviderAttributes, ProviderError>>;
  delete(id: string, prior: StateAttributes): Promise<Result<void, ProviderError>>;
};

export type ProviderRegistry = Readonly<Record<string, ResourceProvider>>;

/** Runs a provider call, turning a throw or rejection into a fatal `ProviderError`. */
export const settle = async <T>(
  call: () => Promise<Result<T, ProviderError>>,
): Promise<Result<T, ProviderError>> => {
  try {
    return await call();
  } catch (e) {
    return err(fatalError(`Provider threw: ${e instanceof Error ? e.message : String(e)}`));
  }
};

const hasMethod = (value: object, name: string): boolean =>
  name in value && typeof Reflect.get(value, name) === "function";

export const isResourceProvider = (value: unknown): value is ResourceProvider =>
  typeof value === "object" &&
  value !== null &&
  ["create", "read", "update", "delete"].every((name) => hasMethod(value, name));

export const ProviderRegistrySchema = z.record(
  z.string(),
  z.custom<ResourceProvider>(isResourceProvider, {
    message: "Expected an object with create, read, update and delete methods",
  }),
);
