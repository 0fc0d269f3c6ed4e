import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { ResourceSchemas, ResourceTypeSchema } from "./types.js";

const ResourceTypeSchemaSchema = z.object({
  mutableAttributes: z.array(z.string()).default([]),
  createBeforeDestroy: z.boolean().default(false),
});

const ResourceSchemasSchema = z.record(z.string(), ResourceTypeSchemaSchema);

/** Types without a schema replace on any change and destroy before creating. */
export const DEFAULT_TYPE_SCHEMA: ResourceTypeSchema = {
  mutableAttributes: [],
  createBeforeDestroy: false,
};

export type SchemaError = {
  readonly field: string;
  readonly message: string;
};

export const parseSchemas = (value: unknown): Result<ResourceSchemas, SchemaError> => {
  const result = ResourceSchemasSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    return err({
      field: issue?.path.join(".") || "root",
      message: issue?.message ?? "Invalid resource schemas",
    });
  }
  return ok(result.data);
};

export const schemaFor = (schemas: ResourceSchemas, type: string): ResourceTypeSchema =>
  schemas[type] ?? DEFAULT_TYPE_SCHEMA;

export const hasSchema = (schemas: ResourceSchemas, type: string): boolean =>
  Object.prototype.hasOwnProperty.call(schemas, type);
