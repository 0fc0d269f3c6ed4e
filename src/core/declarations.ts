import * as fs from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { decodeExpression, type Expression } from "./tokens.js";
import type { ResourceDeclaration } from "./types.js";

const LifecycleSchema = z
  .object({
    createBeforeDestroy: z.boolean().optional(),
    preventDestroy: z.boolean().optional(),
    ignoreChanges: z.union([z.array(z.string()), z.literal("all")]).optional(),
  })
  .strict();

const DeclarationSchema = z
  .object({
    type: z.string().min(1),
    name: z.string().min(1),
    attributes: z.record(z.string(), z.unknown()).default({}),
    dependsOn: z.array(z.string()).optional(),
    count: z.number().int().nonnegative().optional(),
    lifecycle: LifecycleSchema.optional(),
  })
  .strict();

const DeclarationsFileSchema = z.object({
  resources: z.array(DeclarationSchema),
});

export type DeclarationError = {
  readonly path: string;
  readonly message: string;
};

/** Decodes a `{ "resources": [...] }` document, parsing `${...}` references in strings. */
export const parseDeclarations = (
  value: unknown,
): Result<readonly ResourceDeclaration[], DeclarationError> => {
  const parsed = DeclarationsFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err({
      path: issue?.path.join(".") || "root",
      message: issue?.message ?? "Invalid declarations",
    });
  }

  const declarations: ResourceDeclaration[] = [];
  for (const [i, raw] of parsed.data.resources.entries()) {
    const attributes: Record<string, Expression> = {};
    for (const [key, item] of Object.entries(raw.attributes)) {
      const decoded = decodeExpression(item, key);
      if (decoded.isErr()) {
        return err({
          path: `resources.${i}.attributes.${decoded.error.path}`,
          message: decoded.error.message,
        });
      }
      attributes[key] = decoded.value;
    }
    declarations.push({
      type: raw.type,
      name: raw.name,
      attributes,
      ...(raw.dependsOn === undefined ? {} : { dependsOn: raw.dependsOn }),
      ...(raw.count === undefined ? {} : { count: raw.count }),
      ...(raw.lifecycle === undefined ? {} : { lifecycle: raw.lifecycle }),
    });
  }
  return ok(declarations);
};

export const readDeclarations = async (
  path: string,
): Promise<Result<readonly ResourceDeclaration[], DeclarationError>> => {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (e) {
    return err({ path, message: e instanceof Error ? e.message : String(e) });
  }
  try {
    return parseDeclarations(JSON.parse(text));
  } catch (e) {
    return err({ path, message: `Invalid JSON: ${e instanceof Error ? e.message : String(e)}` });
  }
};
