import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type CountIndex = "count.index";

export type RefToken = {
  readonly kind: "ref";
  readonly resource: string;
  readonly index?: number | CountIndex;
  readonly attribute: string;
};

export type SplatToken = {
  readonly kind: "splat";
  readonly resource: string;
  readonly attribute: string;
};

export type CountIndexToken = {
  readonly kind: "count_index";
};

export type UnknownToken = {
  readonly kind: "unknown";
  readonly address: string;
  readonly attribute: string;
};

export type TemplatePart = string | RefToken | SplatToken | CountIndexToken | UnknownToken;

export type TemplateToken = {
  readonly kind: "template";
  readonly parts: readonly TemplatePart[];
};

export type Token = RefToken | SplatToken | CountIndexToken | UnknownToken | TemplateToken;

export type Expression =
  | null
  | boolean
  | number
  | string
  | Token
  | readonly Expression[]
  | { readonly [key: string]: Expression };

const RefTokenSchema = z.object({
  kind: z.literal("ref"),
  resource: z.string(),
  index: z.union([z.number().int().nonnegative(), z.literal("count.index")]).optional(),
  attribute: z.string(),
});

const SplatTokenSchema = z.object({
  kind: z.literal("splat"),
  resource: z.string(),
  attribute: z.string(),
});

const CountIndexTokenSchema = z.object({
  kind: z.literal("count_index"),
});

const UnknownTokenSchema = z.object({
  kind: z.literal("unknown"),
  address: z.string(),
  attribute: z.string(),
});

const TemplatePartSchema = z.union([
  z.string(),
  RefTokenSchema,
  SplatTokenSchema,
  CountIndexTokenSchema,
  UnknownTokenSchema,
]);

const TemplateTokenSchema = z.object({
  kind: z.literal("template"),
  parts: z.array(TemplatePartSchema).readonly(),
});

const TokenSchema: z.ZodType<Token> = z.union([
  RefTokenSchema,
  SplatTokenSchema,
  CountIndexTokenSchema,
  UnknownTokenSchema,
  TemplateTokenSchema,
]);

export function ref(resource: string, attribute: string, index?: number | CountIndex): RefToken {
  return index === undefined
    ? { kind: "ref", resource, attribute }
    : { kind: "ref", resource, index, attribute };
}

export function splat(resource: string, attribute: string): SplatToken {
  return { kind: "splat", resource, attribute };
}

export function countIndex(): CountIndexToken {
  return { kind: "count_index" };
}

export function unknown(address: string, attribute: string): UnknownToken {
  return { kind: "unknown", address, attribute };
}

export function template(...parts: readonly TemplatePart[]): TemplateToken {
  return { kind: "template", parts };
}

export function asToken(value: unknown): Token | null {
  const result = TokenSchema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  return null;
}

export function isToken(value: unknown): value is Token {
  return TokenSchema.safeParse(value).success;
}

const isExpressionList = (value: Expression): value is readonly Expression[] => Array.isArray(value);

export function containsUnknown(value: Expression): boolean {
  if (value === null || typeof value !== "object") {
    return false;
  }
  if (isExpressionList(value)) {
    return value.some(containsUnknown);
  }
  if (isToken(value)) {
    return value.kind === "unknown";
  }
  return Object.values(value).some(containsUnknown);
}

export function tokenToString(token: Token): string {
  switch (token.kind) {
    case "ref": {
      const index = token.index === undefined ? "" : `[${token.index}]`;
      return `\${${token.resource}${index}.${token.attribute}}`;
    }
    case "splat":
      return `\${${token.resource}[*].${token.attribute}}`;
    case "count_index":
      return "${count.index}";
    case "unknown":
      return "(known after apply)";
    case "template":
      return token.parts.map((p) => (typeof p === "string" ? p : tokenToString(p))).join("");
  }
}

export function expressionToString(value: Expression): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (isExpressionList(value)) {
    return `[${value.map(expressionToString).join(", ")}]`;
  }
  if (isToken(value)) {
    return tokenToString(value);
  }
  const entries = Object.entries(value);
  return `{${entries.map(([k, v]) => `${k} = ${expressionToString(v)}`).join(", ")}}`;
}

/** Visits every token in an expression tree together with its attribute path. */
export function walkTokens(
  value: Expression,
  visit: (token: Token, path: string) => void,
  path = "",
): void {
  if (value === null || typeof value !== "object") {
    return;
  }
  if (isExpressionList(value)) {
    value.forEach((item, i) => walkTokens(item, visit, `${path}[${i}]`));
    return;
  }
  if (isToken(value)) {
    visit(value, path);
    return;
  }
  for (const [key, item] of Object.entries(value)) {
    walkTokens(item, visit, path === "" ? key : `${path}.${key}`);
  }
}

export type TokenReplacer = (token: Token) => Expression;

export function mapTokens(value: Expression, replacer: TokenReplacer): Expression {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (isExpressionList(value)) {
    return value.map((item) => mapTokens(item, replacer));
  }
  if (isToken(value)) {
    return replacer(value);
  }
  const result: Record<string, Expression> = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = mapTokens(item, replacer);
  }
  return result;
}

export type ReferenceLookup = (token: RefToken | SplatToken) => Expression;

/**
 * Replaces references with the values returned by `lookup`. Templates collapse to a
 * string once every part is known; otherwise they become the first unresolved value
 * found in any part, including one nested in a splat's list.
 */
export function resolveExpression(value: Expression, lookup: ReferenceLookup): Expression {
  return mapTokens(value, (token) => resolveToken(token, lookup));
}

function resolveToken(token: Token, lookup: ReferenceLookup): Expression {
  switch (token.kind) {
    case "ref":
    case "splat":
      return lookup(token);
    case "count_index":
    case "unknown":
      return token;
    case "template": {
      const pieces: string[] = [];
      for (const part of token.parts) {
        if (typeof part === "string") {
          pieces.push(part);
          continue;
        }
        const resolved = resolveToken(part, lookup);
        const pending = firstToken(resolved);
        if (pending !== undefined) {
          return pending;
        }
        pieces.push(stringifyPart(resolved));
      }
      return pieces.join("");
    }
  }
}

function firstToken(value: Expression): Token | undefined {
  let found: Token | undefined;
  walkTokens(value, (token) => {
    found ??= token;
  });
  return found;
}

function stringifyPart(value: Expression): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

/** Returns the value as plain JSON, or `undefined` while any token remains. */
export function toJsonValue(value: Expression): JsonValue | undefined {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (isExpressionList(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const json = toJsonValue(item);
      if (json === undefined) {
        return undefined;
      }
      items.push(json);
    }
    return items;
  }
  if (isToken(value)) {
    return undefined;
  }
  const result: Record<string, JsonValue> = {};
  for (const [key, item] of Object.entries(value)) {
    const json = toJsonValue(item);
    if (json === undefined) {
      return undefined;
    }
    result[key] = json;
  }
  return result;
}

// --- Interpolation syntax ---

export type ExpressionSyntaxError = {
  readonly path: string;
  readonly message: string;
};

const INTERPOLATION = /\$\{([^}]*)\}/g;
const REFERENCE_SYNTAX =
  /^([A-Za-z_][\w-]*\.[A-Za-z_][\w-]*)(?:\[(\d+|\*|count\.index)\])?\.([A-Za-z_][\w-]*(?:\.[A-Za-z_][\w-]*|\[\d+\])*)$/;

function parseInterpolated(
  inner: string,
  path: string,
): Result<RefToken | SplatToken | CountIndexToken, ExpressionSyntaxError> {
  const trimmed = inner.trim();
  if (trimmed === "count.index") {
    return ok(countIndex());
  }

  const match = REFERENCE_SYNTAX.exec(trimmed);
  if (match === null) {
    return err({ path, message: `Unsupported expression: \${${trimmed}}` });
  }

  const [, resource = "", index, attribute = ""] = match;
  if (index === "*") {
    return ok(splat(resource, attribute));
  }
  if (index === "count.index") {
    return ok(ref(resource, attribute, "count.index"));
  }
  return ok(ref(resource, attribute, index === undefined ? undefined : parseInt(index, 10)));
}

/** Parses `${...}` interpolations in a string into tokens. */
export function parseTemplateString(
  value: string,
  path = "",
): Result<Expression, ExpressionSyntaxError> {
  const parts: TemplatePart[] = [];
  let lastIndex = 0;
  INTERPOLATION.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = INTERPOLATION.exec(value)) !== null) {
    if (match.index > lastIndex) {
      parts.push(value.slice(lastIndex, match.index));
    }
    const parsed = parseInterpolated(match[1] ?? "", path);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    parts.push(parsed.value);
    lastIndex = INTERPOLATION.lastIndex;
  }

  if (parts.length === 0) {
    return ok(value);
  }
  if (lastIndex < value.length) {
    parts.push(value.slice(lastIndex));
  }

  const [only] = parts;
  if (parts.length === 1 && only !== undefined && typeof only !== "string") {
    return ok(only);
  }
  return ok(template(...parts));
}

/** Decodes a JSON document value into an expression, parsing interpolation strings. */
export function decodeExpression(
  value: unknown,
  path = "",
): Result<Expression, ExpressionSyntaxError> {
  if (value === null || typeof value === "boolean") {
    return ok(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(value)
      : err({ path, message: "Numbers must be finite" });
  }
  if (typeof value === "string") {
    return parseTemplateString(value, path);
  }
  if (Array.isArray(value)) {
    const items: Expression[] = [];
    for (const [i, item] of value.entries()) {
      const decoded = decodeExpression(item, `${path}[${i}]`);
      if (decoded.isErr()) {
        return decoded;
      }
      items.push(decoded.value);
    }
    return ok(items);
  }

  const token = asToken(value);
  if (token !== null) {
    return ok(token);
  }

  const obj = z.record(z.string(), z.unknown()).safeParse(value);
  if (!obj.success) {
    return err({ path, message: `Unsupported value of type ${typeof value}` });
  }

  const result: Record<string, Expression> = {};
  for (const [key, item] of Object.entries(obj.data)) {
    const decoded = decodeExpression(item, path === "" ? key : `${path}.${key}`);
    if (decoded.isErr()) {
      return decoded;
    }
    result[key] = decoded.value;
  }
  return ok(result);
}
