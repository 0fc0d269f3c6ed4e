import { err, ok, type Result } from "neverthrow";
import { compareAddresses, formatAddress, parseAddress } from "./address.js";
import type { ValidationError } from "./errors.js";
import { mapTokens, template, walkTokens, type Expression, type Token } from "./tokens.js";
import type {
  DeclaredResource,
  ExpandedResources,
  ResourceDeclaration,
  ResourceNode,
} from "./types.js";

const NAME_PATTERN = /^[A-Za-z_][\w-]*$/;

const validateDeclaration = (decl: ResourceDeclaration): readonly ValidationError[] => {
  const address = `${decl.type}.${decl.name}`;
  const errors: ValidationError[] = [];

  if (!NAME_PATTERN.test(decl.type)) {
    errors.push({
      code: "INVALID_DECLARATION",
      address,
      message: `Invalid resource type '${decl.type}'`,
    });
  }
  if (!NAME_PATTERN.test(decl.name)) {
    errors.push({
      code: "INVALID_DECLARATION",
      address,
      message: `Invalid resource name '${decl.name}'`,
    });
  }
  if (decl.count !== undefined && (!Number.isInteger(decl.count) || decl.count < 0)) {
    errors.push({
      code: "INVALID_DECLARATION",
      address,
      message: "count must be a non-negative integer",
    });
  }
  for (const dep of decl.dependsOn ?? []) {
    if (parseAddress(dep) === null) {
      errors.push({
        code: "INVALID_DECLARATION",
        address,
        message: `depends_on entry '${dep}' is not a resource address`,
      });
    }
  }

  if (decl.count === undefined) {
    for (const [key, value] of Object.entries(decl.attributes)) {
      walkTokens(
        value,
        (token, path) => {
          if (usesCountIndex(token)) {
            errors.push({
              code: "INVALID_EXPRESSION",
              address,
              attributePath: path,
              message: "count.index can only be used in a declaration with count",
            });
          }
        },
        key,
      );
    }
  }

  return errors;
};

const usesCountIndex = (token: Token): boolean => {
  switch (token.kind) {
    case "count_index":
      return true;
    case "ref":
      return token.index === "count.index";
    case "template":
      return token.parts.some((p) => typeof p !== "string" && usesCountIndex(p));
    case "splat":
    case "unknown":
      return false;
  }
};

const substituteIndex = (value: Expression, index: number): Expression =>
  mapTokens(value, (token): Expression => {
    switch (token.kind) {
      case "count_index":
        return index;
      case "ref":
        return token.index === "count.index" ? { ...token, index } : token;
      case "template": {
        const parts = token.parts.map((p) => {
          if (typeof p === "string") return p;
          if (p.kind === "count_index") return String(index);
          if (p.kind === "ref" && p.index === "count.index") return { ...p, index };
          return p;
        });
        return parts.every((p) => typeof p === "string") ? parts.join("") : template(...parts);
      }
      case "splat":
      case "unknown":
        return token;
    }
  });

const instantiate = (decl: ResourceDeclaration, index?: number): ResourceNode => {
  const attributes: Record<string, Expression> = {};
  for (const [key, value] of Object.entries(decl.attributes)) {
    attributes[key] = index === undefined ? value : substituteIndex(value, index);
  }
  const base = {
    address: formatAddress(decl.type, decl.name, index),
    type: decl.type,
    name: decl.name,
    attributes,
    dependsOn: decl.dependsOn ?? [],
    lifecycle: decl.lifecycle ?? {},
  };
  return index === undefined ? base : { ...base, index };
};

/**
 * Turns declarations into concrete nodes. `count` declarations become `type.name[i]`
 * nodes with `count.index` substituted, before any reference is looked at.
 */
export const expandDeclarations = (
  declarations: readonly ResourceDeclaration[],
): Result<ExpandedResources, readonly ValidationError[]> => {
  const errors: ValidationError[] = [];
  const declared = new Map<string, DeclaredResource>();
  const nodes: ResourceNode[] = [];

  for (const decl of declarations) {
    const declErrors = validateDeclaration(decl);
    if (declErrors.length > 0) {
      errors.push(...declErrors);
      continue;
    }

    const resource = formatAddress(decl.type, decl.name);
    if (declared.has(resource)) {
      errors.push({
        code: "DUPLICATE_ADDRESS",
        address: resource,
        message: `Resource '${resource}' is declared more than once`,
      });
      continue;
    }

    if (decl.count === undefined) {
      declared.set(resource, { kind: "single" });
      nodes.push(instantiate(decl));
    } else {
      declared.set(resource, { kind: "collection", count: decl.count });
      for (let i = 0; i < decl.count; i++) {
        nodes.push(instantiate(decl, i));
      }
    }
  }

  if (errors.length > 0) {
    return err(errors);
  }

  nodes.sort((a, b) => compareAddresses(a.address, b.address));
  return ok({ nodes, declared });
};
