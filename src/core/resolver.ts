import { err, ok, type Result } from "neverthrow";
import { formatAddress, parseAddress, resourceOf } from "./address.js";
import type { ValidationError } from "./errors.js";
import { walkTokens, type RefToken, type SplatToken, type Token } from "./tokens.js";
import type { DeclaredResource, ExpandedResources, ResourceNode } from "./types.js";

export type ReferenceKind = "direct" | "indexed" | "splat" | "depends_on";

/** `source` needs `target` applied first. */
export type Reference = {
  readonly source: string;
  readonly target: string;
  readonly attributePath: string;
  readonly kind: ReferenceKind;
};

export const DEPENDS_ON_PATH = "depends_on";

type Lookup = {
  readonly declared: ReadonlyMap<string, DeclaredResource>;
  readonly addresses: ReadonlySet<string>;
};

const unresolved = (
  source: ResourceNode,
  attributePath: string,
  target: string,
  message: string,
): ValidationError => ({
  code: "UNRESOLVED_REFERENCE",
  address: source.address,
  attributePath,
  target,
  message,
});

/** Addresses a splat over `resource` expands to, in index order. */
export const instancesOf = (resource: string, declared: DeclaredResource): readonly string[] => {
  if (declared.kind === "single") {
    return [resource];
  }
  return Array.from({ length: declared.count }, (_, i) => `${resource}[${i}]`);
};

export const referenceTarget = (token: RefToken): string =>
  typeof token.index === "number" ? `${token.resource}[${token.index}]` : token.resource;

const resolveRef = (
  source: ResourceNode,
  token: RefToken,
  path: string,
  lookup: Lookup,
): Result<readonly Reference[], ValidationError> => {
  const declared = lookup.declared.get(token.resource);
  const target = referenceTarget(token);

  if (declared === undefined) {
    return err(unresolved(source, path, target, `Reference to undeclared resource '${target}'`));
  }
  if (token.index === "count.index") {
    return err(unresolved(source, path, target, "count.index used outside a counted declaration"));
  }

  if (token.index === undefined) {
    if (declared.kind === "collection") {
      return err(
        unresolved(
          source,
          path,
          target,
          `'${target}' has count set; reference an instance with [index] or all with [*]`,
        ),
      );
    }
    return ok([{ source: source.address, target, attributePath: path, kind: "direct" }]);
  }

  if (!lookup.addresses.has(target)) {
    return err(unresolved(source, path, target, `No instance '${target}' is declared`));
  }
  return ok([{ source: source.address, target, attributePath: path, kind: "indexed" }]);
};

const resolveSplat = (
  source: ResourceNode,
  token: SplatToken,
  path: string,
  lookup: Lookup,
): Result<readonly Reference[], ValidationError> => {
  const declared = lookup.declared.get(token.resource);
  if (declared === undefined) {
    return err(
      unresolved(source, path, token.resource, `Reference to undeclared resource '${token.resource}'`),
    );
  }
  return ok(
    instancesOf(token.resource, declared).map((target) => ({
      source: source.address,
      target,
      attributePath: path,
      kind: "splat" as const,
    })),
  );
};

const resolveToken = (
  source: ResourceNode,
  token: Token,
  path: string,
  lookup: Lookup,
): Result<readonly Reference[], ValidationError> => {
  switch (token.kind) {
    case "ref":
      return resolveRef(source, token, path, lookup);
    case "splat":
      return resolveSplat(source, token, path, lookup);
    case "template": {
      const refs: Reference[] = [];
      for (const part of token.parts) {
        if (typeof part === "string") continue;
        const resolved = resolveToken(source, part, path, lookup);
        if (resolved.isErr()) {
          return resolved;
        }
        refs.push(...resolved.value);
      }
      return ok(refs);
    }
    case "count_index":
    case "unknown":
      return ok([]);
  }
};

const resolveDependsOn = (
  source: ResourceNode,
  dep: string,
  lookup: Lookup,
): Result<readonly Reference[], ValidationError> => {
  const parsed = parseAddress(dep);
  const resource = resourceOf(dep);
  const declared = lookup.declared.get(resource);

  if (parsed === null || declared === undefined) {
    return err(unresolved(source, DEPENDS_ON_PATH, dep, `depends_on names undeclared '${dep}'`));
  }

  const targets =
    parsed.index === undefined
      ? instancesOf(resource, declared)
      : [formatAddress(parsed.type, parsed.name, parsed.index)];

  for (const target of targets) {
    if (!lookup.addresses.has(target)) {
      return err(unresolved(source, DEPENDS_ON_PATH, target, `No instance '${target}' is declared`));
    }
  }

  return ok(
    targets.map((target) => ({
      source: source.address,
      target,
      attributePath: DEPENDS_ON_PATH,
      kind: "depends_on" as const,
    })),
  );
};

/**
 * Extracts every reference from the nodes' attribute expressions and explicit
 * dependencies. All unresolved references are reported together.
 */
export const resolveReferences = (
  expanded: ExpandedResources,
): Result<readonly Reference[], readonly ValidationError[]> => {
  const lookup: Lookup = {
    declared: expanded.declared,
    addresses: new Set(expanded.nodes.map((n) => n.address)),
  };
  const references: Reference[] = [];
  const errors: ValidationError[] = [];

  const collect = (result: Result<readonly Reference[], ValidationError>): void => {
    if (result.isErr()) {
      errors.push(result.error);
    } else {
      references.push(...result.value);
    }
  };

  for (const node of expanded.nodes) {
    for (const [key, value] of Object.entries(node.attributes)) {
      walkTokens(value, (token, path) => collect(resolveToken(node, token, path, lookup)), key);
    }
    for (const dep of node.dependsOn) {
      collect(resolveDependsOn(node, dep, lookup));
    }
  }

  return errors.length > 0 ? err(errors) : ok(references);
};
