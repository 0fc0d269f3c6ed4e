import { err, ok, type Result } from "neverthrow";
import { compareAddresses } from "./address.js";
import { changedAttributes } from "./diff.js";
import type { ValidationError } from "./errors.js";
import { expandDeclarations } from "./expand.js";
import {
  applyOrder,
  buildGraph,
  cycleError,
  dependenciesOf,
  dependentsOf,
  findCycles,
  topologicalSort,
  type DependencyGraph,
} from "./graph.js";
import { instancesOf, referenceTarget, resolveReferences } from "./resolver.js";
import { hasSchema, schemaFor } from "./schema.js";
import { readAttribute, splitAttributePath } from "./state.js";
import {
  isToken,
  resolveExpression,
  toJsonValue,
  unknown,
  type Expression,
  type RefToken,
  type SplatToken,
} from "./tokens.js";
import type {
  ChangeAction,
  DeclaredResource,
  Diagnostic,
  ExpandedResources,
  LifecycleDef,
  Plan,
  PlanStep,
  ReplaceOrder,
  ResourceChange,
  ResourceDeclaration,
  ResourceNode,
  ResourceSchemas,
  StateAttributes,
  StateEntry,
  StateSnapshot,
} from "./types.js";

export type PlanOptions = {
  readonly schemas?: ResourceSchemas;
  /** Plan the removal of every object recorded in state. */
  readonly destroy?: boolean;
};

type Classified = {
  readonly node: ResourceNode;
  readonly prior: StateEntry | undefined;
  readonly action: Exclude<ChangeAction, "delete">;
  readonly replaceOrder?: ReplaceOrder;
  readonly changed: readonly string[];
  readonly forcesReplacement: readonly string[];
  readonly resolved: Readonly<Record<string, Expression>>;
};

/** Something the plan deletes: a removed object, a replaced object or a deposed one. */
type Doomed = {
  readonly stepId: string;
  readonly address: string;
  readonly dependencies: readonly string[];
  /** Orphans and deposed objects wait for desired updates that stop using them. */
  readonly detached: boolean;
};

type StepDraft = {
  readonly step: Omit<PlanStep, "dependsOn">;
  readonly dependsOn: Set<string>;
};

export const mainStepId = (address: string, action: Exclude<ChangeAction, "delete">): string => {
  switch (action) {
    case "create":
    case "replace":
      return `${address}:create`;
    case "update":
      return `${address}:update`;
    case "noop":
      return `${address}:noop`;
  }
};

export const deleteStepId = (address: string): string => `${address}:delete`;

export const deposedStepId = (address: string, id: string): string =>
  `${address}:delete:deposed:${id}`;

const addressOfStep = (id: string): string => id.slice(0, id.indexOf(":"));

/** Steps order by address, then by id, whenever the graph leaves them unordered. */
export const compareStepIds = (a: string, b: string): number =>
  compareAddresses(addressOfStep(a), addressOfStep(b)) || (a < b ? -1 : a > b ? 1 : 0);

// --- Classification ---

const plannedValue = (
  target: string,
  attribute: string,
  planned: ReadonlyMap<string, Classified>,
  state: StateSnapshot,
): Expression => {
  const change = planned.get(target);
  const entry = state.resources[target];
  const later = unknown(target, attribute);
  if (change === undefined || entry === undefined) {
    return later;
  }
  if (change.action === "create" || change.action === "replace") {
    return later;
  }

  const [head, ...rest] = splitAttributePath(attribute);
  if (typeof head === "string" && change.changed.includes(head)) {
    const desired = change.resolved[head];
    if (rest.length === 0 && desired !== undefined && toJsonValue(desired) !== undefined) {
      return desired;
    }
    return later;
  }
  return readAttribute(entry, attribute) ?? later;
};

const planLookup =
  (
    declared: ReadonlyMap<string, DeclaredResource>,
    planned: ReadonlyMap<string, Classified>,
    state: StateSnapshot,
  ) =>
  (token: RefToken | SplatToken): Expression => {
    if (token.kind === "ref") {
      return plannedValue(referenceTarget(token), token.attribute, planned, state);
    }
    const collection = declared.get(token.resource);
    return collection === undefined
      ? []
      : instancesOf(token.resource, collection).map((target) =>
          plannedValue(target, token.attribute, planned, state),
        );
  };

const resolveAttributes = (
  attributes: Readonly<Record<string, Expression>>,
  lookup: (token: RefToken | SplatToken) => Expression,
): Record<string, Expression> => {
  const resolved: Record<string, Expression> = {};
  for (const [key, value] of Object.entries(attributes)) {
    resolved[key] = resolveExpression(value, lookup);
  }
  return resolved;
};

const classify = (
  node: ResourceNode,
  prior: StateEntry | undefined,
  resolved: Readonly<Record<string, Expression>>,
  schemas: ResourceSchemas,
): Classified => {
  const base = { node, prior, resolved };
  if (prior === undefined) {
    return {
      ...base,
      action: "create",
      changed: Object.keys(resolved).sort(),
      forcesReplacement: [],
    };
  }

  const changed = changedAttributes(resolved, prior.attributes, node.lifecycle.ignoreChanges);
  if (changed.length === 0) {
    return { ...base, action: "noop", changed, forcesReplacement: [] };
  }

  const schema = schemaFor(schemas, node.type);
  const forcesReplacement = changed.filter((key) => !schema.mutableAttributes.includes(key));
  if (forcesReplacement.length === 0) {
    return { ...base, action: "update", changed, forcesReplacement };
  }

  const createFirst = node.lifecycle.createBeforeDestroy ?? schema.createBeforeDestroy;
  return {
    ...base,
    action: "replace",
    replaceOrder: createFirst ? "create_before_destroy" : "destroy_before_create",
    changed,
    forcesReplacement,
  };
};

/**
 * A create-before-destroy replacement cannot wait on a dependency that is destroyed
 * first: the old dependent still holds it. Such dependencies switch to create first too.
 */
const propagateCreateBeforeDestroy = (
  classified: Map<string, Classified>,
  graph: DependencyGraph,
): void => {
  const queue = Array.from(classified.values())
    .filter((c) => c.replaceOrder === "create_before_destroy")
    .map((c) => c.node.address);

  while (queue.length > 0) {
    const address = queue.pop();
    if (address === undefined) break;
    for (const dep of dependenciesOf(graph, address)) {
      const change = classified.get(dep);
      if (change?.replaceOrder === "destroy_before_create") {
        classified.set(dep, { ...change, replaceOrder: "create_before_destroy" });
        queue.push(dep);
      }
    }
  }
};

/** Attributes a declaration ignores keep their recorded value on update. */
const keepIgnored = (
  attributes: Readonly<Record<string, Expression>>,
  prior: StateAttributes,
  lifecycle: LifecycleDef,
): Readonly<Record<string, Expression>> => {
  const ignored = lifecycle.ignoreChanges;
  if (ignored === undefined || ignored === "all") {
    return attributes;
  }
  const kept: Record<string, Expression> = { ...attributes };
  for (const key of ignored) {
    const recorded = prior[key];
    if (recorded !== undefined && key in kept) {
      kept[key] = recorded;
    }
  }
  return kept;
};

// --- Validation after classification ---

const isList = (value: Expression): value is readonly Expression[] => Array.isArray(value);

const findLiteral = (value: Expression, needle: string, path: string): string | undefined => {
  if (value === needle) {
    return path;
  }
  if (value === null || typeof value !== "object" || isToken(value)) {
    return undefined;
  }
  if (isList(value)) {
    for (const [i, item] of value.entries()) {
      const found = findLiteral(item, needle, `${path}[${i}]`);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  for (const [key, item] of Object.entries(value)) {
    const found = findLiteral(item, needle, path === "" ? key : `${path}.${key}`);
    if (found !== undefined) return found;
  }
  return undefined;
};

const danglingReferences = (
  orphans: readonly (readonly [string, StateEntry])[],
  desired: readonly Classified[],
): ValidationError[] => {
  const errors: ValidationError[] = [];
  for (const [address, entry] of orphans) {
    for (const change of desired) {
      const attributePath = findLiteral(change.resolved, entry.id, "");
      if (attributePath !== undefined) {
        errors.push({
          code: "DANGLING_REFERENCE",
          address: change.node.address,
          attributePath,
          target: address,
          message: `Still refers to '${entry.id}', the id of ${address}, which this plan deletes`,
        });
      }
    }
  }
  return errors;
};

const preventDestroyError = (address: string, action: "replace" | "delete"): ValidationError => ({
  code: "PREVENT_DESTROY",
  address,
  message:
    action === "replace"
      ? "lifecycle.preventDestroy is set but a change forces replacement"
      : "lifecycle.preventDestroy is set but the plan deletes it",
});

// --- Entry point ---

export type Analysis = {
  readonly expanded: ExpandedResources;
  readonly graph: DependencyGraph;
};

/** Expansion, reference resolution and cycle detection without looking at state. */
export const analyze = (
  declarations: readonly ResourceDeclaration[],
): Result<Analysis, readonly ValidationError[]> =>
  expandDeclarations(declarations).andThen((expanded) =>
    resolveReferences(expanded)
      .andThen((references) => buildGraph(expanded.nodes, references))
      .map((graph) => ({ expanded, graph })),
  );

/**
 * Computes the changes that converge `state` to `declarations` and schedules them as
 * one ordered list of steps. Nothing is mutated; any validation error returns every
 * error found and no plan.
 */
export const plan = (
  declarations: readonly ResourceDeclaration[],
  state: StateSnapshot,
  options: PlanOptions = {},
): Result<Plan, readonly ValidationError[]> => {
  const desired = analyze(declarations);
  if (desired.isErr()) {
    return err(desired.error);
  }
  const { expanded, graph } = desired.value;
  const schemas = options.schemas ?? {};
  const destroy = options.destroy ?? false;

  const classified = new Map<string, Classified>();
  if (!destroy) {
    const lookup = planLookup(expanded.declared, classified, state);
    for (const address of applyOrder(graph)) {
      const node = graph.nodes.get(address);
      if (node === undefined) continue;
      const resolved = resolveAttributes(node.attributes, lookup);
      classified.set(address, classify(node, state.resources[address], resolved, schemas));
    }
    propagateCreateBeforeDestroy(classified, graph);
  }

  const orphans = Object.entries(state.resources)
    .filter(([address]) => !classified.has(address))
    .sort(([a], [b]) => compareAddresses(a, b));

  const errors: ValidationError[] = [];
  const lifecycles = new Map(expanded.nodes.map((n) => [n.address, n.lifecycle]));
  for (const change of classified.values()) {
    if (change.action === "replace" && change.node.lifecycle.preventDestroy === true) {
      errors.push(preventDestroyError(change.node.address, "replace"));
    }
  }
  for (const [address] of orphans) {
    if (lifecycles.get(address)?.preventDestroy === true) {
      errors.push(preventDestroyError(address, "delete"));
    }
  }
  errors.push(...danglingReferences(orphans, Array.from(classified.values())));

  // --- Steps ---

  const drafts = new Map<string, StepDraft>();
  const changeSteps: { change: ResourceChange; stepIds: string[] }[] = [];
  const doomed: Doomed[] = [];
  const diagnostics: Diagnostic[] = [];

  const add = (step: Omit<PlanStep, "dependsOn">): string => {
    drafts.set(step.id, { step, dependsOn: new Set() });
    return step.id;
  };
  const link = (from: string, to: string): void => {
    if (from !== to && drafts.has(to)) {
      drafts.get(from)?.dependsOn.add(to);
    }
  };
  const mainOf = (address: string): string | undefined => {
    const change = classified.get(address);
    return change === undefined ? undefined : mainStepId(address, change.action);
  };

  const addDeposed = (address: string, prior: StateEntry, action: ChangeAction): string => {
    const id = add({
      id: deposedStepId(address, prior.id),
      address,
      type: prior.type,
      operation: "delete",
      action,
      attributes: {},
      dependencies: prior.dependencies,
      priorId: prior.id,
      priorAttributes: prior.attributes,
      deposed: true,
      ...(action === "replace" ? { replace: "create_before_destroy" as const } : {}),
    });
    doomed.push({ stepId: id, address, dependencies: prior.dependencies, detached: action === "delete" });
    return id;
  };

  /** Deposed objects go once the current object and everything using it are in place. */
  const afterReplacement = (deposedId: string, address: string): void => {
    const main = mainOf(address);
    if (main !== undefined) link(deposedId, main);
    for (const dependent of dependentsOf(graph, address)) {
      const dependentMain = mainOf(dependent);
      if (dependentMain !== undefined) link(deposedId, dependentMain);
    }
  };

  for (const change of classified.values()) {
    const { node, prior } = change;
    const address = node.address;
    const stepIds: string[] = [];
    const dependencies = dependenciesOf(graph, address);

    stepIds.push(
      add({
        id: mainStepId(address, change.action),
        address,
        type: node.type,
        operation: change.action === "replace" ? "create" : change.action,
        action: change.action,
        attributes:
          change.action === "update" && prior !== undefined
            ? keepIgnored(node.attributes, prior.attributes, node.lifecycle)
            : node.attributes,
        dependencies,
        ...(prior === undefined ? {} : { priorId: prior.id, priorAttributes: prior.attributes }),
        deposed: false,
        ...(change.replaceOrder === undefined ? {} : { replace: change.replaceOrder }),
      }),
    );

    if (change.action === "replace" && prior !== undefined) {
      if (change.replaceOrder === "create_before_destroy") {
        stepIds.push(addDeposed(address, prior, "replace"));
      } else {
        const id = add({
          id: deleteStepId(address),
          address,
          type: node.type,
          operation: "delete",
          action: "replace",
          attributes: {},
          dependencies: prior.dependencies,
          priorId: prior.id,
          priorAttributes: prior.attributes,
          deposed: false,
          replace: "destroy_before_create",
        });
        doomed.push({ stepId: id, address, dependencies: prior.dependencies, detached: false });
        stepIds.push(id);
      }
      if (!hasSchema(schemas, node.type)) {
        diagnostics.push({
          severity: "warning",
          address,
          message: `No schema for type '${node.type}'; every attribute is treated as immutable`,
        });
      }
    }

    changeSteps.push({
      change: {
        address,
        type: node.type,
        action: change.action,
        ...(change.replaceOrder === undefined ? {} : { replaceOrder: change.replaceOrder }),
        changedAttributes: change.changed,
        forcesReplacement: change.forcesReplacement,
        ...(prior === undefined ? {} : { before: prior.attributes }),
        after: change.resolved,
      },
      stepIds,
    });
  }

  for (const [address, entry] of orphans) {
    const id = add({
      id: deleteStepId(address),
      address,
      type: entry.type,
      operation: "delete",
      action: "delete",
      attributes: {},
      dependencies: entry.dependencies,
      priorId: entry.id,
      priorAttributes: entry.attributes,
      deposed: false,
    });
    doomed.push({ stepId: id, address, dependencies: entry.dependencies, detached: true });
    changeSteps.push({
      change: {
        address,
        type: entry.type,
        action: "delete",
        changedAttributes: [],
        forcesReplacement: [],
        before: entry.attributes,
      },
      stepIds: [id],
    });
  }

  for (const object of state.deposed) {
    const id = addDeposed(object.address, object, "delete");
    changeSteps.push({
      change: {
        address: object.address,
        type: object.type,
        action: "delete",
        changedAttributes: [],
        forcesReplacement: [],
        before: object.attributes,
        deposedId: object.id,
      },
      stepIds: [id],
    });
  }

  // Desired steps follow their dependencies.
  for (const change of classified.values()) {
    const address = change.node.address;
    const main = mainStepId(address, change.action);
    for (const dep of dependenciesOf(graph, address)) {
      const depMain = mainOf(dep);
      if (depMain !== undefined) link(main, depMain);
    }
    if (change.replaceOrder === "destroy_before_create") {
      link(main, deleteStepId(address));
    }
    if (change.replaceOrder === "create_before_destroy" && change.prior !== undefined) {
      afterReplacement(deposedStepId(address, change.prior.id), address);
    }
  }

  // Deposed leftovers of desired objects wait like fresh create-before-destroy ones.
  for (const object of state.deposed) {
    if (classified.has(object.address)) {
      afterReplacement(deposedStepId(object.address, object.id), object.address);
    }
  }

  // An object is deleted only after everything recorded as using it.
  for (const target of doomed) {
    for (const user of doomed) {
      if (user !== target && user.dependencies.includes(target.address)) {
        link(target.stepId, user.stepId);
      }
    }
    if (!target.detached) continue;
    for (const change of classified.values()) {
      if (change.action === "update" && change.prior?.dependencies.includes(target.address) === true) {
        link(target.stepId, mainStepId(change.node.address, change.action));
      }
    }
  }

  const ids = Array.from(drafts.keys());
  const dependsOnOf = (id: string): readonly string[] =>
    Array.from(drafts.get(id)?.dependsOn ?? []).sort(compareStepIds);
  const order = topologicalSort(ids, dependsOnOf, compareStepIds);

  if (order === null) {
    errors.push(...findCycles(ids.sort(compareStepIds), dependsOnOf).map(cycleError));
  }
  if (errors.length > 0 || order === null) {
    return err(errors);
  }

  const steps: PlanStep[] = [];
  for (const id of order) {
    const draft = drafts.get(id);
    if (draft !== undefined) {
      steps.push({ ...draft.step, dependsOn: dependsOnOf(id) });
    }
  }

  const position = new Map(order.map((id, i) => [id, i]));
  const firstStep = (stepIds: readonly string[]): number =>
    Math.min(...stepIds.map((id) => position.get(id) ?? Number.MAX_SAFE_INTEGER));
  const changes = changeSteps
    .map((entry) => ({ change: entry.change, at: firstStep(entry.stepIds) }))
    .sort((a, b) => a.at - b.at)
    .map((entry) => entry.change);

  const collections: Record<string, number> = {};
  for (const [resource, declared] of expanded.declared) {
    if (declared.kind === "collection") {
      collections[resource] = declared.count;
    }
  }

  return ok({
    changes,
    steps,
    diagnostics,
    collections,
    stateSerial: state.serial,
    stateLineage: state.lineage,
  });
};

export type PlanSummary = Readonly<Record<ChangeAction, number>>;

export const planSummary = (planned: Plan): PlanSummary => {
  const summary: Record<ChangeAction, number> = {
    create: 0,
    update: 0,
    replace: 0,
    delete: 0,
    noop: 0,
  };
  for (const change of planned.changes) {
    summary[change.action]++;
  }
  return summary;
};

/** True when applying the plan would change nothing. */
export const isEmptyPlan = (planned: Plan): boolean =>
  planned.changes.every((change) => change.action === "noop");
