import { err, ok, type Result } from "neverthrow";
import { compareAddresses } from "./address.js";
import type { ValidationError } from "./errors.js";
import type { Reference } from "./resolver.js";
import type { ResourceNode } from "./types.js";

export type DependencyGraph = {
  readonly nodes: ReadonlyMap<string, ResourceNode>;
  /** address -> addresses that must be applied before it */
  readonly dependencies: ReadonlyMap<string, ReadonlySet<string>>;
  /** address -> addresses that depend on it (the reverse graph) */
  readonly dependents: ReadonlyMap<string, ReadonlySet<string>>;
};

type Color = "white" | "grey" | "black";

type Frame = {
  readonly id: string;
  readonly next: readonly string[];
  cursor: number;
};

/**
 * Depth-first search with white/grey/black marking on an explicit stack. Every back
 * edge to a grey node yields the cycle it closes, e.g. `["a", "b", "a"]`.
 */
export const findCycles = (
  ids: readonly string[],
  edgesOf: (id: string) => readonly string[],
): readonly string[][] => {
  const color = new Map<string, Color>(ids.map((id) => [id, "white"]));
  const cycles: string[][] = [];

  for (const start of ids) {
    if (color.get(start) !== "white") continue;

    const stack: Frame[] = [{ id: start, next: edgesOf(start), cursor: 0 }];
    color.set(start, "grey");

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) break;

      const neighbor = frame.next[frame.cursor];
      if (neighbor === undefined) {
        color.set(frame.id, "black");
        stack.pop();
        continue;
      }
      frame.cursor++;

      switch (color.get(neighbor)) {
        case "white":
          color.set(neighbor, "grey");
          stack.push({ id: neighbor, next: edgesOf(neighbor), cursor: 0 });
          break;
        case "grey": {
          const from = stack.findIndex((f) => f.id === neighbor);
          cycles.push([...stack.slice(from).map((f) => f.id), neighbor]);
          break;
        }
        case "black":
        case undefined:
          break;
      }
    }
  }

  return cycles;
};

/**
 * Kahn's algorithm. Among nodes that are ready at the same time the smallest by
 * `compare` goes first, so the order is stable across runs. Returns null on a cycle.
 */
export const topologicalSort = (
  ids: readonly string[],
  dependenciesOf: (id: string) => Iterable<string>,
  compare: (a: string, b: string) => number = compareAddresses,
): string[] | null => {
  const known = new Set(ids);
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const id of ids) {
    inDegree.set(id, 0);
    dependents.set(id, []);
  }
  for (const id of ids) {
    for (const dep of dependenciesOf(id)) {
      if (!known.has(dep)) continue;
      inDegree.set(id, (inDegree.get(id) ?? 0) + 1);
      dependents.get(dep)?.push(id);
    }
  }

  const ready = ids.filter((id) => inDegree.get(id) === 0).sort(compare);
  const order: string[] = [];

  while (ready.length > 0) {
    const current = ready.shift();
    if (current === undefined) break;
    order.push(current);

    for (const dependent of dependents.get(current) ?? []) {
      const degree = (inDegree.get(dependent) ?? 1) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) {
        insertSorted(ready, dependent, compare);
      }
    }
  }

  return order.length === ids.length ? order : null;
};

const insertSorted = (
  list: string[],
  value: string,
  compare: (a: string, b: string) => number,
): void => {
  const at = list.findIndex((item) => compare(value, item) < 0);
  if (at === -1) {
    list.push(value);
  } else {
    list.splice(at, 0, value);
  }
};

export const cycleError = (cycle: readonly string[]): ValidationError => ({
  code: "CIRCULAR_DEPENDENCY",
  cycle,
  message: `Circular dependency detected: ${cycle.join(" -> ")}`,
});

/** Merges reference edges (explicit `depends_on` included) into one acyclic graph. */
export const buildGraph = (
  nodes: readonly ResourceNode[],
  references: readonly Reference[],
): Result<DependencyGraph, readonly ValidationError[]> => {
  const byAddress = new Map<string, ResourceNode>();
  const dependencies = new Map<string, Set<string>>();
  const dependents = new Map<string, Set<string>>();

  for (const node of nodes) {
    byAddress.set(node.address, node);
    dependencies.set(node.address, new Set());
    dependents.set(node.address, new Set());
  }

  for (const reference of references) {
    dependencies.get(reference.source)?.add(reference.target);
    dependents.get(reference.target)?.add(reference.source);
  }

  const ids = nodes.map((n) => n.address);
  const sortedEdges = (id: string): readonly string[] =>
    Array.from(dependencies.get(id) ?? []).sort(compareAddresses);
  const cycles = findCycles(ids, sortedEdges);

  if (cycles.length > 0) {
    return err(cycles.map(cycleError));
  }

  return ok({ nodes: byAddress, dependencies, dependents });
};

export const dependenciesOf = (graph: DependencyGraph, address: string): readonly string[] =>
  Array.from(graph.dependencies.get(address) ?? []).sort(compareAddresses);

export const dependentsOf = (graph: DependencyGraph, address: string): readonly string[] =>
  Array.from(graph.dependents.get(address) ?? []).sort(compareAddresses);

/** Application order: every node after all of its dependencies. */
export const applyOrder = (graph: DependencyGraph): readonly string[] =>
  topologicalSort(Array.from(graph.nodes.keys()), (id) => graph.dependencies.get(id) ?? []) ?? [];

/** Deletion order: every node before the nodes it depends on. */
export const destroyOrder = (graph: DependencyGraph): readonly string[] =>
  topologicalSort(Array.from(graph.nodes.keys()), (id) => graph.dependents.get(id) ?? []) ?? [];

/** Every node that transitively depends on `address`. */
export const reachableFrom = (graph: DependencyGraph, address: string): ReadonlySet<string> => {
  const seen = new Set<string>();
  const queue = [...(graph.dependents.get(address) ?? [])];

  while (queue.length > 0) {
    const current = queue.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    queue.push(...(graph.dependents.get(current) ?? []));
  }

  return seen;
};

const quote = (value: string): string => `"${value.replace(/"/g, '\\"')}"`;

export const toDot = (graph: DependencyGraph): string => {
  const lines = ["digraph {", "  rankdir = \"BT\";"];
  for (const address of applyOrder(graph)) {
    lines.push(`  ${quote(address)};`);
  }
  for (const address of applyOrder(graph)) {
    for (const dep of dependenciesOf(graph, address)) {
      lines.push(`  ${quote(address)} -> ${quote(dep)};`);
    }
  }
  lines.push("}");
  return lines.join("\n");
};
