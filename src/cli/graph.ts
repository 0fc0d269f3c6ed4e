import { ok, err, type Result } from "neverthrow";
import { toDot } from "../core/graph.js";
import { analyze } from "../core/planner.js";
import { loadProject, type CliError, type ProjectOptions } from "./project.js";

export type GraphOptions = ProjectOptions;

/** Prints the dependency graph in Graphviz DOT syntax. */
export const runGraph = async (options: GraphOptions = {}): Promise<Result<number, CliError>> => {
  const project = await loadProject(options);
  if (project.isErr()) {
    return err(project.error);
  }
  const analysis = analyze(project.value.declarations);
  if (analysis.isErr()) {
    return err({ kind: "engine", error: { kind: "validation", errors: analysis.error } });
  }
  console.log(toDot(analysis.value.graph));
  return ok(0);
};
