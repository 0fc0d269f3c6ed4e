import { ok, err, type Result } from "neverthrow";
import { analyze } from "../core/planner.js";
import { loadProject, type CliError, type ProjectOptions } from "./project.js";

export type ValidateOptions = ProjectOptions;

/** Checks declarations for structural errors, unresolved references and cycles. */
export const runValidate = async (options: ValidateOptions = {}): Promise<Result<number, CliError>> => {
  const project = await loadProject(options);
  if (project.isErr()) {
    return err(project.error);
  }

  const analysis = analyze(project.value.declarations);
  if (analysis.isErr()) {
    return err({ kind: "engine", error: { kind: "validation", errors: analysis.error } });
  }

  const count = analysis.value.expanded.nodes.length;
  console.log(`The declarations are valid: ${count} resource${count === 1 ? "" : "s"}.`);
  return ok(0);
};
