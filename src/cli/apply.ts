import { ok, err, type Result } from "neverthrow";
import { runApply } from "../core/engine.js";
import {
  engineInput,
  loadProject,
  loadProviders,
  type CliError,
  type ProjectOptions,
} from "./project.js";
import { formatEvent, formatPlan, formatReport } from "./render.js";

export type ApplyCommandOptions = ProjectOptions & {
  readonly destroy?: boolean;
  readonly skipRefresh?: boolean;
  readonly parallelism?: number;
};

/**
 * Converges infrastructure to the declarations. Ctrl-C stops new steps from starting
 * and lets running ones finish.
 */
export const runApplyCommand = async (
  options: ApplyCommandOptions = {},
): Promise<Result<number, CliError>> => {
  const project = await loadProject(options);
  if (project.isErr()) {
    return err(project.error);
  }
  const providers = await loadProviders(project.value);
  if (providers.isErr()) {
    return err(providers.error);
  }

  const controller = new AbortController();
  const interrupt = (): void => {
    console.error("Interrupted: waiting for running steps to finish...");
    controller.abort();
  };
  process.once("SIGINT", interrupt);

  try {
    const outcome = await runApply(
      engineInput(project.value, providers.value, {
        destroy: options.destroy ?? false,
        skipRefresh: options.skipRefresh ?? false,
        ...(options.parallelism === undefined ? {} : { parallelism: options.parallelism }),
        signal: controller.signal,
        onEvent: (event) => {
          const line = formatEvent(event);
          if (line !== null) console.log(line);
        },
      }),
    );
    if (outcome.isErr()) {
      return err({ kind: "engine", error: outcome.error });
    }

    console.log(formatPlan(outcome.value.plan));
    console.log();
    console.log(formatReport(outcome.value.report));
    return ok(outcome.value.report.result === "success" ? 0 : 1);
  } finally {
    process.off("SIGINT", interrupt);
  }
};
