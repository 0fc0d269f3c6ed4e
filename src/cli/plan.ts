import { ok, err, type Result } from "neverthrow";
import { runPlan } from "../core/engine.js";
import { isEmptyPlan } from "../core/planner.js";
import type { ProviderRegistry } from "../core/provider.js";
import {
  engineInput,
  loadProject,
  loadProviders,
  type CliError,
  type ProjectOptions,
} from "./project.js";
import { formatEvent, formatPlan } from "./render.js";

export type PlanCommandOptions = ProjectOptions & {
  readonly destroy?: boolean;
  readonly skipRefresh?: boolean;
  /** Exit with 2 instead of 0 when the plan has changes. */
  readonly detailedExitcode?: boolean;
  readonly verbose?: boolean;
};

export const EXIT_CHANGES = 2;

export const runPlanCommand = async (
  options: PlanCommandOptions = {},
): Promise<Result<number, CliError>> => {
  const project = await loadProject(options);
  if (project.isErr()) {
    return err(project.error);
  }

  // Planning without a refresh never calls a provider.
  let providers: ProviderRegistry = {};
  if (options.skipRefresh !== true) {
    const loaded = await loadProviders(project.value);
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    providers = loaded.value;
  }

  const outcome = await runPlan(
    engineInput(project.value, providers, {
      destroy: options.destroy ?? false,
      skipRefresh: options.skipRefresh ?? false,
      onEvent: (event) => {
        const line = formatEvent(event);
        if (line !== null) console.log(line);
      },
    }),
  );
  if (outcome.isErr()) {
    return err({ kind: "engine", error: outcome.error });
  }

  console.log(formatPlan(outcome.value.plan, options.verbose === true));
  return ok(options.detailedExitcode === true && !isEmptyPlan(outcome.value.plan) ? EXIT_CHANGES : 0);
};
