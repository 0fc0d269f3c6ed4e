import type { Result } from "neverthrow";
import { runApplyCommand, type ApplyCommandOptions } from "./apply.js";
import type { CliError } from "./project.js";

export type DestroyOptions = Omit<ApplyCommandOptions, "destroy">;

/** Deletes every object recorded in state, dependents first. */
export const runDestroy = (options: DestroyOptions = {}): Promise<Result<number, CliError>> =>
  runApplyCommand({ ...options, destroy: true });
