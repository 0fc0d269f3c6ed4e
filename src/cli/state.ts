import { ok, err, type Result } from "neverthrow";
import { sortAddresses } from "../core/address.js";
import { findDeposed } from "../core/state.js";
import { loadProject, type CliError, type ProjectOptions } from "./project.js";

export type StateListOptions = ProjectOptions;

export type StateShowOptions = ProjectOptions & {
  readonly address: string;
};

export const runStateList = async (options: StateListOptions = {}): Promise<Result<number, CliError>> => {
  const project = await loadProject(options);
  if (project.isErr()) {
    return err(project.error);
  }
  const state = await project.value.backend.load();
  if (state.isErr()) {
    return err({ kind: "engine", error: state.error });
  }

  for (const address of sortAddresses(Object.keys(state.value.resources))) {
    console.log(address);
  }
  for (const deposed of state.value.deposed) {
    console.log(`${deposed.address} (deposed ${deposed.id})`);
  }
  return ok(0);
};

export const runStateShow = async (options: StateShowOptions): Promise<Result<number, CliError>> => {
  const project = await loadProject(options);
  if (project.isErr()) {
    return err(project.error);
  }
  const state = await project.value.backend.load();
  if (state.isErr()) {
    return err({ kind: "engine", error: state.error });
  }

  const entry = state.value.resources[options.address];
  const deposed = findDeposed(state.value, options.address);
  if (entry === undefined && deposed.length === 0) {
    console.error(`${options.address} is not in state`);
    return ok(1);
  }
  if (entry !== undefined) {
    console.log(JSON.stringify(entry, null, 2));
  }
  for (const object of deposed) {
    console.log(`# deposed ${object.id}`);
    console.log(JSON.stringify(object, null, 2));
  }
  return ok(0);
};
