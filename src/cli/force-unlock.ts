import { ok, err, type Result } from "neverthrow";
import { loadProject, type CliError, type ProjectOptions } from "./project.js";

export type ForceUnlockOptions = ProjectOptions & {
  readonly lockId: string;
};

/** Releases a lock left behind by a run that died, whoever holds it. */
export const runForceUnlock = async (options: ForceUnlockOptions): Promise<Result<number, CliError>> => {
  const project = await loadProject(options);
  if (project.isErr()) {
    return err(project.error);
  }
  const backend = project.value.backend;

  const held = await backend.readLock();
  if (held.isErr()) {
    return err({ kind: "engine", error: held.error });
  }
  if (held.value === undefined) {
    console.log("State is not locked.");
    return ok(0);
  }

  const released = await backend.forceUnlock(options.lockId);
  if (released.isErr()) {
    return err({ kind: "engine", error: released.error });
  }
  console.log(`Released lock ${options.lockId} held by ${held.value.who} (${held.value.operation}).`);
  return ok(0);
};
