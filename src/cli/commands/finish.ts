import type { Result } from "neverthrow";
import { formatCliError, type CliError } from "../project.js";

/** Prints a command's error, if any, and sets the process exit code. */
export const finish = async (run: Promise<Result<number, CliError>>): Promise<void> => {
  const result = await run;
  if (result.isErr()) {
    console.error(`Error: ${formatCliError(result.error)}`);
    process.exitCode = 1;
    return;
  }
  process.exitCode = result.value;
};
