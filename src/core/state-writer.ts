import { err, ok, type Result } from "neverthrow";
import type { StateBackend } from "../backends/backend.js";
import type { StateError } from "./errors.js";
import type { StateSnapshot } from "./types.js";

export type StateTransaction = (snapshot: StateSnapshot) => StateSnapshot;

/**
 * The only writer of state during an apply. Transactions run one at a time in
 * submission order; each sees the result of the previous one and is saved before
 * the next starts, so concurrent workers never interleave partial updates.
 */
export class StateWriter {
  private snapshot: StateSnapshot;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly backend: StateBackend,
    initial: StateSnapshot,
  ) {
    this.snapshot = initial;
  }

  get current(): StateSnapshot {
    return this.snapshot;
  }

  commit(transaction: StateTransaction): Promise<Result<StateSnapshot, StateError>> {
    const run = this.tail.then(() => this.write(transaction));
    this.tail = run;
    return run;
  }

  private async write(
    transaction: StateTransaction,
  ): Promise<Result<StateSnapshot, StateError>> {
    const prior = this.snapshot;
    const next = transaction(prior);
    const saved = await this.backend.save(next, prior.serial);
    if (saved.isErr()) {
      return err(saved.error);
    }
    this.snapshot = next;
    return ok(next);
  }
}
