import { randomUUID } from "node:crypto";
import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import type { StateError } from "../core/errors.js";
import { emptyState } from "../core/state.js";
import type { LockInfo, LockRequest, StateSnapshot } from "../core/types.js";
import { isExpired, newLock, serialConflict, type StateBackend } from "./backend.js";

export type MemoryBackendOptions = {
  readonly initial?: StateSnapshot;
  readonly now?: () => Date;
};

export class MemoryBackend implements StateBackend {
  readonly name = "memory";
  private snapshot: StateSnapshot;
  private held: LockInfo | undefined;
  private readonly now: () => Date;
  readonly saves: StateSnapshot[] = [];

  constructor(options: MemoryBackendOptions = {}) {
    this.snapshot = options.initial ?? emptyState();
    this.now = options.now ?? (() => new Date());
  }

  get current(): StateSnapshot {
    return this.snapshot;
  }

  get currentLock(): LockInfo | undefined {
    return this.held;
  }

  load(): ResultAsync<StateSnapshot, StateError> {
    return okAsync(this.snapshot);
  }

  save(snapshot: StateSnapshot, expectedSerial: number): ResultAsync<void, StateError> {
    if (this.snapshot.serial !== expectedSerial) {
      return errAsync(serialConflict(expectedSerial, this.snapshot.serial));
    }
    this.snapshot = snapshot;
    this.saves.push(snapshot);
    return okAsync(undefined);
  }

  lock(request: LockRequest): ResultAsync<LockInfo, StateError> {
    const now = this.now();
    if (this.held !== undefined && !isExpired(this.held, now)) {
      return errAsync({ kind: "state_conflict", message: "State is locked", lock: this.held });
    }
    this.held = newLock(randomUUID(), request, now);
    return okAsync(this.held);
  }

  unlock(lockId: string): ResultAsync<void, StateError> {
    if (this.held?.id !== lockId) {
      return errAsync({ kind: "state_conflict", message: `Lock ${lockId} is not held` });
    }
    this.held = undefined;
    return okAsync(undefined);
  }

  forceUnlock(lockId: string): ResultAsync<void, StateError> {
    if (this.held !== undefined && this.held.id === lockId) {
      this.held = undefined;
    }
    return okAsync(undefined);
  }
}
