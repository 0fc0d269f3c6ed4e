import type { ResultAsync } from "neverthrow";
import type { StateError } from "../core/errors.js";
import type { LockInfo, LockRequest, StateSnapshot } from "../core/types.js";

/**
 * Where state lives between runs. `save` is a compare-and-swap on the serial: it
 * fails with `state_conflict` when the stored serial isn't `expectedSerial`.
 */
export type StateBackend = {
  readonly name: string;
  load(): ResultAsync<StateSnapshot, StateError>;
  save(snapshot: StateSnapshot, expectedSerial: number): ResultAsync<void, StateError>;
  lock(request: LockRequest): ResultAsync<LockInfo, StateError>;
  unlock(lockId: string): ResultAsync<void, StateError>;
  /** Drops a lock without checking its owner or expiry. */
  forceUnlock(lockId: string): ResultAsync<void, StateError>;
};

export const isExpired = (lock: LockInfo, now: Date): boolean =>
  new Date(lock.expiresAt).getTime() <= now.getTime();

export const newLock = (id: string, request: LockRequest, now: Date): LockInfo => ({
  id,
  who: request.who,
  operation: request.operation,
  createdAt: now.toISOString(),
  expiresAt: new Date(now.getTime() + request.ttlMs).toISOString(),
});

export const serialConflict = (expected: number, actual: number): StateError => ({
  kind: "state_conflict",
  message: `State serial is ${actual} but ${expected} was expected; another run has changed it`,
});
