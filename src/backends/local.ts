import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errAsync, okAsync, ResultAsync } from "neverthrow";
import { z } from "zod";
import type { StateError } from "../core/errors.js";
import { decodeState, emptyState, encodeState } from "../core/state.js";
import type { LockInfo, LockRequest, StateSnapshot } from "../core/types.js";
import { isExpired, newLock, serialConflict, type StateBackend } from "./backend.js";

const LockInfoSchema = z.object({
  id: z.string(),
  who: z.string(),
  operation: z.string(),
  createdAt: z.string(),
  expiresAt: z.string(),
});

export type LocalBackendConfig = {
  /** Path of the state file. The lock lives beside it as `<path>.lock`. */
  readonly path: string;
  readonly now?: () => Date;
};

const isErrnoException = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && "code" in e;

const describe = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export class LocalBackend implements StateBackend {
  readonly name = "local";
  readonly statePath: string;
  readonly lockPath: string;
  private readonly now: () => Date;

  constructor(config: LocalBackendConfig) {
    this.statePath = config.path;
    this.lockPath = `${config.path}.lock`;
    this.now = config.now ?? (() => new Date());
  }

  load(): ResultAsync<StateSnapshot, StateError> {
    return this.readJson(this.statePath).andThen((json) => {
      if (json === undefined) {
        return okAsync<StateSnapshot, StateError>(emptyState());
      }
      const decoded = decodeState(json);
      return decoded.isOk()
        ? okAsync<StateSnapshot, StateError>(decoded.value)
        : errAsync<StateSnapshot, StateError>({
            kind: "decode",
            message: decoded.error,
            path: this.statePath,
          });
    });
  }

  save(snapshot: StateSnapshot, expectedSerial: number): ResultAsync<void, StateError> {
    return this.load()
      .andThen((current) => {
        if (current.serial !== expectedSerial) {
          return errAsync<void, StateError>(serialConflict(expectedSerial, current.serial));
        }
        return okAsync<void, StateError>(undefined);
      })
      .andThen(() => this.writeAtomically(this.statePath, encodeState(snapshot)));
  }

  lock(request: LockRequest): ResultAsync<LockInfo, StateError> {
    const lock = newLock(randomUUID(), request, this.now());
    return this.createLockFile(lock).orElse((error) => {
      if (error.kind !== "state_conflict" || error.lock === undefined) {
        return errAsync<LockInfo, StateError>(error);
      }
      if (!isExpired(error.lock, this.now())) {
        return errAsync<LockInfo, StateError>(error);
      }
      return this.claimExpired(error.lock).andThen(() => this.createLockFile(lock));
    });
  }

  unlock(lockId: string): ResultAsync<void, StateError> {
    return this.readLock().andThen((held) => {
      if (held?.id !== lockId) {
        return errAsync<void, StateError>({
          kind: "state_conflict",
          message: `Lock ${lockId} is not held`,
          ...(held === undefined ? {} : { lock: held }),
        });
      }
      return this.removeLockFile();
    });
  }

  forceUnlock(lockId: string): ResultAsync<void, StateError> {
    return this.readLock().andThen((held) => {
      if (held === undefined) {
        return okAsync<void, StateError>(undefined);
      }
      if (held.id !== lockId) {
        return errAsync<void, StateError>({
          kind: "state_conflict",
          message: `Lock id ${lockId} does not match the held lock`,
          lock: held,
        });
      }
      return this.removeLockFile();
    });
  }

  readLock(): ResultAsync<LockInfo | undefined, StateError> {
    return this.readJson(this.lockPath).andThen((json) => {
      if (json === undefined) {
        return okAsync<LockInfo | undefined, StateError>(undefined);
      }
      const parsed = LockInfoSchema.safeParse(json);
      return parsed.success
        ? okAsync<LockInfo | undefined, StateError>(parsed.data)
        : errAsync<LockInfo | undefined, StateError>({
            kind: "decode",
            message: "Invalid lock file",
            path: this.lockPath,
          });
    });
  }

  private createLockFile(lock: LockInfo): ResultAsync<LockInfo, StateError> {
    return ResultAsync.fromPromise(
      fs
        .mkdir(path.dirname(this.lockPath), { recursive: true })
        .then(() => fs.writeFile(this.lockPath, JSON.stringify(lock, null, 2), { flag: "wx" })),
      (e): StateError =>
        isErrnoException(e) && e.code === "EEXIST"
          ? { kind: "state_conflict", message: "State is locked" }
          : { kind: "io", message: describe(e), path: this.lockPath },
    )
      .map(() => lock)
      .orElse((error) =>
        error.kind === "state_conflict"
          ? this.readLock().andThen((held) =>
              errAsync<LockInfo, StateError>(
                held === undefined ? error : { ...error, lock: held },
              ),
            )
          : errAsync<LockInfo, StateError>(error),
      );
  }

  /**
   * Moves an expired lock file aside and deletes it, as long as it is still the lock
   * that was found expired. A lock another run wrote in the meantime is put back.
   */
  private claimExpired(expired: LockInfo): ResultAsync<void, StateError> {
    const claimed = `${this.lockPath}.${randomUUID().slice(0, 8)}.expired`;
    const moved = ResultAsync.fromPromise(
      fs.rename(this.lockPath, claimed).then(
        () => true,
        (e: unknown) => {
          if (isErrnoException(e) && e.code === "ENOENT") {
            return false;
          }
          throw e;
        },
      ),
      (e): StateError => ({ kind: "io", message: describe(e), path: this.lockPath }),
    );
    return moved.andThen((wasMoved) => {
      // Already gone: the exclusive create decides who gets the lock.
      if (!wasMoved) {
        return okAsync<void, StateError>(undefined);
      }
      return this.readJson(claimed).andThen((json) => {
        const parsed = LockInfoSchema.safeParse(json);
        if (parsed.success && parsed.data.id === expired.id) {
          return this.removeFile(claimed);
        }
        const conflict: StateError = {
          kind: "state_conflict",
          message: "State is locked",
          ...(parsed.success ? { lock: parsed.data } : {}),
        };
        return this.restoreLock(claimed).andThen(() => errAsync<void, StateError>(conflict));
      });
    });
  }

  private restoreLock(claimed: string): ResultAsync<void, StateError> {
    return ResultAsync.fromPromise(
      fs.link(claimed, this.lockPath).then(
        () => undefined,
        (e: unknown) => {
          // A third run holds the lock by now.
          if (isErrnoException(e) && e.code === "EEXIST") {
            return undefined;
          }
          throw e;
        },
      ),
      (e): StateError => ({ kind: "io", message: describe(e), path: this.lockPath }),
    ).andThen(() => this.removeFile(claimed));
  }

  private removeLockFile(): ResultAsync<void, StateError> {
    return this.removeFile(this.lockPath);
  }

  private removeFile(file: string): ResultAsync<void, StateError> {
    return ResultAsync.fromPromise(
      fs.rm(file, { force: true }),
      (e): StateError => ({ kind: "io", message: describe(e), path: file }),
    );
  }

  private readJson(file: string): ResultAsync<unknown, StateError> {
    return ResultAsync.fromPromise(
      fs.readFile(file, "utf-8").then(
        (text): unknown => JSON.parse(text),
        (e: unknown) => {
          if (isErrnoException(e) && e.code === "ENOENT") {
            return undefined;
          }
          throw e;
        },
      ),
      (e): StateError => ({ kind: "io", message: describe(e), path: file }),
    );
  }

  private writeAtomically(file: string, contents: string): ResultAsync<void, StateError> {
    const temp = `${file}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
    return ResultAsync.fromPromise(
      fs
        .mkdir(path.dirname(file), { recursive: true })
        .then(() => fs.writeFile(temp, contents))
        .then(() => fs.rename(temp, file)),
      (e): StateError => ({ kind: "io", message: describe(e), path: file }),
    ).orElse((error) =>
      // The write error is the one reported, even if the cleanup fails too.
      this.removeFile(temp)
        .orElse(() => okAsync<void, StateError>(undefined))
        .andThen(() => errAsync<void, StateError>(error)),
    );
  }
}
