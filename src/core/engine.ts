import { hostname } from "node:os";
import { err, ok, type Result } from "neverthrow";
import type { StateBackend } from "../backends/backend.js";
import type { EngineError, StateError } from "./errors.js";
import { apply } from "./executor.js";
import { plan } from "./planner.js";
import type { ProviderRegistry } from "./provider.js";
import { refreshState, type RefreshResult } from "./refresh.js";
import type { RetryPolicy, Sleep } from "./retry.js";
import { StateWriter } from "./state-writer.js";
import type {
  ApplyEvent,
  ApplyReport,
  LockInfo,
  Plan,
  ResourceDeclaration,
  ResourceSchemas,
  StateSnapshot,
} from "./types.js";

export const DEFAULT_LOCK_TTL_MS = 15 * 60 * 1000;

export type EngineEvent =
  | ApplyEvent
  | { readonly type: "locked"; readonly lock: LockInfo }
  | { readonly type: "unlocked"; readonly lockId: string }
  | { readonly type: "unlock_failed"; readonly lockId: string; readonly message: string }
  | {
      readonly type: "refreshed";
      readonly dropped: readonly string[];
      readonly drifted: readonly string[];
    };

export type EngineInput = {
  readonly declarations: readonly ResourceDeclaration[];
  readonly backend: StateBackend;
  readonly providers: ProviderRegistry;
  readonly schemas?: ResourceSchemas;
  readonly destroy?: boolean;
  /** Read every recorded object back from its provider before planning. */
  readonly refresh?: boolean;
  readonly lockTtlMs?: number;
  readonly who?: string;
  readonly parallelism?: number;
  readonly retry?: RetryPolicy;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
  readonly sleep?: Sleep;
  readonly random?: () => number;
  readonly onEvent?: (event: EngineEvent) => void;
};

export type PlanOutcome = {
  readonly plan: Plan;
  readonly state: StateSnapshot;
  readonly refresh?: RefreshResult;
};

export type ApplyOutcome = PlanOutcome & {
  readonly report: ApplyReport;
};

const defaultWho = (): string => `${process.env["USER"] ?? "unknown"}@${hostname()}`;

/**
 * Holds the state lock for the whole of `body` and releases it whatever the outcome.
 * A failed release is an error only when the body itself succeeded.
 */
const withLock = async <T>(
  input: EngineInput,
  operation: string,
  body: () => Promise<Result<T, EngineError>>,
): Promise<Result<T, EngineError>> => {
  const emit = input.onEvent ?? (() => undefined);
  const locked = await input.backend.lock({
    ttlMs: input.lockTtlMs ?? DEFAULT_LOCK_TTL_MS,
    who: input.who ?? defaultWho(),
    operation,
  });
  if (locked.isErr()) {
    return err(locked.error);
  }
  const lock = locked.value;
  emit({ type: "locked", lock });

  const release = async (): Promise<Result<void, StateError>> => {
    const released = await input.backend.unlock(lock.id);
    if (released.isErr()) {
      emit({ type: "unlock_failed", lockId: lock.id, message: released.error.message });
    } else {
      emit({ type: "unlocked", lockId: lock.id });
    }
    return released;
  };

  let outcome: Result<T, EngineError>;
  try {
    outcome = await body();
  } catch (e) {
    await release();
    throw e;
  }

  const released = await release();
  if (released.isErr() && outcome.isOk()) {
    return err(released.error);
  }
  return outcome;
};

const refreshed = async (
  input: EngineInput,
  state: StateSnapshot,
): Promise<Result<RefreshResult | undefined, EngineError>> => {
  if (input.refresh !== true) {
    return ok(undefined);
  }
  const result = await refreshState(state, input.providers, {
    ...(input.parallelism === undefined ? {} : { parallelism: input.parallelism }),
    ...(input.retry === undefined ? {} : { retry: input.retry }),
    ...(input.signal === undefined ? {} : { signal: input.signal }),
    ...(input.sleep === undefined ? {} : { sleep: input.sleep }),
  });
  if (result.isErr()) {
    return err(result.error);
  }
  input.onEvent?.({
    type: "refreshed",
    dropped: result.value.dropped,
    drifted: result.value.drifted,
  });
  return ok(result.value);
};

const planAgainst = (
  input: EngineInput,
  state: StateSnapshot,
): Result<Plan, EngineError> =>
  plan(input.declarations, state, {
    ...(input.schemas === undefined ? {} : { schemas: input.schemas }),
    ...(input.destroy === undefined ? {} : { destroy: input.destroy }),
  }).mapErr((errors): EngineError => ({ kind: "validation", errors }));

/** Locks, loads, optionally refreshes and plans. State is never written. */
export const runPlan = (input: EngineInput): Promise<Result<PlanOutcome, EngineError>> =>
  withLock<PlanOutcome>(input, input.destroy === true ? "plan-destroy" : "plan", async () => {
    const loaded = await input.backend.load();
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    const refresh = await refreshed(input, loaded.value);
    if (refresh.isErr()) {
      return err(refresh.error);
    }
    const state = refresh.value?.state ?? loaded.value;
    return planAgainst(input, state).map((planned) => ({
      plan: planned,
      state,
      ...(refresh.value === undefined ? {} : { refresh: refresh.value }),
    }));
  });

/**
 * One full convergence cycle under a single lock: load, refresh, plan and apply.
 * Validation errors end the cycle before anything is written.
 */
export const runApply = (input: EngineInput): Promise<Result<ApplyOutcome, EngineError>> =>
  withLock<ApplyOutcome>(input, input.destroy === true ? "destroy" : "apply", async () => {
    const loaded = await input.backend.load();
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    const writer = new StateWriter(input.backend, loaded.value);

    const refresh = await refreshed(input, loaded.value);
    if (refresh.isErr()) {
      return err(refresh.error);
    }
    const observed = refresh.value;
    if (observed !== undefined && (observed.dropped.length > 0 || observed.drifted.length > 0)) {
      const written = await writer.commit((state) => ({
        ...state,
        resources: observed.state.resources,
        serial: state.serial + 1,
      }));
      if (written.isErr()) {
        return err(written.error);
      }
    }

    const state = writer.current;
    const planned = planAgainst(input, state);
    if (planned.isErr()) {
      return err(planned.error);
    }

    const report = await apply(planned.value, {
      providers: input.providers,
      writer,
      ...(input.parallelism === undefined ? {} : { parallelism: input.parallelism }),
      ...(input.retry === undefined ? {} : { retry: input.retry }),
      ...(input.signal === undefined ? {} : { signal: input.signal }),
      ...(input.timeoutMs === undefined ? {} : { timeoutMs: input.timeoutMs }),
      ...(input.sleep === undefined ? {} : { sleep: input.sleep }),
      ...(input.random === undefined ? {} : { random: input.random }),
      ...(input.onEvent === undefined ? {} : { onEvent: input.onEvent }),
    });

    return ok({
      plan: planned.value,
      state: writer.current,
      ...(observed === undefined ? {} : { refresh: observed }),
      report,
    });
  });
