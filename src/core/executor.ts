import { err, ok, type Result } from "neverthrow";
import type { ProviderError, StateError } from "./errors.js";
import { settle, type ProviderAttributes, type ProviderRegistry } from "./provider.js";
import { instancesOf, referenceTarget } from "./resolver.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type Sleep } from "./retry.js";
import { putResource, readAttribute, removeDeposed, removeResource, replaceResource } from "./state.js";
import type { StateTransaction, StateWriter } from "./state-writer.js";
import {
  resolveExpression,
  toJsonValue,
  tokenToString,
  unknown,
  walkTokens,
  type Expression,
  type JsonValue,
  type RefToken,
  type SplatToken,
} from "./tokens.js";
import type {
  ApplyEvent,
  ApplyReport,
  ApplyResult,
  Plan,
  PlanStep,
  StateSnapshot,
  StepReport,
  StepStatus,
  TerminalStatus,
} from "./types.js";

export const DEFAULT_PARALLELISM = 10;

export type ApplyContext = {
  readonly providers: ProviderRegistry;
  readonly writer: StateWriter;
  readonly parallelism?: number;
  readonly retry?: RetryPolicy;
  readonly signal?: AbortSignal;
  /** Cancels the run once this many milliseconds have passed. */
  readonly timeoutMs?: number;
  readonly onEvent?: (event: ApplyEvent) => void;
  readonly sleep?: Sleep;
  readonly random?: () => number;
};

type StepFailure = { readonly kind: "failed" | "cancelled"; readonly message: string };

/** Wakes idle workers when a step finishes or the run is cancelled. */
class Notifier {
  private waiters: (() => void)[] = [];

  wait(): Promise<void> {
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  notifyAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}

const combineSignals = (signal?: AbortSignal, timeoutMs?: number): AbortSignal => {
  const signals: AbortSignal[] = [];
  if (signal !== undefined) signals.push(signal);
  if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));
  return AbortSignal.any(signals);
};

/** Resolves references against what is recorded in state right now. */
const liveLookup =
  (state: StateSnapshot, collections: Plan["collections"]) =>
  (token: RefToken | SplatToken): Expression => {
    const valueOf = (target: string, attribute: string): Expression => {
      const entry = state.resources[target];
      return (entry === undefined ? undefined : readAttribute(entry, attribute)) ?? unknown(target, attribute);
    };
    if (token.kind === "ref") {
      return valueOf(referenceTarget(token), token.attribute);
    }
    const count = collections[token.resource];
    const targets = instancesOf(
      token.resource,
      count === undefined ? { kind: "single" } : { kind: "collection", count },
    );
    return targets.map((target) => valueOf(target, token.attribute));
  };

const resolveForProvider = (
  step: PlanStep,
  state: StateSnapshot,
  collections: Plan["collections"],
): Result<ProviderAttributes, string> => {
  const lookup = liveLookup(state, collections);
  const attributes: Record<string, JsonValue> = {};
  for (const [key, expression] of Object.entries(step.attributes)) {
    const resolved = resolveExpression(expression, lookup);
    const json = toJsonValue(resolved);
    if (json === undefined) {
      const pending: string[] = [];
      walkTokens(resolved, (token) => pending.push(tokenToString(token)), key);
      return err(`Value of '${key}' is not known: ${pending.join(", ")}`);
    }
    attributes[key] = json;
  }
  return ok(attributes);
};

const summarize = (statuses: Iterable<StepStatus>): ApplyResult => {
  let result: ApplyResult = "success";
  for (const status of statuses) {
    if (status === "cancelled") return "cancelled";
    if (status === "failed" || status === "skipped") result = "partial_failure";
  }
  return result;
};

/**
 * Executes a plan's steps on a fixed pool of workers. A step starts once every step
 * it depends on is applied; a failure skips everything downstream of it and leaves
 * independent steps running. Each successful step is recorded in state before its
 * dependents are released.
 */
export const apply = async (plan: Plan, context: ApplyContext): Promise<ApplyReport> => {
  const started = Date.now();
  const emit = context.onEvent ?? (() => undefined);
  const policy = context.retry ?? DEFAULT_RETRY_POLICY;
  const parallelism = Math.max(1, context.parallelism ?? DEFAULT_PARALLELISM);

  const invalid = plan.diagnostics.filter((d) => d.severity === "error");
  const current = context.writer.current;
  if (invalid.length > 0) {
    return {
      result: "failed",
      steps: [],
      errors: invalid.map((d) => `${d.address}: ${d.message}`),
      durationMs: Date.now() - started,
    };
  }
  if (current.serial !== plan.stateSerial || current.lineage !== plan.stateLineage) {
    return {
      result: "failed",
      steps: [],
      errors: [
        `Plan was made against state serial ${plan.stateSerial} but state is at ${current.serial}; plan again`,
      ],
      durationMs: Date.now() - started,
    };
  }

  const signal = combineSignals(context.signal, context.timeoutMs);
  const steps = new Map(plan.steps.map((step) => [step.id, step]));
  const position = new Map(plan.steps.map((step, i) => [step.id, i]));
  const status = new Map<string, StepStatus>();
  const attempts = new Map<string, number>();
  const failures = new Map<string, string>();
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  const errors: string[] = [];
  const ready: string[] = [];
  const notifier = new Notifier();
  let running = 0;
  let halted = false;

  for (const step of plan.steps) {
    status.set(step.id, "pending");
    remaining.set(step.id, step.dependsOn.length);
    for (const dep of step.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(step.id);
      dependents.set(dep, list);
    }
  }

  const enqueue = (id: string): void => {
    status.set(id, "ready");
    const at = position.get(id) ?? 0;
    const before = ready.findIndex((other) => (position.get(other) ?? 0) > at);
    if (before === -1) {
      ready.push(id);
    } else {
      ready.splice(before, 0, id);
    }
  };

  for (const step of plan.steps) {
    if (step.dependsOn.length === 0) enqueue(step.id);
  }

  const release = (id: string): void => {
    for (const dependent of dependents.get(id) ?? []) {
      const left = (remaining.get(dependent) ?? 1) - 1;
      remaining.set(dependent, left);
      if (left === 0 && status.get(dependent) === "pending") {
        enqueue(dependent);
      }
    }
  };

  const skipDownstream = (id: string): void => {
    const queue = [...(dependents.get(id) ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      const step = steps.get(next);
      if (step === undefined || (status.get(next) !== "pending" && status.get(next) !== "ready")) {
        continue;
      }
      status.set(next, "skipped");
      emit({ type: "step_skipped", step, cause: id });
      queue.push(...(dependents.get(next) ?? []));
    }
  };

  const succeed = (step: PlanStep): void => {
    status.set(step.id, "applied");
    emit({ type: "step_applied", step, attempts: attempts.get(step.id) ?? 0 });
    release(step.id);
  };

  const fail = (step: PlanStep, failure: StepFailure): void => {
    if (failure.kind === "cancelled") {
      status.set(step.id, "cancelled");
      emit({ type: "step_cancelled", step });
      return;
    }
    status.set(step.id, "failed");
    failures.set(step.id, failure.message);
    errors.push(`${step.address}: ${failure.message}`);
    emit({ type: "step_failed", step, message: failure.message });
    skipDownstream(step.id);
  };

  const record = async (transaction: StateTransaction): Promise<Result<void, StateError>> => {
    const written = await context.writer.commit(transaction);
    return written.map(() => undefined);
  };

  const callProvider = async (step: PlanStep): Promise<Result<StateTransaction, StepFailure>> => {
    const provider = context.providers[step.type];
    if (provider === undefined) {
      return err({ kind: "failed", message: `No provider is registered for type '${step.type}'` });
    }

    const retried = <T>(call: () => Promise<Result<T, ProviderError>>) =>
      withRetry(() => settle(call), {
        policy,
        signal,
        ...(context.sleep === undefined ? {} : { sleep: context.sleep }),
        ...(context.random === undefined ? {} : { random: context.random }),
        onAttempt: (attempt) => {
          attempts.set(step.id, attempt);
          emit({ type: "step_start", step, attempt });
        },
        onRetry: (attempt, delayMs, error) =>
          emit({ type: "step_retry", step, attempt, delayMs, message: error.message }),
      });

    if (step.operation === "delete") {
      const priorId = step.priorId ?? "";
      const { result } = await retried(() => provider.delete(priorId, step.priorAttributes ?? {}));
      if (result.isErr() && result.error.kind !== "not_found") {
        return err({
          kind: result.error.kind === "cancelled" ? "cancelled" : "failed",
          message: result.error.message,
        });
      }
      return ok((state: StateSnapshot) =>
        step.deposed ? removeDeposed(state, step.address, priorId) : removeResource(state, step.address),
      );
    }

    const attributes = resolveForProvider(step, context.writer.current, plan.collections);
    if (attributes.isErr()) {
      return err({ kind: "failed", message: attributes.error });
    }

    if (step.operation === "update") {
      const priorId = step.priorId ?? "";
      const { result } = await retried(() =>
        provider.update(priorId, attributes.value, step.priorAttributes ?? {}),
      );
      if (result.isErr()) {
        return err({
          kind: result.error.kind === "cancelled" ? "cancelled" : "failed",
          message: result.error.message,
        });
      }
      const entry = {
        type: step.type,
        id: priorId,
        attributes: result.value,
        dependencies: step.dependencies,
      };
      return ok((state: StateSnapshot) => putResource(state, step.address, entry));
    }

    const { result } = await retried(() => provider.create(attributes.value));
    if (result.isErr()) {
      return err({
        kind: result.error.kind === "cancelled" ? "cancelled" : "failed",
        message: result.error.message,
      });
    }
    const entry = {
      type: step.type,
      id: result.value.id,
      attributes: result.value.attributes,
      dependencies: step.dependencies,
    };
    return ok((state: StateSnapshot) =>
      step.replace === "create_before_destroy"
        ? replaceResource(state, step.address, entry)
        : putResource(state, step.address, entry),
    );
  };

  const runStep = async (step: PlanStep): Promise<void> => {
    status.set(step.id, "running");
    if (step.operation === "noop") {
      succeed(step);
      return;
    }

    const outcome = await callProvider(step);
    if (outcome.isErr()) {
      fail(step, outcome.error);
      return;
    }

    const written = await record(outcome.value);
    if (written.isErr()) {
      halted = true;
      fail(step, { kind: "failed", message: `State write failed: ${written.error.message}` });
      return;
    }
    succeed(step);
  };

  const stopped = (): boolean => halted || signal.aborted;

  const worker = async (): Promise<void> => {
    for (;;) {
      if (stopped()) return;
      const id = ready.shift();
      const step = id === undefined ? undefined : steps.get(id);
      if (step === undefined) {
        if (running === 0) return;
        await notifier.wait();
        continue;
      }
      running++;
      try {
        await runStep(step);
      } finally {
        running--;
        notifier.notifyAll();
      }
    }
  };

  const wake = (): void => notifier.notifyAll();
  signal.addEventListener("abort", wake, { once: true });
  try {
    await Promise.all(Array.from({ length: parallelism }, () => worker()));
  } finally {
    signal.removeEventListener("abort", wake);
  }

  for (const step of plan.steps) {
    const left = status.get(step.id);
    if (left === "pending" || left === "ready" || left === "running") {
      status.set(step.id, "cancelled");
      emit({ type: "step_cancelled", step });
    }
  }

  const reports: StepReport[] = plan.steps.map((step) => {
    const final = status.get(step.id);
    const terminal: TerminalStatus =
      final === "applied" || final === "failed" || final === "skipped" ? final : "cancelled";
    const error = failures.get(step.id);
    return {
      id: step.id,
      address: step.address,
      operation: step.operation,
      status: terminal,
      attempts: attempts.get(step.id) ?? 0,
      ...(error === undefined ? {} : { error }),
    };
  });

  return {
    result: summarize(reports.map((r) => r.status)),
    steps: reports,
    errors,
    durationMs: Date.now() - started,
  };
};
