import { err, ok, type Result } from "neverthrow";
import { compareAddresses } from "./address.js";
import { deepEqual } from "./diff.js";
import type { RefreshError } from "./errors.js";
import { settle, type ProviderRegistry } from "./provider.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type Sleep } from "./retry.js";
import type { StateEntry, StateSnapshot } from "./types.js";

export type RefreshOptions = {
  readonly parallelism?: number;
  readonly retry?: RetryPolicy;
  readonly signal?: AbortSignal;
  readonly sleep?: Sleep;
};

export type RefreshResult = {
  /** Same serial as the input; callers decide whether to persist it. */
  readonly state: StateSnapshot;
  /** Addresses whose remote object no longer exists. */
  readonly dropped: readonly string[];
  /** Addresses whose remote attributes differ from the recorded ones. */
  readonly drifted: readonly string[];
};

type Observation =
  | { readonly kind: "gone" }
  | { readonly kind: "found"; readonly entry: StateEntry };

const sameAttributes = (a: StateEntry, b: StateEntry): boolean =>
  deepEqual(a.attributes, b.attributes);

/**
 * Reads every recorded object back from its provider. Objects that are gone are
 * dropped so the next plan recreates them; the rest take the attributes the provider
 * reports.
 */
export const refreshState = async (
  state: StateSnapshot,
  providers: ProviderRegistry,
  options: RefreshOptions = {},
): Promise<Result<RefreshResult, RefreshError>> => {
  const addresses = Object.keys(state.resources).sort(compareAddresses);
  const observations = new Map<string, Observation>();
  let failure: RefreshError | undefined;
  let cursor = 0;

  const observe = async (address: string, entry: StateEntry): Promise<Result<Observation, RefreshError>> => {
    const provider = providers[entry.type];
    if (provider === undefined) {
      return err({ kind: "refresh", address, message: `No provider is registered for type '${entry.type}'` });
    }
    const { result } = await withRetry(() => settle(() => provider.read(entry.id)), {
      policy: options.retry ?? DEFAULT_RETRY_POLICY,
      ...(options.signal === undefined ? {} : { signal: options.signal }),
      ...(options.sleep === undefined ? {} : { sleep: options.sleep }),
    });
    if (result.isOk()) {
      return ok({ kind: "found", entry: { ...entry, attributes: result.value } });
    }
    if (result.error.kind === "not_found") {
      return ok({ kind: "gone" });
    }
    return err({ kind: "refresh", address, message: result.error.message });
  };

  const worker = async (): Promise<void> => {
    while (failure === undefined && cursor < addresses.length) {
      const address = addresses[cursor++];
      const entry = address === undefined ? undefined : state.resources[address];
      if (address === undefined || entry === undefined) continue;
      const observed = await observe(address, entry);
      if (observed.isErr()) {
        failure ??= observed.error;
        return;
      }
      observations.set(address, observed.value);
    }
  };

  const parallelism = Math.max(1, options.parallelism ?? 10);
  await Promise.all(Array.from({ length: Math.min(parallelism, addresses.length) }, () => worker()));
  if (failure !== undefined) {
    return err(failure);
  }

  const resources: Record<string, StateEntry> = {};
  const dropped: string[] = [];
  const drifted: string[] = [];
  for (const address of addresses) {
    const observed = observations.get(address);
    const recorded = state.resources[address];
    if (observed === undefined || recorded === undefined) continue;
    if (observed.kind === "gone") {
      dropped.push(address);
      continue;
    }
    if (!sameAttributes(recorded, observed.entry)) {
      drifted.push(address);
    }
    resources[address] = observed.entry;
  }

  return ok({ state: { ...state, resources }, dropped, drifted });
};
