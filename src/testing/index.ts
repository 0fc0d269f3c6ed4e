import { setTimeout as delay } from "node:timers/promises";
import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../core/errors.js";
import type {
  CreatedObject,
  ProviderAttributes,
  ProviderRegistry,
  ResourceProvider,
} from "../core/provider.js";
import type { StateAttributes } from "../core/types.js";

export type FakeOperation = "create" | "read" | "update" | "delete";

export type FakeCall = {
  readonly type: string;
  readonly operation: FakeOperation;
  readonly id?: string;
  readonly attributes?: ProviderAttributes;
};

export type FakeObject = {
  readonly type: string;
  readonly attributes: ProviderAttributes;
};

type ScriptedFailure = {
  readonly operation: FakeOperation;
  readonly error: ProviderError;
  readonly when: (call: FakeCall) => boolean;
  remaining: number;
};

export type FailureOptions = {
  /** How many matching calls fail before the call succeeds again. Defaults to every call. */
  readonly times?: number;
  readonly when?: (call: FakeCall) => boolean;
};

/**
 * An in-memory cloud shared by every fake provider of a registry. Records each call
 * and tracks how many calls run at once.
 */
export class FakeCloud {
  readonly objects = new Map<string, FakeObject>();
  readonly calls: FakeCall[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private sequence = 0;

  nextId(type: string): string {
    this.sequence++;
    return `${type}-${this.sequence}`;
  }

  /** Changes a remote object behind the engine's back. */
  drift(id: string, attributes: ProviderAttributes): void {
    const current = this.objects.get(id);
    if (current !== undefined) {
      this.objects.set(id, { ...current, attributes: { ...current.attributes, ...attributes } });
    }
  }

  /** Deletes a remote object behind the engine's back. */
  remove(id: string): void {
    this.objects.delete(id);
  }

  callsFor(operation: FakeOperation): readonly FakeCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  ofType(type: string): readonly [string, FakeObject][] {
    return Array.from(this.objects.entries()).filter(([, object]) => object.type === type);
  }
}

export type FakeProviderOptions = {
  /** Milliseconds each call takes. */
  readonly latencyMs?: number;
  /** Extra attributes the provider assigns on create, such as an ARN. */
  readonly computed?: (id: string, attributes: ProviderAttributes) => ProviderAttributes;
};

export class FakeProvider implements ResourceProvider {
  private readonly failures: ScriptedFailure[] = [];

  constructor(
    readonly type: string,
    readonly cloud: FakeCloud,
    private readonly options: FakeProviderOptions = {},
  ) {}

  /** Makes matching calls of `operation` fail with `error`. */
  fail(operation: FakeOperation, error: ProviderError, options: FailureOptions = {}): this {
    this.failures.push({
      operation,
      error,
      when: options.when ?? (() => true),
      remaining: options.times ?? Number.POSITIVE_INFINITY,
    });
    return this;
  }

  create(attributes: ProviderAttributes): Promise<Result<CreatedObject, ProviderError>> {
    return this.call({ type: this.type, operation: "create", attributes }, () => {
      const id = this.cloud.nextId(this.type);
      const stored = { ...attributes, ...this.options.computed?.(id, attributes) };
      this.cloud.objects.set(id, { type: this.type, attributes: stored });
      return ok({ id, attributes: stored });
    });
  }

  read(id: string): Promise<Result<ProviderAttributes, ProviderError>> {
    return this.call({ type: this.type, operation: "read", id }, () => {
      const object = this.cloud.objects.get(id);
      return object === undefined
        ? err({ kind: "not_found", message: `${id} does not exist` })
        : ok(object.attributes);
    });
  }

  update(
    id: string,
    attributes: ProviderAttributes,
    _prior: StateAttributes,
  ): Promise<Result<ProviderAttributes, ProviderError>> {
    return this.call({ type: this.type, operation: "update", id, attributes }, () => {
      const object = this.cloud.objects.get(id);
      if (object === undefined) {
        return err({ kind: "not_found", message: `${id} does not exist` });
      }
      const stored = { ...object.attributes, ...attributes };
      this.cloud.objects.set(id, { type: this.type, attributes: stored });
      return ok(stored);
    });
  }

  delete(id: string, _prior: StateAttributes): Promise<Result<void, ProviderError>> {
    return this.call({ type: this.type, operation: "delete", id }, () => {
      if (!this.cloud.objects.delete(id)) {
        return err({ kind: "not_found", message: `${id} does not exist` });
      }
      return ok(undefined);
    });
  }

  private async call<T>(
    call: FakeCall,
    perform: () => Result<T, ProviderError>,
  ): Promise<Result<T, ProviderError>> {
    this.cloud.calls.push(call);
    this.cloud.inFlight++;
    this.cloud.maxInFlight = Math.max(this.cloud.maxInFlight, this.cloud.inFlight);
    try {
      await delay(this.options.latencyMs ?? 0);
      const failure = this.failures.find(
        (f) => f.operation === call.operation && f.remaining > 0 && f.when(call),
      );
      if (failure !== undefined) {
        failure.remaining--;
        return err(failure.error);
      }
      return perform();
    } finally {
      this.cloud.inFlight--;
    }
  }
}

export type FakeRegistry = {
  readonly cloud: FakeCloud;
  readonly providers: ProviderRegistry;
  provider(type: string): FakeProvider;
};

/** One fake provider per type, all backed by the same cloud. */
export const fakeRegistry = (
  types: readonly string[],
  options: FakeProviderOptions = {},
): FakeRegistry => {
  const cloud = new FakeCloud();
  const fakes = new Map(types.map((type) => [type, new FakeProvider(type, cloud, options)]));
  return {
    cloud,
    providers: Object.fromEntries(fakes),
    provider(type) {
      const fake = fakes.get(type);
      if (fake === undefined) {
        throw new Error(`No fake provider for type '${type}'`);
      }
      return fake;
    },
  };
};

/** Sleep that returns at once and remembers the delays it was asked for. */
export const instantSleep = (): { readonly delays: number[]; sleep: (ms: number) => Promise<void> } => {
  const delays: number[] = [];
  return {
    delays,
    sleep: (ms) => {
      delays.push(ms);
      return Promise.resolve();
    },
  };
};
