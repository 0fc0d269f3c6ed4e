import { errAsync, type ResultAsync } from "neverthrow";
import { describe, expect, test } from "vitest";
import { MemoryBackend } from "../backends/memory.js";
import { fakeRegistry, instantSleep, type FakeRegistry } from "../testing/index.js";
import { runApply, runPlan, type EngineEvent, type EngineInput } from "./engine.js";
import { fatalError, type StateError } from "./errors.js";
import { isEmptyPlan } from "./planner.js";
import { emptyState } from "./state.js";
import { ref } from "./tokens.js";
import type { ResourceDeclaration, ResourceSchemas } from "./types.js";

const TYPES = ["net_vpc", "net_subnet", "storage_bucket"];

const network: readonly ResourceDeclaration[] = [
  { type: "net_vpc", name: "main", attributes: { cidr_block: "10.0.0.0/16" } },
  { type: "net_subnet", name: "a", count: 2, attributes: { vpc_id: ref("net_vpc.main", "id") } },
  { type: "storage_bucket", name: "logs", attributes: { name: "logs", tags: { team: "infra" } } },
];

const logsOnly = network.slice(2);

const schemas: ResourceSchemas = {
  storage_bucket: { mutableAttributes: ["tags"], createBeforeDestroy: false },
};

const inputFor = (
  registry: FakeRegistry,
  backend: MemoryBackend,
  declarations: readonly ResourceDeclaration[],
  extra: Partial<EngineInput> = {},
): EngineInput => ({
  declarations,
  backend,
  providers: registry.providers,
  schemas,
  refresh: true,
  who: "tester@test",
  retry: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100, jitter: 0 },
  sleep: instantSleep().sleep,
  ...extra,
});

const fresh = () => ({
  registry: fakeRegistry(TYPES),
  backend: new MemoryBackend({ initial: emptyState("test-lineage") }),
});

describe("runApply", () => {
  test("converges, then has nothing left to do", async () => {
    const { registry, backend } = fresh();

    const first = (await runApply(inputFor(registry, backend, network)))._unsafeUnwrap();
    expect(first.report.result).toBe("success");
    expect(first.state.serial).toBe(4);
    const writes = registry.cloud.calls.filter((c) => c.operation !== "read").length;

    const second = (await runApply(inputFor(registry, backend, network)))._unsafeUnwrap();
    expect(isEmptyPlan(second.plan)).toBe(true);
    expect(second.report.steps.every((s) => s.operation === "noop" && s.attempts === 0)).toBe(true);
    expect(registry.cloud.calls.filter((c) => c.operation !== "read")).toHaveLength(writes);
    expect(second.state.serial).toBe(4);
    expect(backend.currentLock).toBeUndefined();
  });

  test("a rerun after a partial failure only applies what did not apply before", async () => {
    const { registry, backend } = fresh();
    registry.provider("net_subnet").fail("create", fatalError("quota exceeded"), { times: 2 });

    const first = (await runApply(inputFor(registry, backend, network)))._unsafeUnwrap();
    expect(first.report.result).toBe("partial_failure");
    expect(Object.keys(first.state.resources).sort()).toEqual(["net_vpc.main", "storage_bucket.logs"]);
    const callsBefore = registry.cloud.calls.length;

    const second = (await runApply(inputFor(registry, backend, network)))._unsafeUnwrap();

    expect(second.report.result).toBe("success");
    expect(
      second.report.steps
        .filter((s) => s.operation === "noop")
        .map((s) => s.address)
        .sort(),
    ).toEqual(["net_vpc.main", "storage_bucket.logs"]);
    expect(
      second.report.steps
        .filter((s) => s.operation !== "noop")
        .map((s) => s.id)
        .sort(),
    ).toEqual(["net_subnet.a[0]:create", "net_subnet.a[1]:create"]);
    expect(registry.cloud.calls.slice(callsBefore).map((c) => c.operation)).toEqual([
      "read",
      "read",
      "create",
      "create",
    ]);
    expect(Object.keys(second.state.resources).sort()).toEqual([
      "net_subnet.a[0]",
      "net_subnet.a[1]",
      "net_vpc.main",
      "storage_bucket.logs",
    ]);
  });

  test("does nothing while another run holds the lock", async () => {
    const { registry, backend } = fresh();
    await backend.lock({ ttlMs: 60_000, who: "someone-else", operation: "apply" });

    const error = (await runApply(inputFor(registry, backend, network)))._unsafeUnwrapErr();

    expect(error.kind).toBe("state_conflict");
    expect(error.kind === "state_conflict" ? error.lock?.who : undefined).toBe("someone-else");
    expect(registry.cloud.calls).toEqual([]);
    expect(backend.currentLock?.who).toBe("someone-else");
  });

  test("releases the lock and writes nothing when validation fails", async () => {
    const { registry, backend } = fresh();
    const events: EngineEvent["type"][] = [];

    const result = await runApply(
      inputFor(
        registry,
        backend,
        [
          { type: "x", name: "a", attributes: { peer: ref("x.b", "id") } },
          { type: "x", name: "b", attributes: { peer: ref("x.a", "id") } },
        ],
        { onEvent: (event) => events.push(event.type) },
      ),
    );

    expect(result._unsafeUnwrapErr().kind).toBe("validation");
    expect(events).toEqual(["locked", "refreshed", "unlocked"]);
    expect(backend.saves).toEqual([]);
    expect(backend.currentLock).toBeUndefined();
  });

  test("recreates objects deleted outside the engine", async () => {
    const { registry, backend } = fresh();
    await runApply(inputFor(registry, backend, logsOnly));
    registry.cloud.remove("storage_bucket-1");

    const outcome = (await runApply(inputFor(registry, backend, logsOnly)))._unsafeUnwrap();

    expect(outcome.refresh?.dropped).toEqual(["storage_bucket.logs"]);
    expect(outcome.plan.changes.map((c) => c.action)).toEqual(["create"]);
    expect(outcome.state.resources["storage_bucket.logs"]?.id).toBe("storage_bucket-2");
    expect(outcome.state.serial).toBe(3);
  });

  test("puts drifted attributes back", async () => {
    const { registry, backend } = fresh();
    await runApply(inputFor(registry, backend, logsOnly));
    registry.cloud.drift("storage_bucket-1", { tags: { team: "other" } });

    const outcome = (await runApply(inputFor(registry, backend, logsOnly)))._unsafeUnwrap();

    expect(outcome.refresh?.drifted).toEqual(["storage_bucket.logs"]);
    expect(outcome.plan.changes[0]?.action).toBe("update");
    expect(outcome.plan.changes[0]?.changedAttributes).toEqual(["tags"]);
    expect(registry.cloud.objects.get("storage_bucket-1")?.attributes).toEqual({
      name: "logs",
      tags: { team: "infra" },
    });
  });

  test("without refresh, state is trusted as recorded", async () => {
    const { registry, backend } = fresh();
    await runApply(inputFor(registry, backend, logsOnly));
    registry.cloud.remove("storage_bucket-1");

    const outcome = (await runApply(inputFor(registry, backend, logsOnly, { refresh: false })))._unsafeUnwrap();

    expect(isEmptyPlan(outcome.plan)).toBe(true);
    expect(registry.cloud.callsFor("read")).toEqual([]);
  });

  test("destroy removes every recorded object", async () => {
    const { registry, backend } = fresh();
    await runApply(inputFor(registry, backend, network));

    const outcome = (await runApply(inputFor(registry, backend, network, { destroy: true })))._unsafeUnwrap();

    expect(outcome.report.result).toBe("success");
    expect(outcome.state.resources).toEqual({});
    expect(registry.cloud.objects.size).toBe(0);
  });

  test("a lock that cannot be released fails an otherwise successful run", async () => {
    class StuckBackend extends MemoryBackend {
      override unlock(_lockId: string): ResultAsync<void, StateError> {
        return errAsync({ kind: "state_conflict", message: "lock file vanished" });
      }
    }
    const registry = fakeRegistry(TYPES);
    const backend = new StuckBackend({ initial: emptyState("test-lineage") });

    const result = await runApply(inputFor(registry, backend, logsOnly));

    expect(result._unsafeUnwrapErr()).toEqual({ kind: "state_conflict", message: "lock file vanished" });
  });
});

describe("runPlan", () => {
  test("plans under the lock without writing state", async () => {
    const { registry, backend } = fresh();
    const events: EngineEvent["type"][] = [];

    const outcome = (
      await runPlan(inputFor(registry, backend, network, { onEvent: (event) => events.push(event.type) }))
    )._unsafeUnwrap();

    expect(outcome.plan.changes).toHaveLength(4);
    expect(outcome.plan.steps.every((s) => s.operation === "create")).toBe(true);
    expect(backend.saves).toEqual([]);
    expect(events).toEqual(["locked", "refreshed", "unlocked"]);
    expect(registry.cloud.calls).toEqual([]);
  });
});
