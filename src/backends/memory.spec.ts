import { describe, expect, test } from "vitest";
import { StateWriter } from "../core/state-writer.js";
import { emptyState, putResource } from "../core/state.js";
import { MemoryBackend } from "./memory.js";

const request = { ttlMs: 1_000, who: "tester@test", operation: "apply" };

describe("MemoryBackend", () => {
  test("save is a compare-and-swap on the serial", async () => {
    const backend = new MemoryBackend({ initial: emptyState("l") });

    (await backend.save({ ...emptyState("l"), serial: 1 }, 0))._unsafeUnwrap();
    const error = (await backend.save({ ...emptyState("l"), serial: 2 }, 0))._unsafeUnwrapErr();

    expect(error.kind).toBe("state_conflict");
    expect(backend.current.serial).toBe(1);
    expect(backend.saves).toHaveLength(1);
  });

  test("locks expire after their ttl", async () => {
    let now = new Date("2026-01-01T00:00:00Z");
    const backend = new MemoryBackend({ now: () => now });
    (await backend.lock(request))._unsafeUnwrap();

    expect((await backend.lock(request)).isErr()).toBe(true);
    now = new Date("2026-01-01T00:00:01Z");
    expect((await backend.lock(request)).isOk()).toBe(true);
  });
});

describe("StateWriter", () => {
  test("concurrent commits apply one after another", async () => {
    const backend = new MemoryBackend({ initial: emptyState("l") });
    const writer = new StateWriter(backend, backend.current);

    const results = await Promise.all(
      ["a", "b", "c"].map((name) =>
        writer.commit((state) =>
          putResource(state, `storage_bucket.${name}`, {
            type: "storage_bucket",
            id: `b-${name}`,
            attributes: {},
            dependencies: [],
          }),
        ),
      ),
    );

    expect(results.map((r) => r._unsafeUnwrap().serial)).toEqual([1, 2, 3]);
    expect(Object.keys(backend.current.resources)).toEqual([
      "storage_bucket.a",
      "storage_bucket.b",
      "storage_bucket.c",
    ]);
    expect(writer.current).toBe(backend.current);
  });

  test("a rejected save leaves the writer's snapshot as it was", async () => {
    const backend = new MemoryBackend({ initial: emptyState("l") });
    const writer = new StateWriter(backend, backend.current);
    (await backend.save({ ...emptyState("l"), serial: 5 }, 0))._unsafeUnwrap();

    const result = await writer.commit((state) => ({ ...state, serial: state.serial + 1 }));

    expect(result.isErr()).toBe(true);
    expect(writer.current.serial).toBe(0);
  });
});
