import { describe, expect, test } from "vitest";
import { fakeRegistry } from "../testing/index.js";
import { fatalError } from "./errors.js";
import type { ResourceProvider } from "./provider.js";
import { refreshState } from "./refresh.js";
import type { StateSnapshot } from "./types.js";

const recorded = (): StateSnapshot => ({
  version: 1,
  serial: 7,
  lineage: "test-lineage",
  resources: {
    "storage_bucket.logs": { type: "storage_bucket", id: "b-1", attributes: { name: "logs" }, dependencies: [] },
    "storage_bucket.gone": { type: "storage_bucket", id: "b-2", attributes: { name: "gone" }, dependencies: [] },
    "storage_bucket.same": { type: "storage_bucket", id: "b-3", attributes: { name: "same" }, dependencies: [] },
  },
  deposed: [],
});

describe("refreshState", () => {
  test("drops missing objects and picks up remote changes", async () => {
    const { cloud, providers } = fakeRegistry(["storage_bucket"]);
    cloud.objects.set("b-1", { type: "storage_bucket", attributes: { name: "logs", versioning: true } });
    cloud.objects.set("b-3", { type: "storage_bucket", attributes: { name: "same" } });

    const refreshed = (await refreshState(recorded(), providers))._unsafeUnwrap();

    expect(refreshed.dropped).toEqual(["storage_bucket.gone"]);
    expect(refreshed.drifted).toEqual(["storage_bucket.logs"]);
    expect(refreshed.state.serial).toBe(7);
    expect(Object.keys(refreshed.state.resources)).toEqual(["storage_bucket.logs", "storage_bucket.same"]);
    expect(refreshed.state.resources["storage_bucket.logs"]?.attributes).toEqual({
      name: "logs",
      versioning: true,
    });
  });

  test("fails when an object cannot be read", async () => {
    const registry = fakeRegistry(["storage_bucket"]);
    registry.provider("storage_bucket").fail("read", fatalError("access denied"));

    const error = (await refreshState(recorded(), registry.providers))._unsafeUnwrapErr();

    expect(error.kind).toBe("refresh");
    expect(error.message).toBe("access denied");
  });

  test("a provider that throws is a refresh error", async () => {
    const broken = (): Promise<never> => Promise.reject(new Error("socket hang up"));
    const provider: ResourceProvider = { create: broken, read: broken, update: broken, delete: broken };

    const error = (await refreshState(recorded(), { storage_bucket: provider }))._unsafeUnwrapErr();

    expect(error.kind).toBe("refresh");
    expect(error.message).toBe("Provider threw: socket hang up");
  });

  test("fails for a type without a provider", async () => {
    const error = (await refreshState(recorded(), {}))._unsafeUnwrapErr();

    expect(error).toEqual({
      kind: "refresh",
      address: "storage_bucket.gone",
      message: "No provider is registered for type 'storage_bucket'",
    });
  });
});
