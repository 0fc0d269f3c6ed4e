import { describe, expect, test } from "vitest";
import {
  decodeState,
  emptyState,
  encodeState,
  findDeposed,
  putResource,
  readAttribute,
  removeDeposed,
  removeResource,
  replaceResource,
  splitAttributePath,
} from "./state.js";
import type { StateEntry } from "./types.js";

const bucket = (id: string): StateEntry => ({
  type: "storage_bucket",
  id,
  attributes: { name: "logs" },
  dependencies: [],
});

describe("transactions", () => {
  test("each write bumps the serial and keeps the lineage", () => {
    const initial = emptyState("lineage-1");
    const added = putResource(initial, "storage_bucket.logs", bucket("b-1"));
    const removed = removeResource(added, "storage_bucket.logs");

    expect(added.serial).toBe(1);
    expect(added.resources["storage_bucket.logs"]?.id).toBe("b-1");
    expect(removed.serial).toBe(2);
    expect(removed.resources).toEqual({});
    expect(removed.lineage).toBe("lineage-1");
    expect(initial.resources).toEqual({});
  });

  test("replaceResource deposes the prior object", () => {
    const state = putResource(emptyState("l"), "storage_bucket.logs", bucket("b-1"));
    const replaced = replaceResource(state, "storage_bucket.logs", bucket("b-2"));

    expect(replaced.resources["storage_bucket.logs"]?.id).toBe("b-2");
    expect(findDeposed(replaced, "storage_bucket.logs")).toEqual([
      { ...bucket("b-1"), address: "storage_bucket.logs" },
    ]);

    const cleaned = removeDeposed(replaced, "storage_bucket.logs", "b-1");
    expect(cleaned.deposed).toEqual([]);
    expect(cleaned.serial).toBe(3);
  });
});

describe("decodeState", () => {
  test("fills defaults and round-trips through encodeState", () => {
    const decoded = decodeState({
      version: 1,
      serial: 4,
      lineage: "l",
      resources: { "storage_bucket.logs": { type: "storage_bucket", id: "b-1", attributes: {} } },
    })._unsafeUnwrap();

    expect(decoded.deposed).toEqual([]);
    expect(decoded.resources["storage_bucket.logs"]?.dependencies).toEqual([]);
    expect(decodeState(JSON.parse(encodeState(decoded)))._unsafeUnwrap()).toEqual(decoded);
  });

  test("names the offending field", () => {
    const error = decodeState({ version: 1, serial: -1, lineage: "l", resources: {} })._unsafeUnwrapErr();
    expect(error.startsWith("serial: ")).toBe(true);
  });
});

describe("readAttribute", () => {
  const entry: StateEntry = {
    type: "compute_instance",
    id: "i-1",
    attributes: { tags: { Name: "app" }, ips: ["10.0.0.4", "10.0.0.5"] },
    dependencies: [],
  };

  test("follows nested paths", () => {
    expect(splitAttributePath("ips[1]")).toEqual(["ips", 1]);
    expect(readAttribute(entry, "tags.Name")).toBe("app");
    expect(readAttribute(entry, "ips[1]")).toBe("10.0.0.5");
    expect(readAttribute(entry, "ips[5]")).toBeUndefined();
    expect(readAttribute(entry, "tags.Missing")).toBeUndefined();
  });

  test("id falls back to the object's identifier", () => {
    expect(readAttribute(entry, "id")).toBe("i-1");
  });
});
