import { writeFileSync, type PathLike } from "node:fs";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { emptyState, putResource } from "../core/state.js";
import { LocalBackend } from "./local.js";

const renames = vi.hoisted(() => ({ failNext: false }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    rename: async (from: PathLike, to: PathLike): Promise<void> => {
      if (renames.failNext) {
        renames.failNext = false;
        throw new Error("disk detached");
      }
      return actual.rename(from, to);
    },
  };
});

const request = { ttlMs: 60_000, who: "tester@test", operation: "apply" };

describe("LocalBackend", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stratum-local-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("a missing state file loads as empty state", async () => {
    const backend = new LocalBackend({ path: join(dir, "stratum.state.json") });

    const state = (await backend.load())._unsafeUnwrap();

    expect(state.serial).toBe(0);
    expect(state.resources).toEqual({});
  });

  test("saves and loads state", async () => {
    const path = join(dir, "nested", "stratum.state.json");
    const backend = new LocalBackend({ path });
    const next = putResource(emptyState("lineage-1"), "storage_bucket.logs", {
      type: "storage_bucket",
      id: "b-1",
      attributes: { name: "logs" },
      dependencies: [],
    });

    (await backend.save(next, 0))._unsafeUnwrap();

    expect((await backend.load())._unsafeUnwrap()).toEqual(next);
    expect(JSON.parse(await readFile(path, "utf-8"))).toMatchObject({ serial: 1, lineage: "lineage-1" });
  });

  test("save is refused when the serial has moved", async () => {
    const backend = new LocalBackend({ path: join(dir, "stratum.state.json") });
    (await backend.save({ ...emptyState("l"), serial: 3 }, 0))._unsafeUnwrap();

    const error = (await backend.save({ ...emptyState("l"), serial: 2 }, 1))._unsafeUnwrapErr();

    expect(error).toEqual({
      kind: "state_conflict",
      message: "State serial is 3 but 1 was expected; another run has changed it",
    });
  });

  test("a failed save leaves no temporary file behind", async () => {
    const path = join(dir, "stratum.state.json");
    const backend = new LocalBackend({ path });
    renames.failNext = true;

    const error = (await backend.save(emptyState("l"), 0))._unsafeUnwrapErr();

    expect(error).toEqual({ kind: "io", message: "disk detached", path });
    expect(await readdir(dir)).toEqual([]);
  });

  test("a corrupt state file is a decode error", async () => {
    const path = join(dir, "stratum.state.json");
    await writeFile(path, JSON.stringify({ version: 9 }));

    const error = (await new LocalBackend({ path }).load())._unsafeUnwrapErr();

    expect(error.kind).toBe("decode");
  });

  test("a second lock fails while the first is held", async () => {
    const backend = new LocalBackend({ path: join(dir, "stratum.state.json") });
    const held = (await backend.lock(request))._unsafeUnwrap();

    const error = (await backend.lock({ ...request, who: "other@test" }))._unsafeUnwrapErr();

    expect(error.kind).toBe("state_conflict");
    expect(error.kind === "state_conflict" ? error.lock : undefined).toEqual(held);
  });

  test("unlock needs the id of the held lock", async () => {
    const backend = new LocalBackend({ path: join(dir, "stratum.state.json") });
    const held = (await backend.lock(request))._unsafeUnwrap();

    expect((await backend.unlock("wrong-id"))._unsafeUnwrapErr().kind).toBe("state_conflict");
    (await backend.unlock(held.id))._unsafeUnwrap();
    expect((await backend.readLock())._unsafeUnwrap()).toBeUndefined();
  });

  test("an expired lock is taken over", async () => {
    let now = new Date("2026-01-01T00:00:00Z");
    const backend = new LocalBackend({ path: join(dir, "stratum.state.json"), now: () => now });
    const stale = (await backend.lock(request))._unsafeUnwrap();

    now = new Date("2026-01-01T00:02:00Z");
    const fresh = (await backend.lock({ ...request, who: "other@test" }))._unsafeUnwrap();

    expect(fresh.id).not.toBe(stale.id);
    expect((await backend.readLock())._unsafeUnwrap()?.who).toBe("other@test");
    expect(await readdir(dir)).toEqual(["stratum.state.json.lock"]);
  });

  test("an expired lock replaced by another run before the takeover is left in place", async () => {
    const path = join(dir, "stratum.state.json");
    const theirs = {
      id: "other-run",
      who: "other@test",
      operation: "apply",
      createdAt: "2026-01-01T00:02:00.000Z",
      expiresAt: "2026-01-01T00:03:00.000Z",
    };
    let now = new Date("2026-01-01T00:00:00Z");
    let calls = 0;
    // The third reading of the clock happens after the expired lock was read and
    // before it is claimed; another run takes the lock over right then.
    const clock = (): Date => {
      calls += 1;
      if (calls === 3) {
        writeFileSync(`${path}.lock`, JSON.stringify(theirs));
      }
      return now;
    };
    const backend = new LocalBackend({ path, now: clock });
    (await backend.lock(request))._unsafeUnwrap();

    now = new Date("2026-01-01T00:02:00Z");
    const error = (await backend.lock(request))._unsafeUnwrapErr();

    expect(error).toEqual({ kind: "state_conflict", message: "State is locked", lock: theirs });
    expect((await backend.readLock())._unsafeUnwrap()).toEqual(theirs);
    expect(await readdir(dir)).toEqual(["stratum.state.json.lock"]);
  });

  test("forceUnlock drops the lock by id", async () => {
    const backend = new LocalBackend({ path: join(dir, "stratum.state.json") });
    const held = (await backend.lock(request))._unsafeUnwrap();

    expect((await backend.forceUnlock("wrong-id"))._unsafeUnwrapErr().kind).toBe("state_conflict");
    (await backend.forceUnlock(held.id))._unsafeUnwrap();
    (await backend.forceUnlock(held.id))._unsafeUnwrap();
    expect((await backend.readLock())._unsafeUnwrap()).toBeUndefined();
  });
});
