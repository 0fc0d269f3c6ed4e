import { describe, expect, test } from "vitest";
import { plan } from "../core/planner.js";
import { emptyState } from "../core/state.js";
import type { ApplyReport, PlanStep, StateSnapshot } from "../core/types.js";
import { formatEvent, formatPlan, formatReport } from "./render.js";

describe("formatPlan", () => {
  test("says so when there is nothing to do", () => {
    const planned = plan([], emptyState("l"))._unsafeUnwrap();
    expect(formatPlan(planned)).toBe("No changes. Infrastructure matches the declarations.");
  });

  test("lists attributes of new objects when verbose", () => {
    const planned = plan(
      [{ type: "storage_bucket", name: "logs", attributes: { name: "logs", size: 3 } }],
      emptyState("l"),
    )._unsafeUnwrap();

    expect(formatPlan(planned, true)).toBe(
      [
        "  + storage_bucket.logs",
        '      name = "logs"',
        "      size = 3",
        "",
        "Plan: 1 to create, 0 to update, 0 to replace, 0 to delete.",
      ].join("\n"),
    );
  });

  test("marks each kind of change", () => {
    const state: StateSnapshot = {
      ...emptyState("l"),
      resources: {
        "storage_bucket.logs": {
          type: "storage_bucket",
          id: "b-1",
          attributes: { name: "logs", tags: {} },
          dependencies: [],
        },
        "net_security_group.web": { type: "net_security_group", id: "sg-1", attributes: { name: "web" }, dependencies: [] },
        "net_vpc.old": { type: "net_vpc", id: "vpc-9", attributes: {}, dependencies: [] },
      },
    };
    const planned = plan(
      [
        { type: "storage_bucket", name: "logs", attributes: { name: "logs", tags: { team: "infra" } } },
        {
          type: "net_security_group",
          name: "web",
          attributes: { name: "web-v2" },
          lifecycle: { createBeforeDestroy: true },
        },
      ],
      state,
      { schemas: { storage_bucket: { mutableAttributes: ["tags"], createBeforeDestroy: false } } },
    )._unsafeUnwrap();

    expect(formatPlan(planned)).toBe(
      [
        "  +/- net_security_group.web: name forces replacement",
        "  - net_vpc.old",
        "  ~ storage_bucket.logs: tags",
        "warning: net_security_group.web: No schema for type 'net_security_group'; every attribute is treated as immutable",
        "",
        "Plan: 0 to create, 1 to update, 1 to replace, 1 to delete.",
      ].join("\n"),
    );
  });
});

describe("formatEvent", () => {
  const step: PlanStep = {
    id: "storage_bucket.logs:create",
    address: "storage_bucket.logs",
    type: "storage_bucket",
    operation: "create",
    action: "create",
    attributes: {},
    dependencies: [],
    dependsOn: [],
    deposed: false,
  };

  test("prints progress lines", () => {
    expect(formatEvent({ type: "step_start", step, attempt: 1 })).toBe("storage_bucket.logs:create: started");
    expect(formatEvent({ type: "step_start", step, attempt: 2 })).toBeNull();
    expect(formatEvent({ type: "step_retry", step, attempt: 1, delayMs: 200, message: "throttled" })).toBe(
      "storage_bucket.logs:create: attempt 1 failed (throttled); retrying in 200ms",
    );
    expect(formatEvent({ type: "step_skipped", step, cause: "net_vpc.main:create" })).toBe(
      "storage_bucket.logs:create: skipped, net_vpc.main:create did not complete",
    );
  });

  test("only reports refreshes that found something", () => {
    expect(formatEvent({ type: "refreshed", dropped: [], drifted: [] })).toBeNull();
    expect(formatEvent({ type: "refreshed", dropped: ["a.b"], drifted: [] })).toBe(
      "Refreshed state: 1 gone, 0 drifted",
    );
  });
});

describe("formatReport", () => {
  test("counts steps by status and lists errors", () => {
    const report: ApplyReport = {
      result: "partial_failure",
      steps: [
        { id: "a.a:create", address: "a.a", operation: "create", status: "applied", attempts: 1 },
        { id: "a.b:create", address: "a.b", operation: "create", status: "failed", attempts: 1, error: "boom" },
        { id: "a.c:create", address: "a.c", operation: "create", status: "skipped", attempts: 0 },
      ],
      errors: ["a.b: boom"],
      durationMs: 12,
    };

    expect(formatReport(report)).toBe(
      "Apply partial failure: 1 applied, 1 failed, 1 skipped, 0 cancelled (12ms).\n  a.b: boom",
    );
  });
});
