import { describe, expect, test } from "vitest";
import { changedAttributes, deepEqual } from "./diff.js";
import { ref, unknown } from "./tokens.js";

describe("deepEqual", () => {
  test("compares nested values structurally", () => {
    expect(deepEqual({ a: [1, { b: "x" }] }, { a: [1, { b: "x" }] })).toBe(true);
    expect(deepEqual({ a: [1, 2] }, { a: [2, 1] })).toBe(false);
    expect(deepEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(deepEqual([], {})).toBe(false);
    expect(deepEqual(null, undefined)).toBe(false);
  });
});

describe("changedAttributes", () => {
  test("lists declared attributes that differ, sorted", () => {
    expect(
      changedAttributes({ size: 2, name: "b", zone: "a" }, { size: 1, name: "a", zone: "a", arn: "x" }),
    ).toEqual(["name", "size"]);
  });

  test("attributes only in state are not compared", () => {
    expect(changedAttributes({ name: "a" }, { name: "a", arn: "computed" })).toEqual([]);
  });

  test("unknown values and unresolved references count as changed", () => {
    expect(changedAttributes({ vpc_id: unknown("net_vpc.main", "id") }, { vpc_id: "vpc-1" })).toEqual([
      "vpc_id",
    ]);
    expect(changedAttributes({ vpc_id: ref("net_vpc.main", "id") }, { vpc_id: "vpc-1" })).toEqual([
      "vpc_id",
    ]);
  });

  test("ignored attributes never count", () => {
    expect(changedAttributes({ a: 1, b: 2 }, { a: 0, b: 0 }, ["a"])).toEqual(["b"]);
    expect(changedAttributes({ a: 1, b: 2 }, { a: 0, b: 0 }, "all")).toEqual([]);
  });
});
