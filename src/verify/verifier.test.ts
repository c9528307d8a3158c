import { describe, expect, it } from "vitest";
import { compareCopies, describeCheck, orderFields, verifyExpected } from "./verifier.js";

describe("compareCopies", () => {
  it("lists each disagreeing pair", () => {
    expect(compareCopies([{ X: 100, Y: 1 }, { X: 200, Y: 1 }])).toEqual({
      ok: false,
      differences: [{ field: "X", copyA: 0, copyB: 1, a: 100, b: 200 }],
    });
  });

  it("compares every pair of three copies, fields in order", () => {
    const report = compareCopies([{ b: 1, a: 1 }, { b: 2, a: 1 }, { b: 1 }]);
    expect(report.differences.map(({ field, copyA, copyB }) => `${field}:${copyA}-${copyB}`)).toEqual([
      "a:0-2",
      "a:1-2",
      "b:0-1",
      "b:1-2",
    ]);
    expect(report.differences[0]).toEqual({ field: "a", copyA: 0, copyB: 2, a: 1, b: undefined });
  });

  it("ignores the listed fields", () => {
    expect(compareCopies([{ X: 100, version_year: 23 }, { X: 100, version_year: 24 }], ["version_year"])).toEqual({
      ok: true,
      differences: [],
    });
  });
});

describe("verifyExpected", () => {
  const copies = [{ X: 100 }, { X: 200 }];

  it("passes with a warning when only some copies match", () => {
    expect(verifyExpected(copies, { X: 100 })).toEqual({
      ok: true,
      warnings: [{ field: "X", expected: 100, values: [100, 200] }],
      failures: [],
    });
  });

  it("fails when no copy matches", () => {
    expect(verifyExpected(copies, { X: 300 })).toEqual({
      ok: false,
      warnings: [],
      failures: [{ field: "X", expected: 300, values: [100, 200] }],
    });
  });

  it("fails on fields no copy has", () => {
    const report = verifyExpected(copies, { Y: 1 });
    expect(report.ok).toBe(false);
    expect(report.failures[0]?.values).toEqual([undefined, undefined]);
  });

  it("is quiet when every copy matches", () => {
    expect(verifyExpected([{ X: 100 }, { X: 100 }], { X: 100 })).toEqual({ ok: true, warnings: [], failures: [] });
  });
});

describe("describeCheck", () => {
  it("shows each copy and the expected value", () => {
    expect(describeCheck({ field: "X", expected: 300, values: [100, 200] })).toBe(
      "X: copy0=100, copy1=200, expected=300"
    );
    expect(describeCheck({ field: "X", expected: 100, values: [100, undefined] })).toBe(
      "X: copy0=100, copy1=missing, expected=100"
    );
  });
});

describe("orderFields", () => {
  it("puts listed fields first and sorts the rest", () => {
    const ordered = orderFields({ b: 1, a: 2, c: 3, z: 4 }, ["c", "b", "q"]);
    expect(Object.keys(ordered)).toEqual(["c", "b", "a", "z"]);
    expect(ordered).toEqual({ a: 2, b: 1, c: 3, z: 4 });
  });
});
