import { describe, expect, it } from "vitest";
import { ConfigError } from "../binary/errors.js";
import { copyCount, offsetTableFromJson } from "./offsetTable.js";

describe("offsetTableFromJson", () => {
  it("reads offset lists written as numbers or hex strings", () => {
    const table = offsetTableFromJson({
      name: "physical_constraints",
      ignoredFields: ["version_year"],
      order: ["walk_speed"],
      fields: { walk_speed: ["0x17", 94], run_speed: [39] },
    });

    expect(table.name).toBe("physical_constraints");
    expect([...table.fields]).toEqual([
      ["walk_speed", [23, 94]],
      ["run_speed", [39]],
    ]);
    expect([...table.ignoredFields]).toEqual(["version_year"]);
    expect(table.order).toEqual(["walk_speed"]);
  });

  it("orders loc/loc2 objects by copy number", () => {
    const table = offsetTableFromJson({ fields: { speed: { loc10: 3, loc2: "0x10", loc: "0x5" } } });
    expect(table.fields.get("speed")).toEqual([5, 16, 3]);
  });

  it("fills in defaults", () => {
    const table = offsetTableFromJson({ fields: {} });
    expect(table).toEqual({ name: "offsets", fields: new Map(), ignoredFields: new Set(), order: [] });
  });

  it("names the path of a bad entry", () => {
    expect(() => offsetTableFromJson({ fields: { walk_speed: [] } })).toThrow(
      "$.fields.walk_speed: expected at least one offset"
    );
    expect(() => offsetTableFromJson({ fields: { walk_speed: [1, "17"] } }, "offsets.json")).toThrow(
      'offsets.json.fields.walk_speed[1]: expected a non-negative integer or a "0x…" string'
    );
    expect(() => offsetTableFromJson({ fields: { walk_speed: 17 } })).toThrow(ConfigError);
    expect(() => offsetTableFromJson([])).toThrow("$: expected an object");
  });
});

describe("copyCount", () => {
  it("is the longest occurrence list", () => {
    expect(copyCount(offsetTableFromJson({ fields: { a: [1], b: [2, 3, 4] } }))).toBe(3);
    expect(copyCount(offsetTableFromJson({ fields: {} }))).toBe(0);
  });
});
