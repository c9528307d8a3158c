import { describe, expect, it } from "vitest";
import { InvalidOffsetsError, TokenMismatchError } from "../binary/errors.js";
import { MemoryLogger } from "../io/logger.js";
import { buildSeason, DEFAULT_LOOKUP } from "../test/fixtures.js";
import {
  applyCoefficientEdits,
  buildRoleMatrix,
  decodeSeason,
  describeRoleBits,
  describeRoleMask,
  seasonToJson,
} from "./playerRatings.js";
import type { SeasonJson } from "./playerRatings.js";

const names = {
  "1": "Goalkeeper",
  "2": "Central Defender",
  "4096": "Sweeper Keeper",
  "4503599627370496": "Inverted Full Back",
};

describe("decodeSeason", () => {
  it("decodes every section of a season", () => {
    const { buffer, anchors } = buildSeason();
    const season = decodeSeason(buffer, anchors);

    expect(season.anchors).toEqual(anchors);
    expect(season.expectedScores).toHaveLength(11);
    expect(season.expectedScores[0]).toEqual({ name: "Outcome 0", negative_multiplier: -1, positive_multiplier: 5 });
    expect(season.expectedScores[10]).toEqual({
      name: "Outcome 10",
      negative_multiplier: -101,
      positive_multiplier: 105,
    });
    expect(season.roleBlocks.map((block) => block.length)).toEqual([52, 52]);
    expect(season.roleBlocks[0]?.[0]).toEqual({ name: "attr0", value: -20 });
    expect(season.roleBlocks[0]?.[20]).toEqual({ name: "attr20", value: 0 });
    expect(season.roleBlocks[1]?.[51]).toEqual({ name: "attr51", value: 32 });
    expect(season.droppedCoefficients).toBe(0);
    expect(season.roleLookup).toEqual(DEFAULT_LOOKUP);
    expect(season.startValue).toBe(650);
    expect(season.version).toEqual({ version_major: 0, version_minor: 0, version_release: 6, version_year: 21 });
  });

  it("drops an incomplete trailing block with a warning", () => {
    const { buffer, anchors } = buildSeason({ blocks: 1, trailing: 3 });
    const logger = new MemoryLogger();
    const season = decodeSeason(buffer, anchors, { logger });

    expect(season.roleBlocks).toHaveLength(1);
    expect(season.droppedCoefficients).toBe(3);
    expect(logger.messages("warn")).toEqual(["role_data: trailing fragment with 3 entries ignored"]);
  });

  it("recovers from a score name that swallows the next key's length", () => {
    const { buffer, anchors } = buildSeason({ driftFirstName: true });
    const logger = new MemoryLogger();
    const season = decodeSeason(buffer, anchors, { logger });

    expect(season.expectedScores[0]).toEqual({ name: "Outcome 0", negative_multiplier: -1, positive_multiplier: 5 });
    expect(logger.messages("warn")).toHaveLength(1);
    expect(logger.messages("warn")[0]).toMatch(/^expected_score_data row 00: trimming stray byte before 0x/);
  });

  it("keeps large role masks exact", () => {
    const lookup = [{ index: 0, role: 2 ** 52 }];
    const { buffer, anchors } = buildSeason({ lookup });
    expect(decodeSeason(buffer, anchors).roleLookup).toEqual(lookup);
  });

  it("rejects anchors outside the buffer before decoding", () => {
    const { buffer, anchors } = buildSeason();
    expect(() => decodeSeason(buffer, { ...anchors, version: buffer.length })).toThrow(InvalidOffsetsError);
    expect(() => decodeSeason(buffer, { ...anchors, version: buffer.length })).toThrow(`version=${buffer.length}`);
  });

  it("fails when an anchor points at the wrong section", () => {
    const { buffer, anchors } = buildSeason();
    expect(() => decodeSeason(buffer, { ...anchors, start_value: anchors.version })).toThrow(TokenMismatchError);
  });
});

describe("seasonToJson", () => {
  it("wraps coefficient blocks and drops the anchors", () => {
    const { buffer, anchors } = buildSeason();
    const json = seasonToJson(decodeSeason(buffer, anchors));

    expect(Object.keys(json)).toEqual([
      "expected_score_data",
      "role_data",
      "role_lookup_data",
      "start_value",
      "version",
    ]);
    expect(json.role_data[1]?.coefficients[0]).toEqual({ name: "attr0", value: -19 });
    expect(json.start_value).toBe(650);
  });
});

describe("role masks", () => {
  it("names every set bit in bit order", () => {
    expect(describeRoleMask(4097, names)).toBe("Goalkeeper; Sweeper Keeper");
    expect(describeRoleBits(4097, names)).toBe("1; 4096");
    expect(describeRoleMask(2 ** 52, names)).toBe("Inverted Full Back");
  });

  it("falls back to hex when no bit is named", () => {
    expect(describeRoleMask(256, names)).toBe("0x100");
    expect(describeRoleBits(2n ** 60n, names)).toBe("0x1000000000000000");
  });
});

describe("buildRoleMatrix", () => {
  it("merges masks per index and skips blocks without a lookup row", () => {
    const matrix = buildRoleMatrix(
      {
        roleBlocks: [
          [
            { name: "a", value: 1 },
            { name: "b", value: 2 },
          ],
          [{ name: "a", value: 3 }],
          [{ name: "c", value: 9 }],
        ],
        roleLookup: DEFAULT_LOOKUP,
      },
      names
    );

    expect(matrix.columns).toEqual([
      { index: 0, roleBits: "1", header: "Goalkeeper" },
      { index: 1, roleBits: "2; 4096", header: "Central Defender; Sweeper Keeper" },
    ]);
    expect(matrix.coefficients).toEqual(["a", "b"]);
    expect(matrix.values).toEqual({
      a: { Goalkeeper: 1, "Central Defender; Sweeper Keeper": 3 },
      b: { Goalkeeper: 2 },
    });
  });
});

describe("applyCoefficientEdits", () => {
  const season: SeasonJson = {
    expected_score_data: [],
    role_data: [
      {
        coefficients: [
          { name: "a", value: 1 },
          { name: "b", value: 2 },
        ],
      },
    ],
    role_lookup_data: [],
    start_value: 650,
    version: { version_major: 0, version_minor: 0, version_release: 6, version_year: 21 },
  };

  it("rounds new values and reports what matched nothing", () => {
    const result = applyCoefficientEdits(season, { "0": { a: 1.6, zz: 1 }, "7": { a: 2 }, x: { a: 3 } });

    expect(result.changed).toBe(1);
    expect(result.skipped).toEqual(["0/zz", "7/a", "x/a"]);
    expect(result.season.role_data[0]?.coefficients).toEqual([
      { name: "a", value: 2 },
      { name: "b", value: 2 },
    ]);
  });

  it("leaves the input untouched", () => {
    applyCoefficientEdits(season, { "0": { a: 40 } });
    expect(season.role_data[0]?.coefficients[0]).toEqual({ name: "a", value: 1 });
  });
});
