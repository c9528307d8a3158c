import { describe, expect, it } from "vitest";
import { MemoryLogger } from "../io/logger.js";
import { decodeWeights, scanWeightKeys, weightsToJson } from "./weights.js";
import type { WeightsLayout } from "./weights.js";

const int32 = (key: string, value: number): Buffer => {
  const bytes = Buffer.alloc(5);
  bytes.writeUInt8(0x02, 0);
  bytes.writeInt32LE(value, 1);
  return Buffer.concat([Buffer.from(key), bytes]);
};

const nested = (key: string): Buffer => Buffer.concat([Buffer.from(key), Buffer.from([0x0a, 0, 0, 0, 0, 0])]);

const bare = (key: string, terminator: number): Buffer => Buffer.concat([Buffer.from(key), Buffer.from([terminator])]);

const style = (name: string): Buffer => nested(`TEAM_PICKING_STYLE::${name}`);
const weight = (name: string, value: number): Buffer => int32(`simatchshared::${name}`, value);

const layout: WeightsLayout = {
  styles: ["TPS_FIRST_TEAM_PICKING", "TPS_TOTAL_RESERVE_PICKING"],
  fields: ["TSF_CA", "TSF_PA", "TSF_FORM"],
  droppedYears: [23],
};

const sample = (): Buffer =>
  Buffer.concat([
    int32("ME_PACK_VERSION_MAJOR", 1),
    bare("ME_PACK_VERSION_MINOR", 0x00),
    int32("ME_PACK_VERSION_RELEASE", 3),
    int32("ME_PACK_VERSION_YEAR", 24),
    weight("TSF_CA", 99),
    style("TPS_FIRST_TEAM_PICKING"),
    weight("TSF_CA", 40),
    weight("TSF_PA", 30),
    style("TPS_TOTAL_RESERVE_PICKING"),
    weight("TSF_FORM", -5),
    int32("ME_PACK_VERSION_MAJOR", 1),
    int32("ME_PACK_VERSION_MINOR", 0),
    int32("ME_PACK_VERSION_RELEASE", 0),
    int32("ME_PACK_VERSION_YEAR", 23),
    style("TPS_FIRST_TEAM_PICKING"),
    weight("TSF_CA", 1),
  ]);

describe("scanWeightKeys", () => {
  it("fills missing version parts with 0 but leaves a bare year empty", () => {
    const buffer = Buffer.concat([bare("ME_PACK_VERSION_MAJOR", 0x6a), bare("ME_PACK_VERSION_YEAR", 0x82)]);
    expect(scanWeightKeys(buffer)).toEqual([
      { key: "ME_PACK_VERSION_MAJOR", value: 0, offset: 0 },
      { key: "ME_PACK_VERSION_YEAR", value: null, offset: 22 },
    ]);
  });

  it("keeps the full prefixed key", () => {
    const keys = scanWeightKeys(sample()).map((entry) => entry.key);
    expect(keys.slice(4, 7)).toEqual([
      "simatchshared::TSF_CA",
      "TEAM_PICKING_STYLE::TPS_FIRST_TEAM_PICKING",
      "simatchshared::TSF_CA",
    ]);
  });
});

describe("decodeWeights", () => {
  it("groups weights by season and style, dropping configured years", () => {
    const logger = new MemoryLogger();
    const document = decodeWeights(sample(), layout, { logger });

    expect(document).toEqual({
      seasons: [
        {
          ME_VERSION: {
            ME_PACK_VERSION_MAJOR: 1,
            ME_PACK_VERSION_MINOR: 0,
            ME_PACK_VERSION_RELEASE: 3,
            ME_PACK_VERSION_YEAR: 24,
          },
          styles: {
            TPS_FIRST_TEAM_PICKING: { TSF_CA: 40, TSF_PA: 30, TSF_FORM: 0 },
            TPS_TOTAL_RESERVE_PICKING: { TSF_CA: 0, TSF_PA: 0, TSF_FORM: -5 },
          },
        },
      ],
      strayWeights: 1,
    });
    expect(logger.messages("warn")).toEqual(["weights: 1 weight outside any team-picking style"]);
    expect(logger.messages("info")).toContain("weights: dropping block for year 23");
  });

  it("keeps every year when none is dropped", () => {
    const document = decodeWeights(sample(), { ...layout, droppedYears: [] });
    expect(document.seasons.map((season) => season.ME_VERSION.ME_PACK_VERSION_YEAR)).toEqual([24, 23]);
    expect(document.seasons[1]?.styles.TPS_FIRST_TEAM_PICKING).toEqual({ TSF_CA: 1, TSF_PA: 0, TSF_FORM: 0 });
  });

  it("returns no seasons for data without weight keys", () => {
    expect(decodeWeights(Buffer.from("nothing to see"), layout)).toEqual({ seasons: [], strayWeights: 0 });
  });
});

describe("weightsToJson", () => {
  it("puts the styles beside the version stamp", () => {
    const json = weightsToJson(decodeWeights(sample(), layout));
    expect(json.WEIGHTS).toHaveLength(1);
    expect(Object.keys(json.WEIGHTS[0] ?? {})).toEqual([
      "ME_VERSION",
      "TPS_FIRST_TEAM_PICKING",
      "TPS_TOTAL_RESERVE_PICKING",
    ]);
  });
});
