import { COEFFICIENT_INTEGERS, LOOKUP_INTEGERS, VERSION_INTEGERS } from "../binary/codec.js";
import { ContainerMarker } from "../binary/format.js";
import { ContainerWriter } from "../binary/writer.js";
import type { OffsetTable } from "../patch/offsetTable.js";
import type { RoleLookup, SeasonAnchors } from "../records/playerRatings.js";

export const SCORE_ROWS = 11;
export const BLOCK_SIZE = 52;

export type SeasonFixture = {
  buffer: Buffer;
  anchors: SeasonAnchors;
};

export type SeasonFixtureOptions = {
  /** Complete coefficient blocks to write. */
  blocks?: number;
  /** Extra coefficients after the last complete block. */
  trailing?: number;
  lookup?: RoleLookup[];
  /** Declare the first score name one byte too long, as some files do. */
  driftFirstName?: boolean;
};

export const scoreName = (row: number): string => `Outcome ${row}`;
export const coefficientName = (entry: number): string => `attr${entry}`;
export const coefficientValue = (block: number, entry: number): number => entry - 20 + block;

export const DEFAULT_LOOKUP: RoleLookup[] = [
  { index: 0, role: 1 },
  { index: 1, role: 4096 },
  { index: 1, role: 2 },
];

const writeCoefficient = (writer: ContainerWriter, name: string, value: number): void => {
  writer.writeRaw(Buffer.from(":"));
  writer.writeKey("name");
  writer.writeString(name);
  writer.writeKey("value");
  writer.writeInteger(value, COEFFICIENT_INTEGERS);
};

/**
 * One season laid out the way the ratings decoder expects: score table, coefficient
 * blocks, role lookup, start value and version stamp (0.0.6, year 21).
 */
export const buildSeason = ({
  blocks = 2,
  trailing = 0,
  lookup = DEFAULT_LOOKUP,
  driftFirstName = false,
}: SeasonFixtureOptions = {}): SeasonFixture => {
  const writer = new ContainerWriter();
  writer.writeRaw(Buffer.from("header"));

  const expectedScores = writer.writeKey("expected_score_data");
  writer.writeObjectMarker();
  for (let row = 0; row < SCORE_ROWS; row += 1) {
    const name = scoreName(row);
    if (row === 0 && driftFirstName) {
      writer.writeKey("name");
      writer.writeByte(0x80 | (name.length + 1));
      writer.writeRaw(Buffer.from(name));
    } else {
      writer.writeStringField("name", name);
    }
    writer.writeIntField("negative_multiplier", -(10 * row + 1));
    writer.writeIntField("positive_multiplier", 10 * row + 5);
  }

  const roleData = writer.writeKey("role_data");
  writer.writeObjectMarker();
  for (let block = 0; block < blocks; block += 1) {
    for (let entry = 0; entry < BLOCK_SIZE; entry += 1) {
      writeCoefficient(writer, coefficientName(entry), coefficientValue(block, entry));
    }
  }
  for (let entry = 0; entry < trailing; entry += 1) {
    writeCoefficient(writer, coefficientName(entry), 1);
  }

  const roleLookup = writer.writeKey("role_lookup_data");
  writer.writeArrayMarker(lookup.length);
  for (const { index, role } of lookup) {
    writer.writeKey("index");
    writer.writeInteger(index, LOOKUP_INTEGERS);
    writer.writeKey("role");
    writer.writeInteger(role, LOOKUP_INTEGERS);
  }

  const startValue = writer.writeKey("start_value");
  writer.writeInt32(650);

  const version = writer.writeKey("version");
  writer.writeByte(ContainerMarker.KeyedObject);
  for (const [field, value] of [
    ["version_major", 0],
    ["version_minor", 0],
    ["version_release", 6],
    ["version_year", 21],
  ] as const) {
    writer.writeKey(field);
    writer.writeInteger(value, VERSION_INTEGERS);
  }

  return {
    buffer: writer.toBuffer(),
    anchors: {
      expected_score_data: expectedScores,
      role_data: roleData,
      role_lookup_data: roleLookup,
      start_value: startValue,
      version,
    },
  };
};

export type ConstraintFixture = {
  buffer: Buffer;
  table: OffsetTable;
};

/**
 * A record stored `copies` times as plain int32 fields, with the offset table the
 * writer observed. `version_year` is the one ignored field.
 */
export const buildConstraints = (
  values: Readonly<Record<string, number>>,
  { copies = 2, order = [] }: { copies?: number; order?: string[] } = {}
): ConstraintFixture => {
  const writer = new ContainerWriter();
  for (let copy = 0; copy < copies; copy += 1) {
    writer.writeKey("physical_constraints");
    writer.writeObjectMarker();
    for (const [field, value] of Object.entries(values)) {
      writer.writeIntField(field, value);
    }
  }

  const offsets = writer.getKeyOffsets();
  offsets.delete("physical_constraints");
  return {
    buffer: writer.toBuffer(),
    table: {
      name: "physical_constraints",
      fields: offsets,
      ignoredFields: new Set(["version_year"]),
      order,
    },
  };
};
