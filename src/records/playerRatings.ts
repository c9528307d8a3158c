import { COEFFICIENT_INTEGERS, LOOKUP_INTEGERS, VERSION_INTEGERS } from "../binary/codec.js";
import { InvalidOffsetsError } from "../binary/errors.js";
import { ContainerMarker, OBJECT_MARKERS } from "../binary/format.js";
import { hex } from "../binary/hexdump.js";
import { trailingControlByteResync } from "../binary/resync.js";
import { silentLogger } from "../io/logger.js";
import type { Logger } from "../io/logger.js";
import type {
  BlockArrayShape,
  IndexTableShape,
  KeyedObjectShape,
  NamedValue,
  ScalarShape,
  TupleTableShape,
} from "../parser/shapes.js";
import { StructuralParser } from "../parser/structuralParser.js";

export const SEASON_SECTIONS = [
  "expected_score_data",
  "role_data",
  "role_lookup_data",
  "start_value",
  "version",
] as const;

export type SeasonSection = (typeof SEASON_SECTIONS)[number];

/** Offset of the first byte of each section's key text. */
export type SeasonAnchors = Record<SeasonSection, number>;

export type ExpectedScore = {
  name: string;
  negative_multiplier: number;
  positive_multiplier: number;
};

export type RoleLookup = {
  index: number;
  role: number;
};

export type VersionStamp = {
  version_major: number;
  version_minor: number;
  version_release: number;
  version_year: number;
};

export type Season = {
  anchors: SeasonAnchors;
  expectedScores: ExpectedScore[];
  roleBlocks: NamedValue[][];
  /** Coefficients of a trailing block that never completed. */
  droppedCoefficients: number;
  roleLookup: RoleLookup[];
  startValue: number;
  version: VersionStamp;
};

export const EXPECTED_SCORE_SHAPE: TupleTableShape = {
  kind: "tupleTable",
  key: "expected_score_data",
  containerMarkers: OBJECT_MARKERS,
  rows: 11,
  fields: [
    { key: "name", kind: "string" },
    { key: "negative_multiplier", kind: "integer" },
    { key: "positive_multiplier", kind: "integer" },
  ],
  resync: trailingControlByteResync,
};

export const ROLE_DATA_SHAPE: BlockArrayShape = {
  kind: "blockArray",
  key: "role_data",
  nameLabel: Buffer.from(":\x04name", "latin1"),
  valueLabel: Buffer.from("\x05value", "latin1"),
  blockSize: 52,
  integers: COEFFICIENT_INTEGERS,
};

export const ROLE_LOOKUP_SHAPE: IndexTableShape = {
  kind: "indexTable",
  key: "role_lookup_data",
  columns: [
    { name: "index", label: Buffer.from("\x05index", "latin1") },
    { name: "role", label: Buffer.from("\x04role", "latin1") },
  ],
  integers: LOOKUP_INTEGERS,
};

export const START_VALUE_SHAPE: ScalarShape = {
  kind: "scalar",
  key: "start_value",
};

export const VERSION_SHAPE: KeyedObjectShape = {
  kind: "keyedObject",
  key: "version",
  marker: ContainerMarker.KeyedObject,
  fields: ["version_major", "version_minor", "version_release", "version_year"],
  integers: VERSION_INTEGERS,
};

export type DecodeSeasonOptions = {
  logger?: Logger;
};

const toVersionStamp = (fields: Record<string, number>): VersionStamp => ({
  version_major: fields.version_major ?? 0,
  version_minor: fields.version_minor ?? 0,
  version_release: fields.version_release ?? 0,
  version_year: fields.version_year ?? 0,
});

/**
 * Decode one season. Each section is bounded by the anchor of the section after it;
 * the version record runs to the end of the buffer.
 */
export const decodeSeason = (
  buffer: Buffer,
  anchors: SeasonAnchors,
  { logger = silentLogger }: DecodeSeasonOptions = {}
): Season => {
  const invalid = SEASON_SECTIONS.filter((section) => {
    const offset = anchors[section];
    return !Number.isInteger(offset) || offset < 0 || offset >= buffer.length;
  }).map((section) => ({ label: section, offset: anchors[section] }));
  if (invalid.length > 0) {
    throw new InvalidOffsetsError(invalid, buffer.length);
  }

  logger.info(
    "Decoding season at " + SEASON_SECTIONS.map((section) => `${section}=${hex(anchors[section])}`).join(", ")
  );

  const parser = new StructuralParser(buffer, { logger });
  const expectedScores = parser
    .parse(EXPECTED_SCORE_SHAPE, { start: anchors.expected_score_data, stop: anchors.role_data })
    .map((row) => ({
      name: String(row.name),
      negative_multiplier: Number(row.negative_multiplier),
      positive_multiplier: Number(row.positive_multiplier),
    }));
  const roles = parser.parse(ROLE_DATA_SHAPE, { start: anchors.role_data, stop: anchors.role_lookup_data });
  const lookup = parser.parse(ROLE_LOOKUP_SHAPE, { start: anchors.role_lookup_data, stop: anchors.start_value });
  const startValue = parser.parse(START_VALUE_SHAPE, { start: anchors.start_value });
  const version = parser.parse(VERSION_SHAPE, { start: anchors.version });

  return {
    anchors,
    expectedScores,
    roleBlocks: roles.blocks,
    droppedCoefficients: roles.droppedEntries,
    roleLookup: lookup.rows.map((row) => ({ index: row.index ?? 0, role: row.role ?? 0 })),
    startValue,
    version: toVersionStamp(version),
  };
};

export type SeasonJson = {
  expected_score_data: ExpectedScore[];
  role_data: { coefficients: NamedValue[] }[];
  role_lookup_data: RoleLookup[];
  start_value: number;
  version: VersionStamp;
};

/** External representation: anchors are dropped, each block is wrapped as `{ coefficients }`. */
export const seasonToJson = (season: Season): SeasonJson => ({
  expected_score_data: season.expectedScores,
  role_data: season.roleBlocks.map((coefficients) => ({ coefficients })),
  role_lookup_data: season.roleLookup,
  start_value: season.startValue,
  version: season.version,
});

/** Role bit (as a decimal string) → role name. */
export type RoleNames = Record<string, string>;

const roleBits = (mask: bigint, names: RoleNames): [string, string][] =>
  Object.entries(names)
    .filter(([bit]) => (mask & BigInt(bit)) !== 0n)
    .sort(([a], [b]) => (BigInt(a) < BigInt(b) ? -1 : BigInt(a) > BigInt(b) ? 1 : 0));

const maskHex = (mask: bigint): string => `0x${mask.toString(16).toUpperCase()}`;

/** "Goalkeeper; Sweeper Keeper", or the mask in hex when no bit has a name. */
export const describeRoleMask = (mask: number | bigint, names: RoleNames): string => {
  const value = BigInt(mask);
  const matches = roleBits(value, names);
  return matches.length > 0 ? matches.map(([, name]) => name).join("; ") : maskHex(value);
};

/** "1; 4096", or the mask in hex when no bit has a name. */
export const describeRoleBits = (mask: number | bigint, names: RoleNames): string => {
  const value = BigInt(mask);
  const matches = roleBits(value, names);
  return matches.length > 0 ? matches.map(([bit]) => bit).join("; ") : maskHex(value);
};

export type RoleColumn = {
  index: number;
  roleBits: string;
  header: string;
};

export type RoleMatrix = {
  columns: RoleColumn[];
  /** Coefficient names in first-seen order. */
  coefficients: string[];
  /** coefficient name → column header → value */
  values: Record<string, Record<string, number>>;
};

/**
 * Cross coefficient blocks with the lookup table: block N belongs to the roles whose
 * lookup rows carry index N. Masks sharing an index are OR-ed together; blocks with no
 * lookup row are left out.
 */
export const buildRoleMatrix = (season: Pick<Season, "roleBlocks" | "roleLookup">, names: RoleNames): RoleMatrix => {
  const masks = new Map<number, bigint>();
  for (const { index, role } of season.roleLookup) {
    masks.set(index, (masks.get(index) ?? 0n) | BigInt(role));
  }

  const columns = [...masks.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, mask]) => ({
      index,
      roleBits: describeRoleBits(mask, names),
      header: describeRoleMask(mask, names),
    }));
  const headers = new Map(columns.map((column) => [column.index, column.header]));

  const values: Record<string, Record<string, number>> = {};
  const coefficients: string[] = [];
  season.roleBlocks.forEach((block, index) => {
    const header = headers.get(index);
    if (header === undefined) return;
    for (const { name, value } of block) {
      let row = values[name];
      if (!row) {
        row = {};
        values[name] = row;
        coefficients.push(name);
      }
      row[header] = value;
    }
  });

  return { columns, coefficients, values };
};

/** block index → coefficient name → new value */
export type CoefficientEdits = Record<string, Record<string, number>>;

export type CoefficientEditResult = {
  season: SeasonJson;
  changed: number;
  /** "block/name" pairs that matched nothing. */
  skipped: string[];
};

/** Apply edits to a decoded season without touching the input. Values are rounded to integers. */
export const applyCoefficientEdits = (season: SeasonJson, edits: CoefficientEdits): CoefficientEditResult => {
  const roleData = season.role_data.map((block) => ({
    coefficients: block.coefficients.map((coefficient) => ({ ...coefficient })),
  }));
  const skipped: string[] = [];
  let changed = 0;

  for (const [blockKey, values] of Object.entries(edits)) {
    const block = /^\d+$/.test(blockKey) ? roleData[Number(blockKey)] : undefined;
    for (const [name, value] of Object.entries(values)) {
      const coefficient = block?.coefficients.find((entry) => entry.name === name);
      if (!coefficient) {
        skipped.push(`${blockKey}/${name}`);
        continue;
      }
      coefficient.value = Math.round(value);
      changed += 1;
    }
  }

  return { season: { ...season, role_data: roleData }, changed, skipped };
};
