import { silentLogger } from "../io/logger.js";
import type { Logger } from "../io/logger.js";
import type { KeyScanEntry, KeyScanShape } from "../parser/shapes.js";
import { StructuralParser } from "../parser/structuralParser.js";

export const STYLE_PREFIX = "TEAM_PICKING_STYLE::";
export const WEIGHT_PREFIX = "simatchshared::";
export const VERSION_PREFIX = "ME_PACK_VERSION_";
const VERSION_YEAR = `${VERSION_PREFIX}YEAR`;
const MISC_STYLE = "MISC";

export const WEIGHT_KEYS_SHAPE: KeyScanShape = {
  kind: "keyScan",
  prefixes: [STYLE_PREFIX, `${WEIGHT_PREFIX}TSF_`, VERSION_PREFIX],
  keyCharacter: /[A-Z0-9_:]/,
  maxKeyLength: 96,
  nestedMarker: 0x0a,
  nestedHeaderLength: 5,
  terminators: [0x82, 0x5a, 0x6a, 0x00],
};

/** Which styles and weights a season block carries, from `config/weights.layout.json`. */
export type WeightsLayout = {
  styles: string[];
  fields: string[];
  /** Version years whose blocks are left out of the document. */
  droppedYears: number[];
};

export type PackVersion = {
  ME_PACK_VERSION_MAJOR: number;
  ME_PACK_VERSION_MINOR: number;
  ME_PACK_VERSION_RELEASE: number;
  ME_PACK_VERSION_YEAR: number;
};

export type SeasonWeights = {
  ME_VERSION: PackVersion;
  /** style name → weight name → value */
  styles: Record<string, Record<string, number>>;
};

export type WeightsDocument = {
  seasons: SeasonWeights[];
  /** Weights that appeared before any style key in their block. */
  strayWeights: number;
};

type RawBlock = {
  version: Map<string, number | null>;
  styles: Map<string, Map<string, number>>;
};

export type DecodeWeightsOptions = {
  logger?: Logger;
};

/** Scan result with the defaults applied: version parts are 0 when absent, except the year. */
export const scanWeightKeys = (buffer: Buffer, logger: Logger = silentLogger): KeyScanEntry[] =>
  new StructuralParser(buffer, { logger })
    .parse(WEIGHT_KEYS_SHAPE, { start: 0 })
    .map((entry) =>
      entry.value === null && entry.key.startsWith(VERSION_PREFIX) && entry.key !== VERSION_YEAR
        ? { ...entry, value: 0 }
        : entry
    );

const groupBlocks = (entries: KeyScanEntry[]): { blocks: RawBlock[]; stray: number } => {
  const blocks: RawBlock[] = [];
  let pending = new Map<string, number | null>();
  let block: RawBlock | undefined;
  let style: Map<string, number> | undefined;
  let stray = 0;

  const openBlock = (): RawBlock => {
    const opened = { version: pending, styles: new Map<string, Map<string, number>>() };
    blocks.push(opened);
    pending = new Map();
    return opened;
  };

  for (const { key, value } of entries) {
    if (key.startsWith(VERSION_PREFIX)) {
      pending.set(key, value);
      if (key === VERSION_YEAR) {
        block = openBlock();
        style = undefined;
      }
      continue;
    }

    block ??= openBlock();
    if (key.startsWith(STYLE_PREFIX)) {
      style = new Map();
      block.styles.set(key.slice(STYLE_PREFIX.length), style);
      continue;
    }

    if (!style) {
      style = new Map();
      block.styles.set(MISC_STYLE, style);
    }
    if (style === block.styles.get(MISC_STYLE)) {
      stray += 1;
    }
    if (value !== null) {
      style.set(key.startsWith(WEIGHT_PREFIX) ? key.slice(WEIGHT_PREFIX.length) : key, value);
    }
  }

  return { blocks, stray };
};

const toPackVersion = (version: Map<string, number | null>): PackVersion => ({
  ME_PACK_VERSION_MAJOR: version.get(`${VERSION_PREFIX}MAJOR`) ?? 0,
  ME_PACK_VERSION_MINOR: version.get(`${VERSION_PREFIX}MINOR`) ?? 0,
  ME_PACK_VERSION_RELEASE: version.get(`${VERSION_PREFIX}RELEASE`) ?? 0,
  ME_PACK_VERSION_YEAR: version.get(VERSION_YEAR) ?? 0,
});

/**
 * Group the team-picking weights into season blocks. A version year key closes a
 * version stamp and opens a block; every style lists all layout fields, 0 where the
 * file has none.
 */
export const decodeWeights = (
  buffer: Buffer,
  layout: WeightsLayout,
  { logger = silentLogger }: DecodeWeightsOptions = {}
): WeightsDocument => {
  const entries = scanWeightKeys(buffer, logger);
  logger.info(`weights: ${entries.length} keys`);
  const { blocks, stray } = groupBlocks(entries);
  if (stray > 0) {
    logger.warn(`weights: ${stray} weight${stray === 1 ? "" : "s"} outside any team-picking style`);
  }

  const seasons: SeasonWeights[] = [];
  for (const block of blocks) {
    const version = toPackVersion(block.version);
    if (layout.droppedYears.includes(version.ME_PACK_VERSION_YEAR)) {
      logger.info(`weights: dropping block for year ${version.ME_PACK_VERSION_YEAR}`);
      continue;
    }

    const styles: Record<string, Record<string, number>> = {};
    for (const name of layout.styles) {
      const found = block.styles.get(name);
      styles[name] = Object.fromEntries(layout.fields.map((field) => [field, found?.get(field) ?? 0]));
    }
    seasons.push({ ME_VERSION: version, styles });
  }

  return { seasons, strayWeights: stray };
};

/** `{ WEIGHTS: [ { ME_VERSION, TPS_…: {…}, … } ] }` */
export const weightsToJson = (document: WeightsDocument): { WEIGHTS: Record<string, unknown>[] } => ({
  WEIGHTS: document.seasons.map((season) => ({ ME_VERSION: season.ME_VERSION, ...season.styles })),
});
