import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "../binary/errors.js";
import { createReadStream } from "../io/streams.js";
import { JsonValueBuilder, parseJsonStream } from "../parser/streamParser.js";
import type { JsonValue } from "../parser/streamParser.js";
import { offsetTableFromJson } from "../patch/offsetTable.js";
import type { OffsetTable } from "../patch/offsetTable.js";
import type { CoefficientEdits, RoleNames, SeasonAnchors, SeasonSection } from "../records/playerRatings.js";
import type { WeightsLayout } from "../records/weights.js";
import {
  expectArray,
  expectInteger,
  expectIntegerMap,
  expectOffset,
  expectRecord,
  expectString,
  expectStrings,
} from "./validate.js";

/** The `config/` directory shipped next to `src/` and `dist/`. */
export const CONFIG_DIR = fileURLToPath(new URL("../../config/", import.meta.url));

export const DEFAULT_FILES = {
  offsets: path.join(CONFIG_DIR, "physical_constraints.offsets.json"),
  seasons: path.join(CONFIG_DIR, "player_ratings.seasons.json"),
  roleNames: path.join(CONFIG_DIR, "role_names.json"),
  weightsLayout: path.join(CONFIG_DIR, "weights.layout.json"),
} as const;

export const loadJsonFile = async (file: string, signal?: AbortSignal): Promise<JsonValue> => {
  const builder = new JsonValueBuilder();
  try {
    await parseJsonStream(createReadStream(file, signal), builder);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`cannot read JSON (${reason})`, file);
  }
  return builder.value;
};

export const loadOffsetTable = async (file: string = DEFAULT_FILES.offsets): Promise<OffsetTable> =>
  offsetTableFromJson(await loadJsonFile(file), file);

export const seasonAnchorsFromJson = (value: unknown, where: string): SeasonAnchors => {
  const record = expectRecord(value, where);
  const offsetOf = (section: SeasonSection): number => expectOffset(record[section], `${where}.${section}`);
  return {
    expected_score_data: offsetOf("expected_score_data"),
    role_data: offsetOf("role_data"),
    role_lookup_data: offsetOf("role_lookup_data"),
    start_value: offsetOf("start_value"),
    version: offsetOf("version"),
  };
};

/** season name → anchors, e.g. `{ "fm24": { "role_data": "0x00067AAE", … } }` */
export const loadSeasons = async (file: string = DEFAULT_FILES.seasons): Promise<Map<string, SeasonAnchors>> => {
  const root = expectRecord(await loadJsonFile(file), file);
  return new Map(Object.entries(root).map(([name, value]) => [name, seasonAnchorsFromJson(value, `${file}.${name}`)]));
};

export const loadRoleNames = async (file: string = DEFAULT_FILES.roleNames): Promise<RoleNames> => {
  const root = expectRecord(await loadJsonFile(file), file);
  const names: RoleNames = {};
  for (const [bit, name] of Object.entries(root)) {
    if (!/^\d+$/.test(bit)) {
      throw new ConfigError("role bits must be decimal integers", `${file}.${bit}`);
    }
    names[bit] = expectString(name, `${file}.${bit}`);
  }
  return names;
};

export const loadWeightsLayout = async (file: string = DEFAULT_FILES.weightsLayout): Promise<WeightsLayout> => {
  const root = expectRecord(await loadJsonFile(file), file);
  return {
    styles: expectStrings(root.styles, `${file}.styles`),
    fields: expectStrings(root.fields, `${file}.fields`),
    droppedYears:
      root.droppedYears === undefined
        ? []
        : expectArray(root.droppedYears, `${file}.droppedYears`).map((year, index) =>
            expectInteger(year, `${file}.droppedYears[${index}]`)
          ),
  };
};

/** field → integer, for patch edits and expected values. */
export const loadIntegerMap = async (file: string): Promise<Record<string, number>> =>
  expectIntegerMap(await loadJsonFile(file), file);

/** block index → coefficient name → value, for editing decoded ratings. */
export const loadCoefficientEdits = async (file: string): Promise<CoefficientEdits> => {
  const root = expectRecord(await loadJsonFile(file), file);
  return Object.fromEntries(Object.entries(root).map(([block, values]) => [block, expectIntegerMap(values, `${file}.${block}`)]));
};
