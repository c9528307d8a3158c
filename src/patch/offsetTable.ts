import { ConfigError } from "../binary/errors.js";
import { expectArray, expectOffset, expectRecord, expectStrings, isRecord } from "../config/validate.js";

/**
 * Where each copy of a field's key text starts. A file may store the same record more
 * than once; `fields.get(name)[n]` is the key offset inside copy `n`.
 */
export type OffsetTable = {
  readonly name: string;
  readonly fields: ReadonlyMap<string, readonly number[]>;
  /** Fields that legitimately differ between copies (version stamps). */
  readonly ignoredFields: ReadonlySet<string>;
  /** Presentation order; fields not listed follow alphabetically. */
  readonly order: readonly string[];
};

const readOccurrences = (value: unknown, path: string): number[] => {
  if (Array.isArray(value)) {
    return expectArray(value, path).map((item, index) => expectOffset(item, `${path}[${index}]`));
  }
  if (isRecord(value)) {
    // {"loc": …, "loc2": …, "loc3": …}
    const keys = Object.keys(value).sort((a, b) => a.length - b.length || a.localeCompare(b));
    return keys.map((key) => expectOffset(value[key], `${path}.${key}`));
  }
  throw new ConfigError('expected an array of offsets or {"loc", "loc2"}', path);
};

export const offsetTableFromJson = (value: unknown, path = "$"): OffsetTable => {
  const root = expectRecord(value, path);
  const fieldsJson = expectRecord(root.fields, `${path}.fields`);

  const fields = new Map<string, readonly number[]>();
  for (const [field, occurrences] of Object.entries(fieldsJson)) {
    const offsets = readOccurrences(occurrences, `${path}.fields.${field}`);
    if (offsets.length === 0) {
      throw new ConfigError("expected at least one offset", `${path}.fields.${field}`);
    }
    fields.set(field, offsets);
  }

  return {
    name: typeof root.name === "string" ? root.name : "offsets",
    fields,
    ignoredFields: new Set(root.ignoredFields === undefined ? [] : expectStrings(root.ignoredFields, `${path}.ignoredFields`)),
    order: root.order === undefined ? [] : expectStrings(root.order, `${path}.order`),
  };
};

/** Number of copies the table describes: the longest occurrence list. */
export const copyCount = (table: OffsetTable): number =>
  Math.max(0, ...[...table.fields.values()].map((offsets) => offsets.length));
