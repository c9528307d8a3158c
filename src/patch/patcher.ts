import { InvalidOffsetsError } from "../binary/errors.js";
import { INT32_MIN, UINT32_MAX, ValueMarker } from "../binary/format.js";
import { hex, hexByte } from "../binary/hexdump.js";
import { readBinaryFile, writeBinaryFile } from "../io/streams.js";
import { silentLogger } from "../io/logger.js";
import type { Logger } from "../io/logger.js";
import type { OffsetTable } from "./offsetTable.js";

const VALUE_WIDTH = 4;

export type PatchWarning =
  | { kind: "OffsetTableMiss"; field: string; message: string }
  | { kind: "IndicatorMismatch"; field: string; copy: number; offset: number; indicator: number; message: string };

export type AppliedEdit = {
  field: string;
  copy: number;
  /** First value byte. */
  offset: number;
  previous: number;
  value: number;
};

export type PatchResult = {
  buffer: Buffer;
  applied: AppliedEdit[];
  warnings: PatchWarning[];
};

export type PatchOptions = {
  logger?: Logger;
  signal?: AbortSignal;
};

type Target = {
  field: string;
  copy: number;
  indicatorOffset: number;
  indicator: number;
  value: number;
};

const checkValue = (field: string, value: number): void => {
  if (!Number.isInteger(value) || value < INT32_MIN || value > UINT32_MAX) {
    throw new RangeError(`Edit for "${field}" must be an integer in ${INT32_MIN}..${UINT32_MAX}, got ${value}`);
  }
};

/**
 * Overwrite fixed-width integer values in a copy of `buffer`. Every occurrence listed in
 * the table is checked against the buffer before anything is written; occurrences whose
 * indicator byte is not the int32 marker are left alone and reported.
 */
export const patchBuffer = (
  buffer: Buffer,
  table: OffsetTable,
  edits: Readonly<Record<string, number>>,
  { logger = silentLogger }: PatchOptions = {}
): PatchResult => {
  const warnings: PatchWarning[] = [];
  const targets: Target[] = [];
  const invalid: { label: string; offset: number }[] = [];

  for (const [field, value] of Object.entries(edits)) {
    checkValue(field, value);
    if (table.ignoredFields.has(field)) continue;

    const offsets = table.fields.get(field);
    if (!offsets) {
      const message = `"${field}" is not in the ${table.name} offset table, skipping`;
      warnings.push({ kind: "OffsetTableMiss", field, message });
      logger.warn(message);
      continue;
    }

    const keyLength = Buffer.byteLength(field, "utf8");
    offsets.forEach((offset, copy) => {
      const indicatorOffset = offset + keyLength;
      if (offset < 0 || indicatorOffset >= buffer.length) {
        invalid.push({ label: `${field}[${copy}]`, offset });
        return;
      }
      // Only an int32 occurrence needs its value bytes inside the buffer.
      const indicator = buffer.readUInt8(indicatorOffset);
      if (indicator === ValueMarker.Int32 && indicatorOffset + 1 + VALUE_WIDTH > buffer.length) {
        invalid.push({ label: `${field}[${copy}]`, offset });
        return;
      }
      targets.push({ field, copy, indicatorOffset, indicator, value });
    });
  }

  if (invalid.length > 0) {
    throw new InvalidOffsetsError(invalid, buffer.length);
  }

  const output = Buffer.from(buffer);
  const applied: AppliedEdit[] = [];
  for (const { field, copy, indicatorOffset, indicator, value } of targets) {
    if (indicator !== ValueMarker.Int32) {
      const message =
        `"${field}" copy ${copy}: indicator at ${hex(indicatorOffset)} is ${hexByte(indicator)}, ` +
        "not a 32-bit integer, skipping";
      warnings.push({ kind: "IndicatorMismatch", field, copy, offset: indicatorOffset, indicator, message });
      logger.warn(message);
      continue;
    }

    const valueOffset = indicatorOffset + 1;
    const previous = output.readUInt32LE(valueOffset);
    output.writeUInt32LE(value >>> 0, valueOffset);
    applied.push({ field, copy, offset: valueOffset, previous, value });
    logger.info(`${field}[${copy}] @ ${hex(valueOffset)}: ${previous} -> ${value >>> 0}`);
  }

  return { buffer: output, applied, warnings };
};

/** Read `input`, patch it and write the result to `output` (which may be the same path). */
export const patchFile = async (
  input: string,
  output: string,
  table: OffsetTable,
  edits: Readonly<Record<string, number>>,
  options: PatchOptions = {}
): Promise<PatchResult> => {
  const source = await readBinaryFile(input, options.signal);
  const result = patchBuffer(source, table, edits, options);
  await writeBinaryFile(output, result.buffer, options.signal);
  return result;
};
