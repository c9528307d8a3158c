import { InvalidOffsetsError } from "../binary/errors.js";
import { ValueMarker } from "../binary/format.js";
import { hex, hexByte } from "../binary/hexdump.js";
import { silentLogger } from "../io/logger.js";
import type { Logger } from "../io/logger.js";
import { copyCount } from "../patch/offsetTable.js";
import type { OffsetTable } from "../patch/offsetTable.js";

/** field → value, for one copy of an offset-addressed record. */
export type CopyValues = Record<string, number>;

export type UnreadableOccurrence = {
  field: string;
  copy: number;
  offset: number;
  indicator?: number;
};

export type Occurrences = {
  /** Indexed by copy number. */
  copies: CopyValues[];
  unreadable: UnreadableOccurrence[];
};

const isKeyByte = (byte: number): boolean =>
  (byte >= 0x30 && byte <= 0x39) || (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a) || byte === 0x5f;

/** 0x02 is a full 4-byte value; top bit with low nibble 0x2 carries one byte. */
const valueWidth = (indicator: number): number | undefined => {
  if (indicator === ValueMarker.Int32) return 4;
  if ((indicator & 0x80) !== 0 && (indicator & 0x0f) === 0x02) return 1;
  return undefined;
};

export type DecodeOccurrencesOptions = {
  logger?: Logger;
};

/**
 * Read every copy of every field in the table. The indicator is the first byte at or
 * after the key offset that cannot be part of a key name, so the table does not need
 * to know the key length.
 */
export const decodeOccurrences = (
  buffer: Buffer,
  table: OffsetTable,
  { logger = silentLogger }: DecodeOccurrencesOptions = {}
): Occurrences => {
  const invalid: { label: string; offset: number }[] = [];
  for (const [field, offsets] of table.fields) {
    offsets.forEach((offset, copy) => {
      if (offset < 0 || offset >= buffer.length) invalid.push({ label: `${field}[${copy}]`, offset });
    });
  }
  if (invalid.length > 0) {
    throw new InvalidOffsetsError(invalid, buffer.length);
  }

  const copies: CopyValues[] = Array.from({ length: copyCount(table) }, () => ({}));
  const unreadable: UnreadableOccurrence[] = [];

  for (const [field, offsets] of table.fields) {
    offsets.forEach((offset, copy) => {
      let position = offset;
      while (position < buffer.length && isKeyByte(buffer.readUInt8(position))) position += 1;

      const indicator = position < buffer.length ? buffer.readUInt8(position) : undefined;
      const width = indicator === undefined ? undefined : valueWidth(indicator);
      if (width === undefined || position + 1 + width > buffer.length) {
        unreadable.push(indicator === undefined ? { field, copy, offset } : { field, copy, offset, indicator });
        logger.warn(
          `${field}[${copy}] at ${hex(offset)}: ` +
            (indicator === undefined ? "no indicator before end of data" : `unsupported indicator ${hexByte(indicator)}`)
        );
        return;
      }

      const target = copies[copy];
      if (target) {
        target[field] = width === 4 ? buffer.readUInt32LE(position + 1) : buffer.readUInt8(position + 1);
      }
    });
  }

  return { copies, unreadable };
};
