import { ContainerDecodeError, TruncatedOrCorruptError, UnknownMarkerError } from "./errors.js";
import { SHORT_STRING_MAX, ValueMarker } from "./format.js";

export type Decoded<T> = {
  value: T;
  byteLength: number;
};

export type StreamValue =
  | { kind: "int32"; value: number }
  | { kind: "int64"; value: number }
  | { kind: "string"; value: string }
  | { kind: "control"; value: number };

export type TinyRange = {
  min: number;
  max: number;
  base: number;
};

/**
 * How one record shape packs its integers. The compressed forms overlap between
 * shapes (0x82 is a nibble integer in one table and a tiny unsigned in another), so
 * every shape carries its own descriptor instead of sharing a global rule.
 */
export type IntegerEncoding = {
  name: string;
  /** Accept 0x04 / 0x05 (u32 / u64). */
  unsigned?: boolean;
  /** Top bit set and low nibble == sentinel: value = (marker & mask) >> shift. */
  nibble?: { sentinel: number; mask: number; shift: number };
  /** value = marker - base */
  tinyPositive?: TinyRange;
  /** value = -(marker - base) */
  tinyNegative?: TinyRange;
  /** value = marker & mask, for markers in [min, max] */
  tinyMasked?: { min: number; max: number; mask: number };
  /** Fall back to a zigzag varint instead of failing. */
  varint?: boolean;
};

export const FIXED_INTEGERS: IntegerEncoding = { name: "fixed" };

export const COEFFICIENT_INTEGERS: IntegerEncoding = {
  name: "coefficient",
  tinyPositive: { min: 0x80, max: 0xbf, base: 0x80 },
  tinyNegative: { min: 0xc0, max: 0xff, base: 0xc0 },
  varint: true,
};

export const LOOKUP_INTEGERS: IntegerEncoding = {
  name: "lookup",
  unsigned: true,
  nibble: { sentinel: 0x02, mask: 0x7f, shift: 4 },
  tinyPositive: { min: 0x80, max: 0xff, base: 0x80 },
};

export const VERSION_INTEGERS: IntegerEncoding = {
  name: "version",
  tinyMasked: { min: 0x80, max: 0xff, mask: 0x3f },
};

const MAX_VARINT_BYTES = 8;

const ensureAvailable = (
  buffer: Buffer,
  offset: number,
  length: number,
  limit: number,
  label: string
): void => {
  if (offset + length > Math.min(limit, buffer.length)) {
    throw new TruncatedOrCorruptError(`Unexpected end of data reading ${label}`, buffer, offset);
  }
};

const toSafeNumber = (value: bigint, buffer: Buffer, offset: number): number => {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new ContainerDecodeError(`Integer ${value} exceeds safe integer range`, buffer, offset);
  }
  return Number(value);
};

export const decodeUtf8Lossy = (buffer: Buffer, start: number, end: number): string =>
  buffer.toString("utf8", start, end);

export const zigzagDecode = (value: number): number =>
  value % 2 === 0 ? value / 2 : -(value + 1) / 2;

export const zigzagEncode = (value: number): number => (value >= 0 ? value * 2 : -value * 2 - 1);

export const readZigzagVarint = (buffer: Buffer, offset: number, limit = buffer.length): Decoded<number> => {
  let result = 0;
  let scale = 1;
  let position = offset;

  for (;;) {
    ensureAvailable(buffer, position, 1, limit, "varint");
    const byte = buffer.readUInt8(position);
    result += (byte & 0x7f) * scale;
    position += 1;
    if (byte < 0x80) break;
    if (position - offset >= MAX_VARINT_BYTES) {
      throw new ContainerDecodeError("Varint longer than 8 bytes", buffer, offset);
    }
    scale *= 0x80;
  }

  if (!Number.isSafeInteger(result)) {
    throw new ContainerDecodeError("Varint exceeds safe integer range", buffer, offset);
  }
  return { value: zigzagDecode(result), byteLength: position - offset };
};

export const encodeVarint = (value: number): Buffer => {
  const bytes: number[] = [];
  let remaining = zigzagEncode(value);
  do {
    const low = remaining % 0x80;
    remaining = Math.floor(remaining / 0x80);
    bytes.push(remaining > 0 ? low | 0x80 : low);
  } while (remaining > 0);
  return Buffer.from(bytes);
};

/**
 * Decode the value that follows a key in the token stream. `offset` points at the value
 * marker. Markers outside the int/string classes come back as control values of one
 * byte; they introduce containers and are not an error at this level.
 */
export const decodeStreamValue = (
  buffer: Buffer,
  offset: number,
  limit = buffer.length
): Decoded<StreamValue> => {
  ensureAvailable(buffer, offset, 1, limit, "value marker");
  const marker = buffer.readUInt8(offset);

  switch (marker) {
    case ValueMarker.Int32:
      ensureAvailable(buffer, offset + 1, 4, limit, "int32");
      return { value: { kind: "int32", value: buffer.readInt32LE(offset + 1) }, byteLength: 5 };
    case ValueMarker.Int64:
      ensureAvailable(buffer, offset + 1, 8, limit, "int64");
      return {
        value: { kind: "int64", value: toSafeNumber(buffer.readBigInt64LE(offset + 1), buffer, offset) },
        byteLength: 9,
      };
    case ValueMarker.LongString: {
      ensureAvailable(buffer, offset + 1, 4, limit, "string length");
      const length = buffer.readUInt32LE(offset + 1);
      ensureAvailable(buffer, offset + 5, length, limit, "string");
      return {
        value: { kind: "string", value: decodeUtf8Lossy(buffer, offset + 5, offset + 5 + length) },
        byteLength: 5 + length,
      };
    }
    default:
      break;
  }

  if (marker >= ValueMarker.ShortString && marker <= SHORT_STRING_MAX) {
    const length = marker & 0x0f;
    ensureAvailable(buffer, offset + 1, length, limit, "short string");
    return {
      value: { kind: "string", value: decodeUtf8Lossy(buffer, offset + 1, offset + 1 + length) },
      byteLength: 1 + length,
    };
  }

  return { value: { kind: "control", value: marker }, byteLength: 1 };
};

const inRange = (marker: number, range: { min: number; max: number }): boolean =>
  marker >= range.min && marker <= range.max;

/**
 * Decode an integer at `offset` (the marker byte) under one shape's encoding.
 * Fails closed with UnknownMarkerError when no rule of the encoding applies.
 */
export const decodeInteger = (
  buffer: Buffer,
  offset: number,
  encoding: IntegerEncoding,
  limit = buffer.length
): Decoded<number> => {
  ensureAvailable(buffer, offset, 1, limit, `${encoding.name} integer`);
  const marker = buffer.readUInt8(offset);

  if (marker === ValueMarker.Int32) {
    ensureAvailable(buffer, offset + 1, 4, limit, "int32");
    return { value: buffer.readInt32LE(offset + 1), byteLength: 5 };
  }
  if (marker === ValueMarker.Int64) {
    ensureAvailable(buffer, offset + 1, 8, limit, "int64");
    return { value: toSafeNumber(buffer.readBigInt64LE(offset + 1), buffer, offset), byteLength: 9 };
  }
  if (encoding.unsigned && marker === ValueMarker.Uint32) {
    ensureAvailable(buffer, offset + 1, 4, limit, "uint32");
    return { value: buffer.readUInt32LE(offset + 1), byteLength: 5 };
  }
  if (encoding.unsigned && marker === ValueMarker.Uint64) {
    ensureAvailable(buffer, offset + 1, 8, limit, "uint64");
    return { value: toSafeNumber(buffer.readBigUInt64LE(offset + 1), buffer, offset), byteLength: 9 };
  }

  const { nibble, tinyPositive, tinyNegative, tinyMasked } = encoding;
  // Checked ahead of the tiny ranges: in the lookup tables they cover the same bytes.
  if (nibble && (marker & 0x80) !== 0 && (marker & 0x0f) === nibble.sentinel) {
    return { value: (marker & nibble.mask) >> nibble.shift, byteLength: 1 };
  }
  if (tinyPositive && inRange(marker, tinyPositive)) {
    return { value: marker - tinyPositive.base, byteLength: 1 };
  }
  if (tinyNegative && inRange(marker, tinyNegative)) {
    return { value: tinyNegative.base - marker, byteLength: 1 };
  }
  if (tinyMasked && inRange(marker, tinyMasked)) {
    return { value: marker & tinyMasked.mask, byteLength: 1 };
  }
  if (encoding.varint) {
    return readZigzagVarint(buffer, offset, limit);
  }

  throw new UnknownMarkerError(marker, `${encoding.name} integer`, buffer, offset);
};

const encodeFixed = (value: number): Buffer => {
  if (value >= -0x80000000 && value <= 0x7fffffff) {
    const bytes = Buffer.alloc(5);
    bytes.writeUInt8(ValueMarker.Int32, 0);
    bytes.writeInt32LE(value, 1);
    return bytes;
  }
  const bytes = Buffer.alloc(9);
  bytes.writeUInt8(ValueMarker.Int64, 0);
  bytes.writeBigInt64LE(BigInt(value), 1);
  return bytes;
};

const compactCandidates = (value: number, encoding: IntegerEncoding): Buffer[] => {
  const candidates: Buffer[] = [];
  const { nibble, tinyPositive, tinyNegative, tinyMasked } = encoding;

  if (nibble && value >= 0 && value <= nibble.mask >> nibble.shift) {
    candidates.push(Buffer.from([0x80 | (value << nibble.shift) | nibble.sentinel]));
  }
  if (tinyPositive && value >= 0 && tinyPositive.base + value <= tinyPositive.max) {
    candidates.push(Buffer.from([tinyPositive.base + value]));
  }
  if (tinyNegative && value <= 0 && tinyNegative.base - value <= tinyNegative.max) {
    candidates.push(Buffer.from([tinyNegative.base - value]));
  }
  if (tinyMasked && value >= 0 && value <= tinyMasked.mask) {
    candidates.push(Buffer.from([tinyMasked.min | value]));
  }
  if (encoding.varint) {
    candidates.push(encodeVarint(value));
  }
  return candidates;
};

/**
 * Shortest byte form of `value` that decodes back to `value` under `encoding`.
 * Every compact candidate is checked against the decoder, since the ranges of one
 * encoding can shadow each other.
 */
export const encodeInteger = (value: number, encoding: IntegerEncoding = FIXED_INTEGERS): Buffer => {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot encode ${value}: not a safe integer`);
  }

  for (const candidate of compactCandidates(value, encoding)) {
    try {
      const decoded = decodeInteger(candidate, 0, encoding);
      if (decoded.value === value && decoded.byteLength === candidate.length) {
        return candidate;
      }
    } catch (error) {
      if (!(error instanceof ContainerDecodeError)) throw error;
    }
  }

  return encodeFixed(value);
};
