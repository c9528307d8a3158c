/**
 * Container format (".jsb")
 *
 * Layout (all integers are little-endian):
 *
 *   [Field]
 *     - key header:
 *         - length: u8 (1..96), or
 *         - prefix: u8 (0x2A, 0x4A, 0x5A, 0x6A) followed by length: u8
 *         - utf8 key text
 *     - value marker: u8 (see ValueMarker below)
 *     - value bytes (width selected by the marker)
 *
 *   [Compound field]
 *     - key header
 *     - container marker:
 *         - object: 0xC9 / 0x99 (no count)
 *         - array:  0x09, then count: u32
 *     - nested fields
 *
 * A file may store the same logical record more than once ("copies"). Nothing in the
 * format links the copies; callers address them through offset tables.
 */

export const MAX_KEY_LENGTH = 96;
export const KEY_PREFIXES: readonly number[] = [0x2a, 0x4a, 0x5a, 0x6a];

export enum ValueMarker {
  Int32 = 0x02,
  Int64 = 0x03,
  Uint32 = 0x04,
  Uint64 = 0x05,
  LongString = 0x08,
  ShortString = 0x80,
}

export const SHORT_STRING_MAX = 0x8f;

export enum ContainerMarker {
  Array = 0x09,
  KeyedObject = 0x5a,
  Object = 0x99,
  ObjectAlt = 0xc9,
}

export const OBJECT_MARKERS: readonly number[] = [ContainerMarker.ObjectAlt, ContainerMarker.Object];

export type TokenKind = "int32" | "int64" | "string" | "control";

export type ScalarValue = number | string;

export const INT32_MIN = -0x80000000;
export const UINT32_MAX = 0xffffffff;
