import type { IntegerEncoding } from "../binary/codec.js";
import type { ScalarValue } from "../binary/format.js";
import type { Resynchronizer } from "../binary/resync.js";

/**
 * Record shapes are plain data: the structural parser knows five layouts and every
 * concrete record (score table, coefficient blocks, lookup table, …) is one of them
 * filled in with its own keys, counts and integer encoding.
 */

export type FieldKind = "string" | "integer";

export type TupleField = {
  key: string;
  kind: FieldKind;
};

/** N rows, each the same fixed sequence of keyed tokens. */
export type TupleTableShape = {
  kind: "tupleTable";
  key: string;
  containerMarkers: readonly number[];
  rows: number;
  fields: readonly TupleField[];
  resync?: Resynchronizer;
};

/** Name/value pairs found by label search, sealed into blocks of fixed size. */
export type BlockArrayShape = {
  kind: "blockArray";
  key: string;
  nameLabel: Buffer;
  valueLabel: Buffer;
  blockSize: number;
  integers: IntegerEncoding;
};

export type IndexColumn = {
  name: string;
  label: Buffer;
};

/** Rows of labelled integers; an array container declares the row count. */
export type IndexTableShape = {
  kind: "indexTable";
  key: string;
  columns: readonly IndexColumn[];
  integers: IntegerEncoding;
};

/** One int32/int64 directly after the key text. */
export type ScalarShape = {
  kind: "scalar";
  key: string;
};

/** Fixed marker, then the listed keys in exactly this order. */
export type KeyedObjectShape = {
  kind: "keyedObject";
  key: string;
  marker: number;
  fields: readonly string[];
  integers: IntegerEncoding;
};

/** Every key that starts with one of the prefixes, in file order. */
export type KeyScanShape = {
  kind: "keyScan";
  prefixes: readonly string[];
  keyCharacter: RegExp;
  maxKeyLength: number;
  /** Marker of a nested object header that carries no value. */
  nestedMarker: number;
  nestedHeaderLength: number;
  /** Bytes that may directly follow a key which has no value. */
  terminators: readonly number[];
};

export type RecordShape =
  | TupleTableShape
  | BlockArrayShape
  | IndexTableShape
  | ScalarShape
  | KeyedObjectShape
  | KeyScanShape;

export type TupleRow = Record<string, ScalarValue>;

export type NamedValue = {
  name: string;
  value: number;
};

export type BlockArrayResult = {
  blocks: NamedValue[][];
  /** Entries of a trailing block that never reached `blockSize`. */
  droppedEntries: number;
};

export type IndexTableResult = {
  rows: Record<string, number>[];
  declared?: number;
};

export type KeyScanEntry = {
  key: string;
  value: number | null;
  offset: number;
};

export type ByteRange = {
  /** First byte of the record's key text (or of the scanned range). */
  start: number;
  /** Exclusive upper bound; defaults to the end of the buffer. */
  stop?: number;
};
