import { decodeInteger, decodeUtf8Lossy, FIXED_INTEGERS } from "../binary/codec.js";
import {
  ContainerDecodeError,
  InvalidOffsetsError,
  TokenMismatchError,
  TruncatedOrCorruptError,
  UnknownMarkerError,
} from "../binary/errors.js";
import { ContainerMarker, OBJECT_MARKERS, ValueMarker } from "../binary/format.js";
import { dumpBytes, hex, hexByte } from "../binary/hexdump.js";
import { ContainerTokenReader, describeToken } from "../binary/reader.js";
import type { ContainerToken } from "../binary/reader.js";
import { silentLogger } from "../io/logger.js";
import type { Logger } from "../io/logger.js";
import type {
  BlockArrayResult,
  BlockArrayShape,
  ByteRange,
  IndexTableResult,
  IndexTableShape,
  KeyedObjectShape,
  KeyScanEntry,
  KeyScanShape,
  NamedValue,
  RecordShape,
  ScalarShape,
  TupleField,
  TupleRow,
  TupleTableShape,
} from "./shapes.js";

export type ParseOptions = {
  logger?: Logger;
};

type Body = {
  /** First byte after the container marker (and count). */
  offset: number;
  declared?: number;
};

class TokenCursor {
  private stream: Iterator<ContainerToken, void, undefined>;

  constructor(
    private readonly reader: ContainerTokenReader,
    start: number,
    private readonly stop: number
  ) {
    this.stream = reader.tokens(start, stop);
  }

  next(): ContainerToken | undefined {
    const result = this.stream.next();
    return result.done ? undefined : result.value;
  }

  restart(offset: number): void {
    this.stream = this.reader.tokens(offset, this.stop);
  }
}

const fieldMatches = (token: ContainerToken, field: TupleField): boolean => {
  if (token.key !== field.key) return false;
  return field.kind === "string" ? token.kind === "string" : token.kind === "int32" || token.kind === "int64";
};

const cleanLabel = (raw: Buffer): string => {
  if (raw.length === 0) {
    return "";
  }
  const tag = raw.readUInt8(0);
  let text = raw;
  if (tag === ValueMarker.LongString && raw.length >= 5) {
    text = raw.subarray(5);
  } else if (tag >= 0x80 || tag === 0x68) {
    text = raw.subarray(1);
  } else {
    let skip = 0;
    while (skip < raw.length && raw.readUInt8(skip) < 32) skip += 1;
    text = raw.subarray(skip);
  }
  return decodeUtf8Lossy(text, 0, text.length);
};

/**
 * Decodes records described by shape descriptors. Each call is all-or-nothing: a shape
 * violation throws with the absolute offset and a hex window, and nothing decoded
 * before it is returned.
 */
export class StructuralParser {
  private readonly reader: ContainerTokenReader;
  private readonly logger: Logger;

  constructor(
    private readonly buffer: Buffer,
    options: ParseOptions = {}
  ) {
    this.reader = new ContainerTokenReader(buffer);
    this.logger = options.logger ?? silentLogger;
  }

  parse(shape: TupleTableShape, range: ByteRange): TupleRow[];
  parse(shape: BlockArrayShape, range: ByteRange): BlockArrayResult;
  parse(shape: IndexTableShape, range: ByteRange): IndexTableResult;
  parse(shape: ScalarShape, range: ByteRange): number;
  parse(shape: KeyedObjectShape, range: ByteRange): Record<string, number>;
  parse(shape: KeyScanShape, range: ByteRange): KeyScanEntry[];
  parse(
    shape: RecordShape,
    range: ByteRange
  ): TupleRow[] | BlockArrayResult | IndexTableResult | number | Record<string, number> | KeyScanEntry[] {
    const stop = this.checkRange(range);
    switch (shape.kind) {
      case "tupleTable":
        return this.parseTupleTable(shape, range.start, stop);
      case "blockArray":
        return this.parseBlockArray(shape, range.start, stop);
      case "indexTable":
        return this.parseIndexTable(shape, range.start, stop);
      case "scalar":
        return this.parseScalar(shape, range.start, stop);
      case "keyedObject":
        return this.parseKeyedObject(shape, range.start, stop);
      case "keyScan":
        return this.parseKeyScan(shape, range.start, stop);
    }
  }

  private checkRange(range: ByteRange): number {
    const stop = range.stop ?? this.buffer.length;
    const invalid: { label: string; offset: number }[] = [];
    if (!Number.isInteger(range.start) || range.start < 0 || range.start >= this.buffer.length) {
      invalid.push({ label: "start", offset: range.start });
    }
    if (!Number.isInteger(stop) || stop <= range.start || stop > this.buffer.length) {
      invalid.push({ label: "stop", offset: stop });
    }
    if (invalid.length > 0) {
      throw new InvalidOffsetsError(invalid, this.buffer.length);
    }
    return stop;
  }

  private byteAt(position: number, stop: number, where: string): number {
    if (position >= stop) {
      throw new TruncatedOrCorruptError(`Unexpected end of data inside ${where}`, this.buffer, Math.min(position, this.buffer.length - 1));
    }
    return this.buffer.readUInt8(position);
  }

  private expectKeyText(key: string, anchor: number, stop: number): number {
    const text = Buffer.from(key, "utf8");
    const end = Math.min(anchor + text.length, stop);
    const found = this.buffer.subarray(anchor, end);
    if (!found.equals(text)) {
      throw new TokenMismatchError(`key "${key}"`, `"${decodeUtf8Lossy(found, 0, found.length)}"`, key, this.buffer, anchor);
    }
    return anchor + text.length;
  }

  /** Key text at `anchor`, then an object marker or an array marker with its count. */
  private locateBody(key: string, anchor: number, stop: number, objectMarkers: readonly number[]): Body {
    const markerOffset = this.expectKeyText(key, anchor, stop);
    const marker = this.byteAt(markerOffset, stop, key);
    if (objectMarkers.includes(marker)) {
      return { offset: markerOffset + 1 };
    }
    if (marker === ContainerMarker.Array) {
      if (markerOffset + 5 > stop) {
        throw new TruncatedOrCorruptError(`Unexpected end of data reading ${key} element count`, this.buffer, markerOffset);
      }
      return { offset: markerOffset + 5, declared: this.buffer.readUInt32LE(markerOffset + 1) };
    }
    throw new UnknownMarkerError(marker, `${key} container`, this.buffer, markerOffset);
  }

  private parseTupleTable(shape: TupleTableShape, anchor: number, stop: number): TupleRow[] {
    const body = this.locateBody(shape.key, anchor, stop, shape.containerMarkers);
    const cursor = new TokenCursor(this.reader, body.offset, stop);
    const rows: TupleRow[] = [];

    for (let index = 0; index < shape.rows; index += 1) {
      const where = `${shape.key} row ${String(index).padStart(2, "0")}`;
      const row: TupleRow = {};
      let restarted = false;

      for (const field of shape.fields) {
        let token = cursor.next();
        if (!token) {
          throw new TruncatedOrCorruptError(`Unexpected end of data inside ${where}`, this.buffer, stop - 1);
        }
        if (!fieldMatches(token, field)) {
          throw new TokenMismatchError(`(${field.key},${field.kind})`, describeToken(token), where, this.buffer, token.offset);
        }

        const decision = shape.resync && !restarted ? shape.resync.inspect(token) : undefined;
        if (decision) {
          this.logger.warn(
            `${where}: trimming stray byte before ${hex(token.cursor - 1)} and restarting the stream there`
          );
          token = decision.token;
          cursor.restart(decision.restartAt);
          restarted = true;
        }
        row[field.key] = token.value;
      }

      rows.push(row);
    }

    this.logger.info(`${shape.key}: ${rows.length} rows`);
    return rows;
  }

  private parseBlockArray(shape: BlockArrayShape, anchor: number, stop: number): BlockArrayResult {
    const body = this.locateBody(shape.key, anchor, stop, OBJECT_MARKERS);
    const data = this.buffer.subarray(body.offset, stop);
    const blocks: NamedValue[][] = [];
    let entries: NamedValue[] = [];
    let cursor = 0;

    while (body.offset + cursor < stop) {
      const namePosition = data.indexOf(shape.nameLabel, cursor);
      if (namePosition === -1) break;

      const labelStart = namePosition + shape.nameLabel.length;
      const valuePosition = data.indexOf(shape.valueLabel, labelStart);
      if (valuePosition === -1) {
        this.logger.warn(
          `${shape.key}: name label at ${hex(body.offset + namePosition)} has no value label\n` +
            dumpBytes(this.buffer, body.offset + namePosition)
        );
        break;
      }

      const name = cleanLabel(data.subarray(labelStart, valuePosition));
      const valueOffset = body.offset + valuePosition + shape.valueLabel.length;
      const { value, byteLength } = decodeInteger(this.buffer, valueOffset, shape.integers, stop);
      entries.push({ name, value });

      if (entries.length === shape.blockSize) {
        blocks.push(entries);
        entries = [];
      }
      cursor = valueOffset + byteLength - body.offset;
    }

    if (entries.length > 0) {
      this.logger.warn(`${shape.key}: trailing fragment with ${entries.length} entr${entries.length === 1 ? "y" : "ies"} ignored`);
    }
    this.logger.info(`${shape.key}: ${blocks.length} complete blocks`);
    return { blocks, droppedEntries: entries.length };
  }

  private parseIndexTable(shape: IndexTableShape, anchor: number, stop: number): IndexTableResult {
    const body = this.locateBody(shape.key, anchor, stop, OBJECT_MARKERS);
    const data = this.buffer.subarray(body.offset, stop);
    const rows: Record<string, number>[] = [];
    const [first] = shape.columns;
    let cursor = 0;

    while (first) {
      if (body.declared !== undefined && rows.length >= body.declared) break;
      const rowStart = data.indexOf(first.label, cursor);
      if (rowStart === -1) break;

      let read: { row: Record<string, number>; position: number };
      try {
        read = this.readRow(shape, body.offset, data, rowStart, rows.length, stop);
      } catch (error) {
        // Inside a declared count a corrupt row means the table is short.
        if (body.declared === undefined || !(error instanceof ContainerDecodeError)) throw error;
        throw new TruncatedOrCorruptError(
          `${shape.key}: expected ${body.declared} rows, got ${rows.length}`,
          this.buffer,
          error.offset,
          { cause: error }
        );
      }

      rows.push(read.row);
      cursor = read.position - body.offset;
    }

    if (body.declared !== undefined && rows.length !== body.declared) {
      throw new TruncatedOrCorruptError(
        `${shape.key}: expected ${body.declared} rows, got ${rows.length}`,
        this.buffer,
        body.offset + cursor
      );
    }

    this.logger.info(`${shape.key}: ${rows.length} rows`);
    return body.declared === undefined ? { rows } : { rows, declared: body.declared };
  }

  /** One row whose first label starts at `rowStart` (relative to the body). */
  private readRow(
    shape: IndexTableShape,
    bodyOffset: number,
    data: Buffer,
    rowStart: number,
    rowNumber: number,
    stop: number
  ): { row: Record<string, number>; position: number } {
    const row: Record<string, number> = {};
    let position = bodyOffset + rowStart;
    for (const column of shape.columns) {
      const labelPosition = data.indexOf(column.label, position - bodyOffset);
      if (labelPosition === -1) {
        throw new TruncatedOrCorruptError(`${shape.key} row ${rowNumber}: "${column.name}" missing`, this.buffer, position);
      }
      position = this.readColumn(shape, column.name, bodyOffset + labelPosition + column.label.length, stop, row);
    }
    return { row, position };
  }

  private readColumn(
    shape: IndexTableShape,
    name: string,
    offset: number,
    stop: number,
    row: Record<string, number>
  ): number {
    const { value, byteLength } = decodeInteger(this.buffer, offset, shape.integers, stop);
    row[name] = value;
    return offset + byteLength;
  }

  private parseScalar(shape: ScalarShape, anchor: number, stop: number): number {
    const markerOffset = this.expectKeyText(shape.key, anchor, stop);
    const { value } = decodeInteger(this.buffer, markerOffset, FIXED_INTEGERS, stop);
    this.logger.info(`${shape.key}: ${value} at ${hex(markerOffset + 1)}`);
    return value;
  }

  private parseKeyedObject(shape: KeyedObjectShape, anchor: number, stop: number): Record<string, number> {
    const markerOffset = this.expectKeyText(shape.key, anchor, stop);
    const marker = this.byteAt(markerOffset, stop, shape.key);
    if (marker !== shape.marker) {
      throw new TokenMismatchError(
        `container ${hexByte(shape.marker)}`,
        `container ${hexByte(marker)}`,
        shape.key,
        this.buffer,
        markerOffset
      );
    }

    const result: Record<string, number> = {};
    let position = markerOffset + 1;
    for (const field of shape.fields) {
      const expectedLength = Buffer.byteLength(field, "utf8");
      const keyLength = this.byteAt(position, stop, shape.key);
      if (keyLength !== expectedLength) {
        throw new TokenMismatchError(
          `key length ${expectedLength} ("${field}")`,
          `key length ${keyLength}`,
          shape.key,
          this.buffer,
          position
        );
      }
      const valueOffset = this.expectKeyText(field, position + 1, stop);
      const { value, byteLength } = decodeInteger(this.buffer, valueOffset, shape.integers, stop);
      result[field] = value;
      position = valueOffset + byteLength;
    }
    return result;
  }

  private parseKeyScan(shape: KeyScanShape, start: number, stop: number): KeyScanEntry[] {
    const prefixes = shape.prefixes.map((prefix) => Buffer.from(prefix, "utf8"));
    const entries: KeyScanEntry[] = [];
    let position = start;

    for (;;) {
      let found = -1;
      let prefixLength = 0;
      for (const prefix of prefixes) {
        const at = this.buffer.indexOf(prefix, position);
        if (at !== -1 && at < stop && (found === -1 || at < found)) {
          found = at;
          prefixLength = prefix.length;
        }
      }
      if (found === -1) break;

      const keyStart = found + prefixLength;
      const limit = Math.min(stop, keyStart + shape.maxKeyLength);
      let longest = keyStart;
      while (longest < limit && shape.keyCharacter.test(String.fromCharCode(this.buffer.readUInt8(longest)))) {
        longest += 1;
      }

      // Longest key first, then shorter ones: a terminator byte can also be a key character.
      let matched = false;
      for (let end = longest; end > keyStart; end -= 1) {
        const match = this.readScanValue(shape, end, stop);
        if (match) {
          entries.push({ key: this.buffer.toString("utf8", found, end), value: match.value, offset: found });
          position = match.next;
          matched = true;
          break;
        }
      }
      if (!matched) {
        position = found + 1;
      }
    }

    return entries;
  }

  private readScanValue(
    shape: KeyScanShape,
    position: number,
    stop: number
  ): { value: number | null; next: number } | undefined {
    if (position >= stop) return undefined;
    const marker = this.buffer.readUInt8(position);
    if (marker === ValueMarker.Int32 && position + 5 <= stop) {
      return { value: this.buffer.readInt32LE(position + 1), next: position + 5 };
    }
    if (marker === shape.nestedMarker && position + 1 + shape.nestedHeaderLength <= stop) {
      return { value: null, next: position + 1 + shape.nestedHeaderLength };
    }
    if (shape.terminators.includes(marker)) {
      return { value: null, next: position };
    }
    return undefined;
  }
}
