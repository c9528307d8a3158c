import { encodeInteger, FIXED_INTEGERS } from "./codec.js";
import type { IntegerEncoding } from "./codec.js";
import { ContainerMarker, MAX_KEY_LENGTH, ValueMarker } from "./format.js";

const DEFAULT_BUFFER_SIZE = 4 * 1024;
const SHORT_STRING_LIMIT = 0x0f;

/**
 * Builds container-format bytes. Keeps track of where every key's text starts, which
 * is exactly what an offset table records.
 */
export class ContainerWriter {
  private buffer: Buffer;
  private cursor = 0;
  private readonly keyOffsets = new Map<string, number[]>();

  constructor(initialSize = DEFAULT_BUFFER_SIZE) {
    this.buffer = Buffer.alloc(Math.max(16, initialSize));
  }

  get length(): number {
    return this.cursor;
  }

  /** Offsets of the first byte of each key's text, in write order. */
  getKeyOffsets(): Map<string, number[]> {
    return new Map([...this.keyOffsets].map(([key, offsets]) => [key, [...offsets]]));
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.cursor));
  }

  /**
   * Write a key header and its text. With `prefix` (one of 0x2A/0x4A/0x5A/0x6A) the
   * length goes in a second byte. Returns the offset of the key text.
   */
  writeKey(key: string, prefix?: number): number {
    const text = Buffer.from(key, "utf8");
    if (text.length === 0 || text.length > MAX_KEY_LENGTH) {
      throw new RangeError(`Key length ${text.length} outside 1..${MAX_KEY_LENGTH}`);
    }
    if (prefix !== undefined) {
      this.writeByte(prefix);
    }
    this.writeByte(text.length);
    const keyOffset = this.cursor;
    this.writeRaw(text);

    const offsets = this.keyOffsets.get(key);
    if (offsets) {
      offsets.push(keyOffset);
    } else {
      this.keyOffsets.set(key, [keyOffset]);
    }
    return keyOffset;
  }

  writeInt32(value: number): this {
    this.ensureSpace(5);
    this.buffer.writeUInt8(ValueMarker.Int32, this.cursor);
    this.buffer.writeInt32LE(value, this.cursor + 1);
    this.cursor += 5;
    return this;
  }

  writeInt64(value: number | bigint): this {
    this.ensureSpace(9);
    this.buffer.writeUInt8(ValueMarker.Int64, this.cursor);
    this.buffer.writeBigInt64LE(BigInt(value), this.cursor + 1);
    this.cursor += 9;
    return this;
  }

  writeUint32(value: number): this {
    this.ensureSpace(5);
    this.buffer.writeUInt8(ValueMarker.Uint32, this.cursor);
    this.buffer.writeUInt32LE(value, this.cursor + 1);
    this.cursor += 5;
    return this;
  }

  writeUint64(value: number | bigint): this {
    this.ensureSpace(9);
    this.buffer.writeUInt8(ValueMarker.Uint64, this.cursor);
    this.buffer.writeBigUInt64LE(BigInt(value), this.cursor + 1);
    this.cursor += 9;
    return this;
  }

  /** Shortest form of `value` under a shape's integer encoding. */
  writeInteger(value: number, encoding: IntegerEncoding = FIXED_INTEGERS): this {
    return this.writeRaw(encodeInteger(value, encoding));
  }

  /** Short string (0x80 | length) up to 15 bytes, long string (0x08 + u32) above. */
  writeString(value: string): this {
    const text = Buffer.from(value, "utf8");
    if (text.length <= SHORT_STRING_LIMIT) {
      this.writeByte(ValueMarker.ShortString | text.length);
    } else {
      this.ensureSpace(5);
      this.buffer.writeUInt8(ValueMarker.LongString, this.cursor);
      this.buffer.writeUInt32LE(text.length, this.cursor + 1);
      this.cursor += 5;
    }
    return this.writeRaw(text);
  }

  writeObjectMarker(marker: number = ContainerMarker.ObjectAlt): this {
    return this.writeByte(marker);
  }

  writeArrayMarker(count: number): this {
    this.ensureSpace(5);
    this.buffer.writeUInt8(ContainerMarker.Array, this.cursor);
    this.buffer.writeUInt32LE(count, this.cursor + 1);
    this.cursor += 5;
    return this;
  }

  writeIntField(key: string, value: number): number {
    const keyOffset = this.writeKey(key);
    this.writeInt32(value);
    return keyOffset;
  }

  writeStringField(key: string, value: string): number {
    const keyOffset = this.writeKey(key);
    this.writeString(value);
    return keyOffset;
  }

  writeByte(value: number): this {
    this.ensureSpace(1);
    this.buffer.writeUInt8(value, this.cursor);
    this.cursor += 1;
    return this;
  }

  writeRaw(bytes: Uint8Array): this {
    this.ensureSpace(bytes.length);
    this.buffer.set(bytes, this.cursor);
    this.cursor += bytes.length;
    return this;
  }

  private ensureSpace(size: number): void {
    if (this.cursor + size <= this.buffer.length) {
      return;
    }
    const grown = Buffer.alloc(Math.max(this.buffer.length * 2, this.cursor + size));
    this.buffer.copy(grown, 0, 0, this.cursor);
    this.buffer = grown;
  }
}
