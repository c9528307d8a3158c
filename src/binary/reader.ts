import { decodeStreamValue, decodeUtf8Lossy } from "./codec.js";
import type { StreamValue } from "./codec.js";
import { InvalidOffsetsError, TruncatedOrCorruptError } from "./errors.js";
import { KEY_PREFIXES, MAX_KEY_LENGTH } from "./format.js";

export type TokenPosition = {
  /** First byte of the key header. */
  offset: number;
  /** First byte of the key text. */
  keyOffset: number;
  /** The value marker. */
  valueOffset: number;
  /** First byte after the value. */
  cursor: number;
};

export type ContainerToken = StreamValue & TokenPosition & { key: string };

export type KeyHeader = {
  keyOffset: number;
  keyLength: number;
};

export const describeToken = (token: ContainerToken): string =>
  token.kind === "control"
    ? `(${token.key},control<0x${token.value.toString(16).toUpperCase().padStart(2, "0")}>)`
    : `(${token.key},${token.kind})`;

/**
 * Reads the key/value token stream of a container buffer. The buffer is never copied or
 * written; every stream is an independent walk over it, so a caller that loses
 * alignment simply asks for a new stream at another offset.
 */
export class ContainerTokenReader {
  constructor(private readonly buffer: Buffer) {}

  get size(): number {
    return this.buffer.length;
  }

  /**
   * Parse the key header at `position`. Returns undefined for a malformed header
   * (length 0 or above 96, or key text running past `stop`).
   */
  readKeyHeader(position: number, stop = this.buffer.length): KeyHeader | undefined {
    const end = Math.min(stop, this.buffer.length);
    if (position >= end) {
      return undefined;
    }

    const first = this.buffer.readUInt8(position);
    let keyLength: number;
    let keyOffset: number;
    if (KEY_PREFIXES.includes(first)) {
      if (position + 1 >= end) {
        return undefined;
      }
      keyLength = this.buffer.readUInt8(position + 1);
      keyOffset = position + 2;
    } else {
      keyLength = first;
      keyOffset = position + 1;
    }

    if (keyLength === 0 || keyLength > MAX_KEY_LENGTH) {
      return undefined;
    }
    // The value marker must still be inside the range.
    if (keyOffset + keyLength >= end) {
      return undefined;
    }
    return { keyOffset, keyLength };
  }

  /**
   * Read one token whose key header starts at `offset`, or undefined when there is no
   * well-formed header there. Value bytes may extend past `stop` but not past the buffer.
   */
  readTokenAt(offset: number, stop = this.buffer.length): ContainerToken | undefined {
    const header = this.readKeyHeader(offset, stop);
    if (!header) {
      return undefined;
    }

    const valueOffset = header.keyOffset + header.keyLength;
    const key = decodeUtf8Lossy(this.buffer, header.keyOffset, valueOffset);
    const { value, byteLength } = decodeStreamValue(this.buffer, valueOffset);
    return {
      ...value,
      key,
      offset,
      keyOffset: header.keyOffset,
      valueOffset,
      cursor: valueOffset + byteLength,
    };
  }

  /**
   * Lazy, forward-only token stream over [start, stop). Bytes that do not start a
   * well-formed key header, or whose value would run off the buffer, are stepped over
   * one at a time.
   */
  tokens(start = 0, stop = this.buffer.length): Generator<ContainerToken, void, undefined> {
    const invalid: { label: string; offset: number }[] = [];
    if (!Number.isInteger(start) || start < 0 || start > this.buffer.length) {
      invalid.push({ label: "start", offset: start });
    }
    if (!Number.isInteger(stop) || stop < start || stop > this.buffer.length) {
      invalid.push({ label: "stop", offset: stop });
    }
    if (invalid.length > 0) {
      throw new InvalidOffsetsError(invalid, this.buffer.length);
    }
    return this.walk(start, stop);
  }

  /** Like readTokenAt, but a value that runs off the buffer counts as noise. */
  private scanTokenAt(position: number, stop: number): ContainerToken | undefined {
    try {
      return this.readTokenAt(position, stop);
    } catch (error) {
      if (error instanceof TruncatedOrCorruptError) return undefined;
      throw error;
    }
  }

  private *walk(start: number, stop: number): Generator<ContainerToken, void, undefined> {
    let position = start;
    while (stop - position >= 2) {
      const token = this.scanTokenAt(position, stop);
      if (!token) {
        position += 1;
        continue;
      }
      yield token;
      position = token.cursor;
    }
  }
}
