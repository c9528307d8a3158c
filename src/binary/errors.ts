import { dumpBytes, hex } from "./hexdump.js";

/**
 * Base class for everything that aborts a record decode. `offset` is absolute within
 * the buffer the caller passed in; `context` is a hex/ASCII window around it.
 */
export class ContainerDecodeError extends Error {
  readonly offset: number;
  readonly context: string;

  constructor(message: string, buffer: Uint8Array, offset: number, options?: ErrorOptions) {
    super(`${message} at ${hex(offset)}`, options);
    this.name = "ContainerDecodeError";
    this.offset = offset;
    this.context = dumpBytes(buffer, offset, 16);
  }
}

export class TokenMismatchError extends ContainerDecodeError {
  constructor(
    readonly expected: string,
    readonly actual: string,
    where: string,
    buffer: Uint8Array,
    offset: number
  ) {
    super(`Token mismatch in ${where}: wanted ${expected}, got ${actual}`, buffer, offset);
    this.name = "TokenMismatchError";
  }
}

export class UnknownMarkerError extends ContainerDecodeError {
  constructor(
    readonly marker: number,
    where: string,
    buffer: Uint8Array,
    offset: number
  ) {
    super(`Unknown value marker 0x${marker.toString(16).toUpperCase().padStart(2, "0")} in ${where}`, buffer, offset);
    this.name = "UnknownMarkerError";
  }
}

export class TruncatedOrCorruptError extends ContainerDecodeError {
  constructor(message: string, buffer: Uint8Array, offset: number, options?: ErrorOptions) {
    super(message, buffer, offset, options);
    this.name = "TruncatedOrCorruptError";
  }
}

/**
 * Caller-supplied offsets that do not fit the buffer. Raised before any parsing or
 * writing starts, so it carries no context window.
 */
export class InvalidOffsetsError extends Error {
  constructor(readonly offsets: readonly { label: string; offset: number }[], bufferLength: number) {
    const listed = offsets.map(({ label, offset }) => `${label}=${offset}`).join(", ");
    super(`Invalid offsets for a ${bufferLength}-byte buffer: ${listed}`);
    this.name = "InvalidOffsetsError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(`${path}: ${message}`);
    this.name = "ConfigError";
  }
}
