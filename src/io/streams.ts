import { once } from "node:events";
import { createReadStream as fsCreateReadStream, createWriteStream as fsCreateWriteStream } from "node:fs";
import type { ReadStream, WriteStream } from "node:fs";

const READ_HIGH_WATER_MARK = 64 * 1024;
const WRITE_HIGH_WATER_MARK = 16 * 1024;

const abortError = () => new Error("Operation aborted");

const attachAbortHandler = (stream: ReadStream | WriteStream, signal?: AbortSignal): void => {
  if (!signal) {
    return;
  }

  if (signal.aborted) {
    stream.destroy(abortError());
    return;
  }

  signal.addEventListener(
    "abort",
    () => {
      stream.destroy(abortError());
    },
    { once: true }
  );
};

/** Text stream for JSON configuration. */
export const createReadStream = (path: string, signal?: AbortSignal): ReadStream => {
  const stream = fsCreateReadStream(path, {
    encoding: "utf8",
    highWaterMark: READ_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream => {
  const stream = fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

/** Whole container file in memory; decoding needs random access. */
export const readBinaryFile = async (path: string, signal?: AbortSignal): Promise<Buffer> => {
  const stream = fsCreateReadStream(path, { highWaterMark: READ_HIGH_WATER_MARK, signal });
  attachAbortHandler(stream, signal);

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read input file "${path}": ${reason}`, { cause: error });
  }
  return Buffer.concat(chunks);
};

export const writeBinaryFile = async (path: string, data: Uint8Array, signal?: AbortSignal): Promise<void> => {
  const stream = createWriteStream(path, signal);
  try {
    stream.end(data);
    await once(stream, "finish");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to write output file "${path}": ${reason}`, { cause: error });
  }
};

export const writeJsonFile = (path: string, value: unknown, signal?: AbortSignal): Promise<void> =>
  writeBinaryFile(path, Buffer.from(`${JSON.stringify(value, null, 2)}\n`, "utf8"), signal);
