import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Readable, Transform } from "node:stream";
import pkg from "stream-json";
const { parser } = pkg;

/** Receives the tokens of a JSON document in order. */
export interface JsonTokenSink {
  startObject(): void | Promise<void>;
  endObject(): void | Promise<void>;
  startArray(): void | Promise<void>;
  endArray(): void | Promise<void>;
  key(key: string): void | Promise<void>;
  string(value: string): void | Promise<void>;
  /** Numbers arrive as their source text. */
  number(value: string): void | Promise<void>;
  boolean(value: boolean): void | Promise<void>;
  null(): void | Promise<void>;
}

type JsonToken = {
  name: string;
  value?: unknown;
};

const isJsonToken = (chunk: unknown): chunk is JsonToken =>
  typeof chunk === "object" && chunk !== null && "name" in chunk && typeof chunk.name === "string";

const forwardToken = (sink: JsonTokenSink, token: JsonToken): void | Promise<void> => {
  switch (token.name) {
    case "startObject":
      return sink.startObject();
    case "endObject":
      return sink.endObject();
    case "startArray":
      return sink.startArray();
    case "endArray":
      return sink.endArray();
    case "keyValue":
      return sink.key(String(token.value ?? ""));
    case "stringValue":
      return sink.string(String(token.value ?? ""));
    case "numberValue":
      if (typeof token.value !== "string" && typeof token.value !== "number") {
        throw new Error("Number token missing value");
      }
      return sink.number(String(token.value));
    case "trueValue":
      return sink.boolean(true);
    case "falseValue":
      return sink.boolean(false);
    case "nullValue":
      return sink.null();
    default:
      return;
  }
};

const createSinkStream = (sink: JsonTokenSink): Writable =>
  new Writable({
    objectMode: true,
    write(chunk: unknown, _encoding, callback) {
      try {
        const result = isJsonToken(chunk) ? forwardToken(sink, chunk) : undefined;
        if (result) {
          result.then(
            () => callback(),
            (err: unknown) => callback(err instanceof Error ? err : new Error(String(err)))
          );
        } else {
          callback();
        }
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
  });

export const createStreamParser = (sink: JsonTokenSink): { parser: Transform; sink: Writable } => {
  const parserStream = parser();
  return { parser: parserStream, sink: createSinkStream(sink) };
};

export const parseJsonStream = async (readable: Readable, sink: JsonTokenSink): Promise<void> => {
  const { parser: parserStream, sink: sinkStream } = createStreamParser(sink);
  await pipeline(readable, parserStream, sinkStream);
};

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

type Frame =
  | { kind: "object"; value: { [key: string]: JsonValue }; key?: string }
  | { kind: "array"; value: JsonValue[] };

/** Assembles the token sequence back into one value. */
export class JsonValueBuilder implements JsonTokenSink {
  private readonly stack: Frame[] = [];
  private root: JsonValue | undefined;
  private done = false;

  get value(): JsonValue {
    if (!this.done || this.root === undefined) {
      throw new Error("JSON document is incomplete");
    }
    return this.root;
  }

  startObject(): void {
    this.stack.push({ kind: "object", value: {} });
  }

  endObject(): void {
    const frame = this.stack.pop();
    if (frame?.kind !== "object") throw new Error("Unbalanced endObject");
    this.emit(frame.value);
  }

  startArray(): void {
    this.stack.push({ kind: "array", value: [] });
  }

  endArray(): void {
    const frame = this.stack.pop();
    if (frame?.kind !== "array") throw new Error("Unbalanced endArray");
    this.emit(frame.value);
  }

  key(key: string): void {
    const frame = this.stack.at(-1);
    if (frame?.kind !== "object") throw new Error(`Key "${key}" outside an object`);
    frame.key = key;
  }

  string(value: string): void {
    this.emit(value);
  }

  number(value: string): void {
    this.emit(Number(value));
  }

  boolean(value: boolean): void {
    this.emit(value);
  }

  null(): void {
    this.emit(null);
  }

  private emit(value: JsonValue): void {
    const frame = this.stack.at(-1);
    if (!frame) {
      this.root = value;
      this.done = true;
      return;
    }
    if (frame.kind === "array") {
      frame.value.push(value);
      return;
    }
    if (frame.key === undefined) throw new Error("Object value without a key");
    frame.value[frame.key] = value;
    frame.key = undefined;
  }
}
