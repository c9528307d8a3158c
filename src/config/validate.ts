import { ConfigError } from "../binary/errors.js";

export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const expectRecord = (value: unknown, path: string): JsonRecord => {
  if (!isRecord(value)) {
    throw new ConfigError("expected an object", path);
  }
  return value;
};

export const expectArray = (value: unknown, path: string): unknown[] => {
  if (!Array.isArray(value)) {
    throw new ConfigError("expected an array", path);
  }
  return value;
};

export const expectString = (value: unknown, path: string): string => {
  if (typeof value !== "string") {
    throw new ConfigError("expected a string", path);
  }
  return value;
};

export const expectStrings = (value: unknown, path: string): string[] =>
  expectArray(value, path).map((item, index) => expectString(item, `${path}[${index}]`));

export const expectInteger = (value: unknown, path: string): number => {
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new ConfigError("expected an integer", path);
  }
  return value;
};

const HEX_OFFSET = /^0x[0-9a-f]+$/i;

/** A non-negative integer, written either as a number or as a "0x…" string. */
export const expectOffset = (value: unknown, path: string): number => {
  if (typeof value === "string" && HEX_OFFSET.test(value)) {
    const parsed = Number.parseInt(value.slice(2), 16);
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return value;
  }
  throw new ConfigError('expected a non-negative integer or a "0x…" string', path);
};

/** field → integer, as used by edit and expected-value maps. */
export const expectIntegerMap = (value: unknown, path: string): Record<string, number> => {
  const record = expectRecord(value, path);
  return Object.fromEntries(
    Object.entries(record).map(([key, item]) => [key, expectInteger(item, `${path}.${key}`)])
  );
};
