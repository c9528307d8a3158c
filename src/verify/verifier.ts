import type { CopyValues } from "./occurrences.js";

export type CopyDifference = {
  field: string;
  copyA: number;
  copyB: number;
  a: number | undefined;
  b: number | undefined;
};

export type ComparisonReport = {
  ok: boolean;
  differences: CopyDifference[];
};

const allFields = (copies: readonly CopyValues[]): string[] =>
  [...new Set(copies.flatMap((copy) => Object.keys(copy)))].sort();

/** Every pair of copies that disagrees on a field, fields in alphabetical order. */
export const compareCopies = (copies: readonly CopyValues[], ignored: Iterable<string> = []): ComparisonReport => {
  const skip = new Set(ignored);
  const differences: CopyDifference[] = [];

  for (const field of allFields(copies)) {
    if (skip.has(field)) continue;
    for (let copyA = 0; copyA < copies.length; copyA += 1) {
      for (let copyB = copyA + 1; copyB < copies.length; copyB += 1) {
        const a = copies[copyA]?.[field];
        const b = copies[copyB]?.[field];
        if (a !== b) differences.push({ field, copyA, copyB, a, b });
      }
    }
  }

  return { ok: differences.length === 0, differences };
};

export type FieldCheck = {
  field: string;
  expected: number;
  /** One entry per copy. */
  values: (number | undefined)[];
};

export type VerificationReport = {
  ok: boolean;
  /** At least one copy matches but the copies disagree. */
  warnings: FieldCheck[];
  /** No copy matches. */
  failures: FieldCheck[];
};

export const verifyExpected = (
  copies: readonly CopyValues[],
  expected: Readonly<Record<string, number>>
): VerificationReport => {
  const warnings: FieldCheck[] = [];
  const failures: FieldCheck[] = [];

  for (const [field, value] of Object.entries(expected)) {
    const values = copies.map((copy) => copy[field]);
    const check = { field, expected: value, values };
    if (!values.includes(value)) {
      failures.push(check);
    } else if (values.some((found) => found !== value)) {
      warnings.push(check);
    }
  }

  return { ok: failures.length === 0, warnings, failures };
};

export const describeCheck = ({ field, expected, values }: FieldCheck): string =>
  `${field}: ${values.map((value, copy) => `copy${copy}=${value ?? "missing"}`).join(", ")}, expected=${expected}`;

/** Listed fields first, in list order, then the rest alphabetically. */
export const orderFields = <T>(record: Readonly<Record<string, T>>, order: readonly string[]): Record<string, T> => {
  const ordered: Record<string, T> = {};
  const listed = new Set(order);
  for (const field of order) {
    const value = record[field];
    if (value !== undefined) ordered[field] = value;
  }
  for (const field of Object.keys(record).sort()) {
    const value = record[field];
    if (!listed.has(field) && value !== undefined) ordered[field] = value;
  }
  return ordered;
};
