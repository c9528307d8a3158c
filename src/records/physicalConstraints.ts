import { silentLogger } from "../io/logger.js";
import type { Logger } from "../io/logger.js";
import type { OffsetTable } from "../patch/offsetTable.js";
import { decodeOccurrences } from "../verify/occurrences.js";
import type { Occurrences } from "../verify/occurrences.js";
import { compareCopies, orderFields, verifyExpected } from "../verify/verifier.js";
import type { ComparisonReport, VerificationReport } from "../verify/verifier.js";

export type ConstraintOptions = {
  logger?: Logger;
};

/** Both stored copies, each in presentation order. */
export const decodeConstraints = (
  buffer: Buffer,
  table: OffsetTable,
  { logger = silentLogger }: ConstraintOptions = {}
): Occurrences => {
  const { copies, unreadable } = decodeOccurrences(buffer, table, { logger });
  copies.forEach((copy, index) => logger.info(`${table.name} copy ${index}: ${Object.keys(copy).length} fields`));
  return { copies: copies.map((copy) => orderFields(copy, table.order)), unreadable };
};

export const compareConstraintCopies = (
  buffer: Buffer,
  table: OffsetTable,
  options: ConstraintOptions = {}
): ComparisonReport => compareCopies(decodeConstraints(buffer, table, options).copies, table.ignoredFields);

export const verifyConstraints = (
  buffer: Buffer,
  table: OffsetTable,
  expected: Readonly<Record<string, number>>,
  options: ConstraintOptions = {}
): VerificationReport => verifyExpected(decodeConstraints(buffer, table, options).copies, expected);
