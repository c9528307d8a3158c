export {
  COEFFICIENT_INTEGERS,
  decodeInteger,
  decodeStreamValue,
  decodeUtf8Lossy,
  encodeInteger,
  encodeVarint,
  FIXED_INTEGERS,
  LOOKUP_INTEGERS,
  readZigzagVarint,
  VERSION_INTEGERS,
  zigzagDecode,
  zigzagEncode,
} from "./binary/codec.js";
export type { Decoded, IntegerEncoding, StreamValue, TinyRange } from "./binary/codec.js";
export {
  ConfigError,
  ContainerDecodeError,
  InvalidOffsetsError,
  TokenMismatchError,
  TruncatedOrCorruptError,
  UnknownMarkerError,
} from "./binary/errors.js";
export { ContainerMarker, KEY_PREFIXES, MAX_KEY_LENGTH, ValueMarker } from "./binary/format.js";
export type { ScalarValue, TokenKind } from "./binary/format.js";
export { dumpBytes, hex } from "./binary/hexdump.js";
export { ContainerTokenReader, describeToken } from "./binary/reader.js";
export type { ContainerToken, TokenPosition } from "./binary/reader.js";
export { noResync, trailingControlByteResync } from "./binary/resync.js";
export type { ResyncDecision, Resynchronizer } from "./binary/resync.js";
export { ContainerWriter } from "./binary/writer.js";
export {
  loadCoefficientEdits,
  loadIntegerMap,
  loadJsonFile,
  loadOffsetTable,
  loadRoleNames,
  loadSeasons,
  loadWeightsLayout,
} from "./config/loader.js";
export { createConsoleLogger, MemoryLogger, silentLogger } from "./io/logger.js";
export type { Logger } from "./io/logger.js";
export { createStreamParser, JsonValueBuilder, parseJsonStream } from "./parser/streamParser.js";
export type { JsonTokenSink, JsonValue } from "./parser/streamParser.js";
export type {
  BlockArrayShape,
  ByteRange,
  IndexTableShape,
  KeyedObjectShape,
  KeyScanShape,
  RecordShape,
  ScalarShape,
  TupleTableShape,
} from "./parser/shapes.js";
export { StructuralParser } from "./parser/structuralParser.js";
export { copyCount, offsetTableFromJson } from "./patch/offsetTable.js";
export type { OffsetTable } from "./patch/offsetTable.js";
export { patchBuffer, patchFile } from "./patch/patcher.js";
export type { AppliedEdit, PatchResult, PatchWarning } from "./patch/patcher.js";
export { compareConstraintCopies, decodeConstraints, verifyConstraints } from "./records/physicalConstraints.js";
export {
  applyCoefficientEdits,
  buildRoleMatrix,
  decodeSeason,
  describeRoleMask,
  seasonToJson,
} from "./records/playerRatings.js";
export type { Season, SeasonAnchors, SeasonJson } from "./records/playerRatings.js";
export { decodeWeights, weightsToJson } from "./records/weights.js";
export type { WeightsDocument, WeightsLayout } from "./records/weights.js";
export { decodeOccurrences } from "./verify/occurrences.js";
export type { CopyValues, Occurrences } from "./verify/occurrences.js";
export { compareCopies, orderFields, verifyExpected } from "./verify/verifier.js";
export type { ComparisonReport, VerificationReport } from "./verify/verifier.js";
