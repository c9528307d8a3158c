import { ContainerDecodeError } from "../binary/errors.js";
import {
  loadCoefficientEdits,
  loadIntegerMap,
  loadOffsetTable,
  loadRoleNames,
  loadSeasons,
  loadWeightsLayout,
} from "../config/loader.js";
import { readBinaryFile, writeJsonFile } from "../io/streams.js";
import type { Logger } from "../io/logger.js";
import { patchFile } from "../patch/patcher.js";
import { compareConstraintCopies, decodeConstraints, verifyConstraints } from "../records/physicalConstraints.js";
import { applyCoefficientEdits, buildRoleMatrix, decodeSeason, seasonToJson } from "../records/playerRatings.js";
import { decodeWeights, weightsToJson } from "../records/weights.js";
import { describeCheck } from "../verify/verifier.js";

export type CliContext = {
  logger: Logger;
  /** Where JSON goes when no --output is given. */
  stdout: (text: string) => void;
  signal?: AbortSignal;
};

export const USAGE = [
  "Usage: jsb-codec <command> [options]",
  "",
  "  ratings <file.jsb>      [--season fm24] [--seasons <json>] [--role-names <json>]",
  "                          [--edits <json>] [--matrix <json>] [--output <json>]",
  "  weights <file.jsb>      [--layout <json>] [--output <json>]",
  "  constraints <file.jsb>  [--table <json>] [--copy <n>] [--output <json>]",
  "  compare <file.jsb>      [--table <json>]",
  "  verify <file.jsb>       --expected <json> [--table <json>]",
  "  patch <in.jsb> <out.jsb> --edits <json> [--table <json>]",
  "  help",
].join("\n");

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type ParsedArgs = {
  flag(name: string): string | undefined;
  positional: string[];
};

const parseArgs = (args: readonly string[]): ParsedArgs => {
  const consumed = new Set<number>();
  const flags = new Map<string, string>();

  args.forEach((value, index) => {
    if (!value.startsWith("--") || consumed.has(index)) return;
    consumed.add(index);
    const next = args[index + 1];
    if (next !== undefined && !next.startsWith("--")) {
      consumed.add(index + 1);
      flags.set(value.slice(2), next);
    } else {
      flags.set(value.slice(2), "");
    }
  });

  return {
    flag: (name) => flags.get(name) || undefined,
    positional: args.filter((_, index) => !consumed.has(index)),
  };
};

const required = (value: string | undefined, what: string): string => {
  if (!value) throw new UsageError(`Missing ${what}`);
  return value;
};

const emit = async (value: unknown, output: string | undefined, context: CliContext): Promise<void> => {
  if (output) {
    await writeJsonFile(output, value, context.signal);
    context.logger.info(`Wrote ${output}`);
  } else {
    context.stdout(JSON.stringify(value, null, 2));
  }
};

type Command = (args: ParsedArgs, context: CliContext) => Promise<number>;

const ratings: Command = async (args, context) => {
  const input = required(args.positional[0], "input file");
  const seasonName = args.flag("season") ?? "fm24";
  const seasons = await loadSeasons(args.flag("seasons"));
  const anchors = seasons.get(seasonName);
  if (!anchors) {
    throw new UsageError(`Unknown season "${seasonName}" (known: ${[...seasons.keys()].join(", ")})`);
  }

  const buffer = await readBinaryFile(input, context.signal);
  context.logger.info(`Read ${buffer.length} bytes from ${input}`);
  const season = decodeSeason(buffer, anchors, { logger: context.logger });
  let json = seasonToJson(season);

  const editsFile = args.flag("edits");
  if (editsFile) {
    const result = applyCoefficientEdits(json, await loadCoefficientEdits(editsFile));
    for (const skipped of result.skipped) context.logger.warn(`No coefficient ${skipped}, skipping`);
    context.logger.info(`Applied ${result.changed} coefficient edits`);
    json = result.season;
  }

  const matrixFile = args.flag("matrix");
  if (matrixFile) {
    const names = await loadRoleNames(args.flag("role-names"));
    await writeJsonFile(
      matrixFile,
      buildRoleMatrix({ roleBlocks: json.role_data.map((block) => block.coefficients), roleLookup: season.roleLookup }, names),
      context.signal
    );
    context.logger.info(`Wrote ${matrixFile}`);
  }

  await emit({ values: [json] }, args.flag("output"), context);
  return 0;
};

const weights: Command = async (args, context) => {
  const input = required(args.positional[0], "input file");
  const layout = await loadWeightsLayout(args.flag("layout"));
  const buffer = await readBinaryFile(input, context.signal);
  const document = decodeWeights(buffer, layout, { logger: context.logger });
  context.logger.info(`${document.seasons.length} season blocks`);
  await emit(weightsToJson(document), args.flag("output"), context);
  return 0;
};

const constraints: Command = async (args, context) => {
  const input = required(args.positional[0], "input file");
  const table = await loadOffsetTable(args.flag("table"));
  const buffer = await readBinaryFile(input, context.signal);
  const { copies } = decodeConstraints(buffer, table, { logger: context.logger });

  const copyFlag = args.flag("copy");
  if (copyFlag === undefined || copyFlag === "all") {
    await emit(copies, args.flag("output"), context);
    return 0;
  }
  const copy = /^\d+$/.test(copyFlag) ? copies[Number(copyFlag)] : undefined;
  if (!copy) {
    throw new UsageError(`--copy must be "all" or a copy number below ${copies.length}`);
  }
  await emit(copy, args.flag("output"), context);
  return 0;
};

const compare: Command = async (args, context) => {
  const input = required(args.positional[0], "input file");
  const table = await loadOffsetTable(args.flag("table"));
  const buffer = await readBinaryFile(input, context.signal);
  const report = compareConstraintCopies(buffer, table, { logger: context.logger });
  for (const { field, copyA, copyB, a, b } of report.differences) {
    context.logger.warn(`[DIFF] ${field}: copy${copyA}=${a ?? "missing"} copy${copyB}=${b ?? "missing"}`);
  }
  context.logger.info(report.ok ? "Copies identical" : "Copies differ");
  return report.ok ? 0 : 1;
};

const verify: Command = async (args, context) => {
  const input = required(args.positional[0], "input file");
  const expected = await loadIntegerMap(required(args.flag("expected"), "--expected <json>"));
  const table = await loadOffsetTable(args.flag("table"));
  const buffer = await readBinaryFile(input, context.signal);
  const report = verifyConstraints(buffer, table, expected, { logger: context.logger });
  for (const check of report.warnings) context.logger.warn(describeCheck(check));
  for (const check of report.failures) context.logger.error(`[FAIL] ${describeCheck(check)}`);
  context.logger.info(report.ok ? "Verification succeeded" : "Verification failed");
  return report.ok ? 0 : 1;
};

const patch: Command = async (args, context) => {
  const input = required(args.positional[0], "input file");
  const output = required(args.positional[1], "output file");
  const edits = await loadIntegerMap(required(args.flag("edits"), "--edits <json>"));
  const table = await loadOffsetTable(args.flag("table"));
  const result = await patchFile(input, output, table, edits, { logger: context.logger, signal: context.signal });
  context.logger.info(
    `Patched ${result.applied.length} value${result.applied.length === 1 ? "" : "s"} into ${output}` +
      (result.warnings.length > 0 ? ` (${result.warnings.length} skipped)` : "")
  );
  return 0;
};

const COMMANDS: Record<string, Command> = { ratings, weights, constraints, compare, verify, patch };

/** Commands that print their JSON result when no --output is given. */
export const JSON_COMMANDS: readonly string[] = ["ratings", "weights", "constraints"];

/** Run one command; resolves to the process exit code. */
export const runCli = async (argv: readonly string[], context: CliContext): Promise<number> => {
  const [name, ...rest] = argv;
  if (name === undefined || name === "help" || name === "--help") {
    context.stdout(USAGE);
    return name === undefined ? 1 : 0;
  }

  const command = COMMANDS[name];
  if (!command) {
    context.logger.error(`Unknown command "${name}"`);
    context.stdout(USAGE);
    return 1;
  }

  try {
    return await command(parseArgs(rest), context);
  } catch (error) {
    if (error instanceof UsageError) {
      context.logger.error(error.message);
      context.stdout(USAGE);
      return 1;
    }
    context.logger.error(`${name} failed:`, error);
    if (error instanceof ContainerDecodeError) {
      context.logger.error(error.context);
    }
    return 1;
  }
};
