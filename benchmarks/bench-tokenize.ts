import { COEFFICIENT_INTEGERS } from "../src/binary/codec.js";
import { ContainerTokenReader } from "../src/binary/reader.js";
import { ContainerWriter } from "../src/binary/writer.js";
import { ROLE_DATA_SHAPE } from "../src/records/playerRatings.js";
import { StructuralParser } from "../src/parser/structuralParser.js";

const BLOCKS = 2000;
const BLOCK_SIZE = ROLE_DATA_SHAPE.blockSize;

const buildTokenBuffer = (count: number): Buffer => {
  const writer = new ContainerWriter(count * 16);
  for (let i = 0; i < count; i++) {
    if (i % 3 === 0) {
      writer.writeStringField("name", `entry ${i}`);
    } else {
      writer.writeIntField("value", i);
    }
  }
  return writer.toBuffer();
};

const buildRoleData = (blocks: number): Buffer => {
  const writer = new ContainerWriter(blocks * BLOCK_SIZE * 24);
  writer.writeKey("role_data");
  writer.writeObjectMarker();
  for (let i = 0; i < blocks * BLOCK_SIZE; i++) {
    writer.writeRaw(ROLE_DATA_SHAPE.nameLabel).writeString(`Coefficient ${i % BLOCK_SIZE}`);
    writer.writeRaw(ROLE_DATA_SHAPE.valueLabel).writeInteger((i % 400) - 200, COEFFICIENT_INTEGERS);
  }
  return writer.toBuffer();
};

const time = (label: string, units: number, unitName: string, run: () => void): void => {
  const start = process.hrtime.bigint();
  run();
  const end = process.hrtime.bigint();
  const duration = Number(end - start) / 1e9;
  console.log(`${label}: ${units} ${unitName} in ${duration.toFixed(3)}s`);
  console.log(`  Throughput: ${(units / duration).toFixed(0)} ${unitName}/s`);
};

function main() {
  console.log("Starting benchmark...");

  const tokens = buildTokenBuffer(200_000);
  time("Token stream", 200_000, "tokens", () => {
    let count = 0;
    for (const _token of new ContainerTokenReader(tokens).tokens()) count++;
    if (count !== 200_000) throw new Error(`Expected 200000 tokens, read ${count}`);
  });

  const roleData = buildRoleData(BLOCKS);
  time("Coefficient blocks", BLOCKS, "blocks", () => {
    const { blocks } = new StructuralParser(roleData).parse(ROLE_DATA_SHAPE, { start: 1 });
    if (blocks.length !== BLOCKS) throw new Error(`Expected ${BLOCKS} blocks, got ${blocks.length}`);
  });
}

main();
