import { createReadStream, createWriteStream, readBinaryFile, writeBinaryFile, writeJsonFile } from "./streams.js";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { finished } from "node:stream/promises";

const tempDir = (): Promise<string> => mkdtemp(path.join(tmpdir(), "streams-test-"));

describe("streams", () => {
  it("createReadStream reads file content", async () => {
    const filePath = path.join(await tempDir(), "input.json");
    const content = '{"walk_speed":["0x17"]}';
    await writeFile(filePath, content);

    const stream = createReadStream(filePath);
    let result = "";
    for await (const chunk of stream) {
      result += String(chunk);
    }
    expect(result).toBe(content);
  });

  it("createReadStream aborts with signal", async () => {
    const filePath = path.join(await tempDir(), "input-abort.json");
    // Large enough that reading is still in progress when the signal fires
    await writeFile(filePath, Buffer.alloc(1024 * 1024));

    const controller = new AbortController();
    const stream = createReadStream(filePath, controller.signal);

    controller.abort();

    await expect(finished(stream)).rejects.toThrow(/aborted/i);
  });

  it("createWriteStream writes file content", async () => {
    const filePath = path.join(await tempDir(), "output.txt");
    const content = "Hello Writer";

    const stream = createWriteStream(filePath);
    stream.write(content);
    stream.end();
    await finished(stream);

    const written = await readFile(filePath, "utf8");
    expect(written).toBe(content);
  });

  it("createWriteStream aborts with signal", async () => {
    const filePath = path.join(await tempDir(), "output-abort.txt");

    const controller = new AbortController();
    const stream = createWriteStream(filePath, controller.signal);

    controller.abort();

    // Writing to aborted stream might not throw immediately, but finished promise should reject
    stream.write("data");

    await expect(finished(stream)).rejects.toThrow(/aborted/i);
  });

  it("readBinaryFile returns the exact bytes", async () => {
    const filePath = path.join(await tempDir(), "input.jsb");
    const bytes = Buffer.from([0x0a, 0x77, 0x61, 0x6c, 0x6b, 0x02, 0xff, 0x00, 0x80, 0xc9]);
    await writeFile(filePath, bytes);

    expect(await readBinaryFile(filePath)).toEqual(bytes);
  });

  it("readBinaryFile names the file it could not read", async () => {
    const filePath = path.join(await tempDir(), "missing.jsb");
    await expect(readBinaryFile(filePath)).rejects.toThrow(`Failed to read input file "${filePath}"`);
  });

  it("writeBinaryFile replaces the file content", async () => {
    const filePath = path.join(await tempDir(), "output.jsb");
    await writeFile(filePath, "previous content that is longer");

    await writeBinaryFile(filePath, Buffer.from([1, 2, 3]));
    expect(await readFile(filePath)).toEqual(Buffer.from([1, 2, 3]));
  });

  it("writeBinaryFile names the file it could not write", async () => {
    const filePath = path.join(await tempDir(), "no-such-dir", "output.jsb");
    await expect(writeBinaryFile(filePath, Buffer.from([1]))).rejects.toThrow(
      `Failed to write output file "${filePath}"`
    );
  });

  it("writeJsonFile writes indented JSON with a trailing newline", async () => {
    const filePath = path.join(await tempDir(), "out.json");
    await writeJsonFile(filePath, { values: [{ start_value: 650 }] });

    expect(await readFile(filePath, "utf8")).toBe('{\n  "values": [\n    {\n      "start_value": 650\n    }\n  ]\n}\n');
  });
});
