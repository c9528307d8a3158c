import { describe, expect, it } from "vitest";
import { ContainerTokenReader } from "./reader.js";
import { noResync, trailingControlByteResync } from "./resync.js";
import { ContainerWriter } from "./writer.js";

// "name" declares four bytes, so the string swallows the length byte of "low".
const drifted = (): Buffer => {
  const writer = new ContainerWriter();
  writer.writeKey("name");
  writer.writeByte(0x84);
  writer.writeRaw(Buffer.from("Win"));
  writer.writeIntField("low", 1000);
  return writer.toBuffer();
};

describe("trailingControlByteResync", () => {
  it("trims the control byte and restarts on it", () => {
    const reader = new ContainerTokenReader(drifted());
    const [name] = Array.from(reader.tokens(0, 10));
    if (!name) throw new Error("expected a token");
    expect(name.value).toBe("Win\x03");

    const decision = trailingControlByteResync.inspect(name);
    expect(decision?.token.value).toBe("Win");
    expect(decision?.restartAt).toBe(9);

    const realigned = Array.from(reader.tokens(decision?.restartAt));
    expect(realigned.map((token) => [token.key, token.value])).toEqual([["low", 1000]]);
  });

  it("leaves clean strings and non-strings alone", () => {
    const writer = new ContainerWriter();
    writer.writeStringField("name", "Win");
    writer.writeIntField("low", 3);
    const tokens = Array.from(new ContainerTokenReader(writer.toBuffer()).tokens());

    expect(tokens.map((token) => trailingControlByteResync.inspect(token))).toEqual([undefined, undefined]);
  });

  it("noResync never intervenes", () => {
    const [name] = Array.from(new ContainerTokenReader(drifted()).tokens(0, 10));
    if (!name) throw new Error("expected a token");
    expect(noResync.inspect(name)).toBeUndefined();
  });
});
