const ROW_WIDTH = 16;

export const hex = (value: number, pad = 8): string =>
  `0x${value.toString(16).toUpperCase().padStart(pad, "0")}`;

export const hexByte = (value: number): string => hex(value, 2);

/**
 * Hex/ASCII window of ±`window` bytes around `position`, 16-byte rows aligned to the
 * buffer start. The row holding `position` is flagged with ">".
 */
export const dumpBytes = (buffer: Uint8Array, position: number, window = 32): string => {
  const low = Math.max(0, position - window);
  const high = Math.min(buffer.length, position + window);
  const first = low - (low % ROW_WIDTH);
  const lines: string[] = [];

  for (let offset = first; offset < high; offset += ROW_WIDTH) {
    const row = buffer.subarray(offset, Math.min(offset + ROW_WIDTH, buffer.length));
    const hexPart = Array.from(row, (b) => b.toString(16).toUpperCase().padStart(2, "0"))
      .join(" ")
      .padEnd(ROW_WIDTH * 3 - 1);
    let ascii = "";
    for (const b of row) ascii += b >= 0x20 && b <= 0x7e ? String.fromCharCode(b) : ".";
    const flag = position >= offset && position < offset + ROW_WIDTH ? ">" : " ";
    lines.push(`${flag} ${hex(offset)}: ${hexPart}  ${ascii}`);
  }

  return lines.join("\n");
};
