import type { SubtitleBlock } from "../types/subtitle";

const BYTE_ORDER_MARK = "\uFEFF";

export class SrtParseError extends Error {
  constructor(
    message: string,
    public readonly blockNumber: number,
    public readonly line: string
  ) {
    super(message);
    this.name = "SrtParseError";
  }
}

/**
 * Parses SRT text into blocks. Blocks with fewer than three non-empty lines
 * are skipped; the time range line is kept exactly as written.
 */
export function parseSrt(raw: string): SubtitleBlock[] {
  const normalized = raw.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
  const chunks = normalized.split("\n\n").filter((chunk) => chunk.trim());
  const blocks: SubtitleBlock[] = [];

  chunks.forEach((chunk, chunkIndex) => {
    const lines = chunk.split("\n").filter((line) => line.trim());
    if (lines.length < 3) {
      return;
    }

    let indexLine = lines[0];
    if (indexLine.startsWith(BYTE_ORDER_MARK)) {
      indexLine = indexLine.slice(BYTE_ORDER_MARK.length);
    }

    const indexText = indexLine.trim();
    if (!/^\d+$/.test(indexText)) {
      throw new SrtParseError(
        `Invalid subtitle index "${indexText}" in block ${chunkIndex + 1}`,
        chunkIndex + 1,
        lines[0]
      );
    }

    blocks.push({
      index: Number.parseInt(indexText, 10),
      timeRange: lines[1],
      text: lines.slice(2).join(" "),
    });
  });

  return blocks;
}
