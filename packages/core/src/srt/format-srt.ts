import type { SubtitleBlock } from "../types/subtitle";

export interface FormatSrtOptions {
  // Write indices 1..n instead of the parsed ones
  renumber?: boolean;
}

export function formatSrt(
  blocks: SubtitleBlock[],
  options: FormatSrtOptions = {}
): string {
  const lines: string[] = [];

  blocks.forEach((block, position) => {
    lines.push(String(options.renumber ? position + 1 : block.index));
    lines.push(block.timeRange);
    lines.push(block.text);
    lines.push("");
  });

  return lines.join("\n");
}
