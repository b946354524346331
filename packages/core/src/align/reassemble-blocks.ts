import type { Sentence, SubtitleBlock } from "../types/subtitle";
import type { ReassemblyResult } from "../types/translation";

/**
 * Distributes translated sentences back over the source blocks: each block
 * takes as many sentences as it had in the source, in order. Misalignment is
 * carried forward, not re-anchored; once the pool runs out the remaining
 * blocks get empty text.
 */
export function reassembleBlocks(
  blocks: SubtitleBlock[],
  sentenceCounts: number[],
  translatedSentences: Sentence[]
): ReassemblyResult {
  if (sentenceCounts.length !== blocks.length) {
    throw new Error(
      `Expected ${blocks.length} sentence counts, received ${sentenceCounts.length}`
    );
  }

  let cursor = 0;
  let shortfall = 0;
  const drift: number[] = [];

  const reassembled = blocks.map((block, blockIndex) => {
    const wanted = Math.max(0, sentenceCounts[blockIndex]);
    const available = Math.min(wanted, translatedSentences.length - cursor);
    const sentences = translatedSentences.slice(cursor, cursor + available);
    cursor += available;

    const missing = wanted - available;
    shortfall += missing;
    drift.push(missing);

    return {
      index: block.index,
      timeRange: block.timeRange,
      text: sentences.join(" "),
    };
  });

  return {
    blocks: reassembled,
    consumed: cursor,
    shortfall,
    surplus: translatedSentences.length - cursor,
    drift,
  };
}
