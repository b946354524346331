import { translateSentences } from "../align/batch-translate";
import type { BatchProgress } from "../align/batch-translate";
import { reassembleBlocks } from "../align/reassemble-blocks";
import { formatSrt } from "../srt/format-srt";
import { parseSrt } from "../srt/parse-srt";
import type { ProtectedVocabulary, SubtitleBlock } from "../types/subtitle";
import type {
  BatchTranslationStats,
  Logger,
  Segmenter,
  Translator,
} from "../types/translation";
import { wrapSubtitleText } from "../utils/line-wrap";
import type { WrapOptions } from "../utils/line-wrap";
import { segmentSentences } from "../utils/sentences";

export interface RealignOptions {
  translator: Translator;
  sourceLanguage: string;
  targetLanguage: string;
  segmenter?: Segmenter;
  vocabulary?: ProtectedVocabulary;
  maxSentencesPerBatch?: number;
  maxCharsPerBatch?: number;
  wrap?: WrapOptions;
  logger?: Logger;
  onBatch?: (progress: BatchProgress) => void | Promise<void>;
}

// Blocks compared side by side at the end of a run
const TAIL_BLOCKS = 4;

export interface BlockComparison {
  index: number;
  timeRange: string;
  source: string;
  translated: string;
}

export interface RealignSummary {
  sourceBlocks: number;
  outputBlocks: number;
  sourceSentences: number;
  translatedSentences: number;
  // Source minus translated sentence count; 0 when fully aligned
  discrepancy: number;
  shortfall: number;
  surplus: number;
  stats: BatchTranslationStats;
  // Last blocks of the run, source against translation
  tail: BlockComparison[];
}

export interface RealignResult {
  blocks: SubtitleBlock[];
  summary: RealignSummary;
}

export interface RealignSrtOptions extends RealignOptions {
  renumber?: boolean;
}

/**
 * Translates subtitle blocks sentence by sentence and redistributes the
 * translation over the original blocks, keeping every time range.
 */
export async function realignSubtitles(
  blocks: SubtitleBlock[],
  options: RealignOptions
): Promise<RealignResult> {
  const {
    segmenter = segmentSentences,
    logger = console,
    wrap,
  } = options;

  const sentenceCounts: number[] = [];
  const sourceSentences = blocks.flatMap((block) => {
    const sentences = segmenter(block.text);
    sentenceCounts.push(sentences.length);
    return sentences;
  });

  logger.log("[Realign Start]", {
    sourceLanguage: options.sourceLanguage,
    targetLanguage: options.targetLanguage,
    blockCount: blocks.length,
    sentenceCount: sourceSentences.length,
    timestamp: new Date().toISOString(),
  });

  const { sentences: translatedSentences, stats } = await translateSentences(
    sourceSentences,
    { ...options, segmenter, logger }
  );

  const discrepancy = sourceSentences.length - translatedSentences.length;
  if (discrepancy !== 0) {
    logger.warn("[Sentence Count Drift]", {
      sourceSentences: sourceSentences.length,
      translatedSentences: translatedSentences.length,
      discrepancy,
    });
  }

  const reassembly = reassembleBlocks(blocks, sentenceCounts, translatedSentences);

  if (reassembly.shortfall > 0) {
    logger.warn("[Reassembly Shortfall]", {
      shortfall: reassembly.shortfall,
      emptyBlocks: reassembly.blocks.filter((block) => !block.text).length,
      firstDriftingBlock: reassembly.blocks[reassembly.drift.findIndex((d) => d > 0)]?.index,
    });
  }

  const outputBlocks = reassembly.blocks.map((block, position) => {
    logger.log("[Block Assigned]", {
      index: block.index,
      timeRange: block.timeRange,
      sourceSentences: sentenceCounts[position],
      assignedSentences: sentenceCounts[position] - reassembly.drift[position],
      text: block.text,
    });

    return {
      ...block,
      text: wrapSubtitleText(block.text, wrap),
    };
  });

  const tailStart = Math.max(0, outputBlocks.length - TAIL_BLOCKS);
  const tail = outputBlocks.slice(tailStart).map((block, offset) => ({
    index: block.index,
    timeRange: block.timeRange,
    source: blocks[tailStart + offset].text,
    translated: block.text,
  }));

  const summary: RealignSummary = {
    sourceBlocks: blocks.length,
    outputBlocks: outputBlocks.length,
    sourceSentences: sourceSentences.length,
    translatedSentences: translatedSentences.length,
    discrepancy,
    shortfall: reassembly.shortfall,
    surplus: reassembly.surplus,
    stats,
    tail,
  };

  logger.log("[Realign Summary]", {
    ...summary,
    timestamp: new Date().toISOString(),
  });

  return { blocks: outputBlocks, summary };
}

export async function realignSrt(
  raw: string,
  options: RealignSrtOptions
): Promise<{ srt: string; summary: RealignSummary }> {
  const { renumber, ...realignOptions } = options;
  const { blocks, summary } = await realignSubtitles(parseSrt(raw), realignOptions);
  return { srt: formatSrt(blocks, { renumber }), summary };
}
