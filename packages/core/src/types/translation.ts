import type { ProtectedVocabulary, Sentence, SubtitleBlock } from "./subtitle";

export interface TranslationBatch {
  sentences: Sentence[];
  // Position of the first sentence in the flat source-sentence sequence
  startOffset: number;
}

export interface TranslatorContext {
  sourceLanguage: string;
  targetLanguage: string;
  vocabulary: ProtectedVocabulary;
  batch: TranslationBatch;
}

/**
 * Maps a source-language span to a target-language span. Must preserve the
 * protection marker and the relative order of the content.
 */
export type Translator = (
  text: string,
  context: TranslatorContext
) => Promise<string>;

export type Segmenter = (text: string) => Sentence[];

export type Logger = Pick<Console, "log" | "warn" | "error">;

export interface BatchTranslationStats {
  sourceSentences: number;
  translatedSentences: number;
  translatorCalls: number;
  acceptedBatches: number;
  mismatches: number;
  lengthRejections: number;
}

export interface BatchTranslationResult {
  sentences: Sentence[];
  stats: BatchTranslationStats;
}

export interface ReassemblyResult {
  blocks: SubtitleBlock[];
  consumed: number;
  // Sentences the blocks asked for but the pool could not supply
  shortfall: number;
  // Translated sentences left over after the last block
  surplus: number;
  // Per block: how many sentences it was short of its source count
  drift: number[];
}
