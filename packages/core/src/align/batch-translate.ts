import type { ProtectedVocabulary, Sentence } from "../types/subtitle";
import type {
  BatchTranslationResult,
  BatchTranslationStats,
  Logger,
  Segmenter,
  TranslationBatch,
  Translator,
} from "../types/translation";
import { protectTerms, unprotectTerms } from "../utils/protect-terms";
import { segmentSentences } from "../utils/sentences";

// Sentences submitted to the translator in one request at most
const DEFAULT_MAX_SENTENCES_PER_BATCH = 5;
// Combined sentence length allowed in one request
const DEFAULT_MAX_CHARS_PER_BATCH = 512;

export interface BatchTranslationOptions {
  translator: Translator;
  sourceLanguage: string;
  targetLanguage: string;
  segmenter?: Segmenter;
  vocabulary?: ProtectedVocabulary;
  maxSentencesPerBatch?: number;
  maxCharsPerBatch?: number;
  logger?: Logger;
  // Called after every accepted batch with the cursor already advanced
  onBatch?: (progress: BatchProgress) => void | Promise<void>;
}

export interface BatchProgress {
  batch: TranslationBatch;
  translated: Sentence[];
  cursor: number;
  total: number;
  matched: boolean;
}

const normalizeLimit = (value: number | undefined, fallback: number): number => {
  if (value === undefined || !Number.isFinite(value) || value < 1) {
    return fallback;
  }
  return Math.floor(value);
};

const countChars = (sentences: Sentence[]): number =>
  sentences.reduce((total, sentence) => total + sentence.length, 0);

const preview = (text: string, limit = 150): string =>
  text.length > limit ? `${text.slice(0, limit)}...` : text;

/**
 * Translates a flat sentence sequence in batches while trying to keep the
 * translated sentence count equal to the source count.
 *
 * A batch is accepted when the translation re-segments into as many sentences
 * as were sent. On the first mismatch of a multi-sentence batch the cursor
 * position is retried one sentence at a time; a single sentence that still
 * mismatches is accepted as-is so the cursor always advances. Translator
 * failures propagate unchanged.
 */
export async function translateSentences(
  sentences: Sentence[],
  options: BatchTranslationOptions
): Promise<BatchTranslationResult> {
  const {
    translator,
    sourceLanguage,
    targetLanguage,
    segmenter = segmentSentences,
    vocabulary = [],
    logger = console,
    onBatch,
  } = options;
  const maxSentencesPerBatch = normalizeLimit(
    options.maxSentencesPerBatch,
    DEFAULT_MAX_SENTENCES_PER_BATCH
  );
  const maxCharsPerBatch = normalizeLimit(
    options.maxCharsPerBatch,
    DEFAULT_MAX_CHARS_PER_BATCH
  );

  const translated: Sentence[] = [];
  const stats: BatchTranslationStats = {
    sourceSentences: sentences.length,
    translatedSentences: 0,
    translatorCalls: 0,
    acceptedBatches: 0,
    mismatches: 0,
    lengthRejections: 0,
  };

  const translateBatch = async (batch: TranslationBatch): Promise<Sentence[]> => {
    const text = batch.sentences.join(" ");
    stats.translatorCalls++;
    const output = await translator(protectTerms(text, vocabulary), {
      sourceLanguage,
      targetLanguage,
      vocabulary,
      batch,
    });
    return segmenter(unprotectTerms(output));
  };

  let cursor = 0;

  while (cursor < sentences.length) {
    let attempt = Math.min(maxSentencesPerBatch, sentences.length - cursor);
    let accepted: { batch: TranslationBatch; output: Sentence[]; matched: boolean } | null =
      null;

    while (attempt > 0) {
      const batch: TranslationBatch = {
        sentences: sentences.slice(cursor, cursor + attempt),
        startOffset: cursor,
      };
      const chars = countChars(batch.sentences);

      if (chars > maxCharsPerBatch) {
        stats.lengthRejections++;
        attempt--;
        continue;
      }

      logger.log("[Batch Request]", {
        startOffset: batch.startOffset,
        sentenceCount: attempt,
        chars,
        text: preview(batch.sentences.join(" ")),
      });

      const output = await translateBatch(batch);

      if (output.length === attempt) {
        accepted = { batch, output, matched: true };
        break;
      }

      stats.mismatches++;
      logger.warn("[Batch Mismatch]", {
        startOffset: batch.startOffset,
        sourceSentences: attempt,
        translatedSentences: output.length,
        action: attempt > 1 ? "retry-single" : "accept",
      });

      if (attempt > 1) {
        attempt = 1;
        continue;
      }

      accepted = { batch, output, matched: false };
      break;
    }

    if (!accepted) {
      // Even a single sentence is over the length limit; send it alone anyway
      const batch: TranslationBatch = {
        sentences: [sentences[cursor]],
        startOffset: cursor,
      };
      logger.warn("[Batch Oversized]", {
        startOffset: cursor,
        chars: sentences[cursor].length,
        maxCharsPerBatch,
      });
      const output = await translateBatch(batch);
      const matched = output.length === 1;
      if (!matched) {
        stats.mismatches++;
      }
      accepted = { batch, output, matched };
    }

    translated.push(...accepted.output);
    cursor += accepted.batch.sentences.length;
    stats.acceptedBatches++;

    logger.log("[Batch Accepted]", {
      startOffset: accepted.batch.startOffset,
      sourceSentences: accepted.batch.sentences.length,
      translatedSentences: accepted.output.length,
      matched: accepted.matched,
      text: preview(accepted.output.join(" ")),
    });

    if (onBatch) {
      await onBatch({
        batch: accepted.batch,
        translated: accepted.output,
        cursor,
        total: sentences.length,
        matched: accepted.matched,
      });
    }
  }

  stats.translatedSentences = translated.length;
  return { sentences: translated, stats };
}
