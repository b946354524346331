import { createLlmTranslator } from "@srt-realign/ai";
import {
  DEFAULT_PROTECTED_TERMS,
  createSegmenter,
  orderVocabulary,
  realignSrt,
} from "@srt-realign/core";
import type {
  Logger,
  ProtectedVocabulary,
  RealignSummary,
  Translator,
} from "@srt-realign/core";
import { z } from "zod";
import { ConfigError, defaultOutputPath } from "../config";
import type { RealignConfig } from "../config";
import { createArgosTranslator } from "../lib/argos";
import { readJSON, readText, writeText } from "../utils/file";
import { installModel } from "./install-model";

const termsFileSchema = z.array(z.string());

export interface RealignFileResult {
  outputPath: string;
  summary: RealignSummary;
}

export const loadVocabulary = async (
  termsFile?: string
): Promise<ProtectedVocabulary> => {
  if (!termsFile) {
    return DEFAULT_PROTECTED_TERMS;
  }

  const terms = await readJSON(termsFile);
  if (terms === null) {
    throw new ConfigError([`termsFile: ${termsFile} does not exist`]);
  }

  const parsed = termsFileSchema.safeParse(terms);
  if (!parsed.success) {
    throw new ConfigError([`termsFile: ${termsFile} must contain a JSON array of strings`]);
  }
  return orderVocabulary(parsed.data);
};

const createTranslator = async (
  config: RealignConfig,
  logger: Logger
): Promise<Translator> => {
  if (config.engine === "argos") {
    await installModel(config, logger);
    return createArgosTranslator({ python: config.python });
  }

  return createLlmTranslator({
    provider: config.provider,
    model: config.model,
    logger,
  });
};

/**
 * Translates one subtitle file and writes the realigned result, by default
 * to `<name>.<target>.srt` beside the input.
 */
export const realignFile = async (
  config: RealignConfig,
  logger: Logger = console
): Promise<RealignFileResult> => {
  const outputPath = config.output ?? defaultOutputPath(config.input, config.targetLanguage);
  const raw = await readText(config.input);
  const vocabulary = await loadVocabulary(config.termsFile);
  const translator = await createTranslator(config, logger);

  const { srt, summary } = await realignSrt(raw, {
    translator,
    sourceLanguage: config.sourceLanguage,
    targetLanguage: config.targetLanguage,
    segmenter: createSegmenter(config.segmenter),
    vocabulary,
    maxSentencesPerBatch: config.maxSentencesPerBatch,
    maxCharsPerBatch: config.maxCharsPerBatch,
    wrap: {
      strategy: config.wrap,
      maxCharsPerLine: config.maxCharsPerLine,
    },
    renumber: config.renumber,
    logger,
  });

  await writeText(outputPath, srt);
  return { outputPath, summary };
};
