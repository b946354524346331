import { PROTECTION_MARKER } from "@srt-realign/core";
import type {
  Logger,
  Translator,
  TranslatorContext,
} from "@srt-realign/core";
import { generateObject } from "ai";
import { z } from "zod";
import { createLanguageModel } from "../lib";
import type { ClientSettings, TranslationProvider } from "../lib";
import {
  DEFAULT_TRANSLATION_MODELS,
  TRANSLATION_MODEL,
  TRANSLATION_PROVIDER,
} from "./config";

export interface LlmTranslatorOptions extends ClientSettings {
  provider?: TranslationProvider;
  model?: string;
  temperature?: number;
  maxRetries?: number;
  marker?: string;
  logger?: Logger;
}

const translationSchema = z.object({
  translation: z
    .string()
    .describe("The translated text, sentence for sentence, markers preserved"),
});

const buildSystemPrompt = (
  context: TranslatorContext,
  marker: string
): string => `You are a professional subtitle translator. Translate the user's text from ${context.sourceLanguage} into ${context.targetLanguage}.

Guidelines:
- Translate sentence for sentence: the input has ${context.batch.sentences.length} sentence(s) and the translation must have the same number, in the same order.
- End every sentence with ., ? or ! and do not merge or split sentences.
- Text wrapped in ${marker} (for example ${marker}Docker${marker}) is a protected term: copy it unchanged, including both ${marker} characters.
- Keep translations concise and natural for spoken dialogue.
- Output only the translation; no notes, quotes or speaker names that are not in the input.`;

/**
 * Creates a Translator backed by an LLM through the `ai` SDK. Request
 * retries are left to the SDK (`maxRetries`).
 */
export const createLlmTranslator = (
  options: LlmTranslatorOptions = {}
): Translator => {
  const {
    provider = TRANSLATION_PROVIDER,
    model = TRANSLATION_MODEL ?? DEFAULT_TRANSLATION_MODELS[provider],
    temperature = 0.2,
    maxRetries = 2,
    marker = PROTECTION_MARKER,
    logger = console,
    apiKey,
    baseURL,
  } = options;

  return async (text, context) => {
    if (!text.trim()) {
      return "";
    }

    const client = createLanguageModel(provider, model, { apiKey, baseURL });

    logger.log("[Translate Request]", {
      provider,
      model,
      sourceLanguage: context.sourceLanguage,
      targetLanguage: context.targetLanguage,
      startOffset: context.batch.startOffset,
      sentenceCount: context.batch.sentences.length,
      timestamp: new Date().toISOString(),
    });

    try {
      const { object } = await generateObject({
        model: client,
        schema: translationSchema,
        system: buildSystemPrompt(context, marker),
        prompt: text,
        temperature,
        maxRetries,
      });

      const translation = object.translation.trim();

      logger.log("[Translate Response]", {
        success: true,
        startOffset: context.batch.startOffset,
        characters: translation.length,
        timestamp: new Date().toISOString(),
      });

      return translation;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : "Unknown translation error";

      logger.error("[Translate Error]", {
        error: errorMessage,
        model,
        startOffset: context.batch.startOffset,
        timestamp: new Date().toISOString(),
      });

      throw error;
    }
  };
};
