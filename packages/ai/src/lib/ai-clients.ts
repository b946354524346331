import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";

export type TranslationProvider = "openai" | "google";

export interface ClientSettings {
  apiKey?: string;
  baseURL?: string;
}

// Create OpenAI client
export const createOpenAIClient = (settings: ClientSettings = {}) =>
  createOpenAI({
    baseURL: settings.baseURL ?? process.env.OPENAI_BASE_URL,
    apiKey: settings.apiKey ?? process.env.OPENAI_API_KEY,
  });

// Create Google AI client
export const createGeminiClient = (settings: ClientSettings = {}) =>
  createGoogleGenerativeAI({
    apiKey: settings.apiKey ?? process.env.GOOGLE_GENERATIVE_AI_API_KEY,
  });

export const createLanguageModel = (
  provider: TranslationProvider,
  modelId: string,
  settings: ClientSettings = {}
): LanguageModel =>
  provider === "openai"
    ? createOpenAIClient(settings)(modelId)
    : createGeminiClient(settings)(modelId);
