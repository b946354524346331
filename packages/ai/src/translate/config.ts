import type { TranslationProvider } from "../lib";

export const DEFAULT_TRANSLATION_MODELS: Record<TranslationProvider, string> = {
  openai: "gpt-4o-mini",
  google: "gemini-2.5-flash",
};

export const TRANSLATION_PROVIDER: TranslationProvider =
  process.env.TRANSLATION_PROVIDER === "openai" ? "openai" : "google";

// Overrides the per-provider default when set
export const TRANSLATION_MODEL: string | undefined =
  process.env.TRANSLATION_MODEL || undefined;
