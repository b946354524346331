import path from "path";
import { z } from "zod";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

const languageCode = z
  .string()
  .trim()
  .regex(/^[a-z]{2,3}(-[A-Za-z]{2,4})?$/, "Expected a language code such as en or pt-BR");

const positiveInt = z.coerce.number().int().positive();

export const realignConfigSchema = z.object({
  input: z.string().min(1, "Input file is required"),
  output: z.string().min(1).optional(),
  sourceLanguage: languageCode.default("en"),
  targetLanguage: languageCode.default("hu"),
  engine: z.enum(["llm", "argos"]).default("llm"),
  provider: z.enum(["openai", "google"]).default("google"),
  model: z.string().min(1).optional(),
  maxSentencesPerBatch: positiveInt.default(5),
  maxCharsPerBatch: positiveInt.default(512),
  maxCharsPerLine: positiveInt.default(65),
  wrap: z.enum(["balanced", "greedy"]).default("balanced"),
  segmenter: z.enum(["sentence", "clause"]).default("sentence"),
  termsFile: z.string().min(1).optional(),
  renumber: z.boolean().default(false),
  quiet: z.boolean().default(false),
  python: z.string().min(1).default("python3"),
});

export type RealignConfig = z.infer<typeof realignConfigSchema>;

export const installModelConfigSchema = z.object({
  sourceLanguage: languageCode.default("en"),
  targetLanguage: languageCode.default("hu"),
  url: z.string().url().optional(),
  python: z.string().min(1).default("python3"),
});

export type InstallModelConfig = z.infer<typeof installModelConfigSchema>;

/** Flags as commander hands them over. */
export type CliFlags = Record<string, unknown>;

type Env = Record<string, string | undefined>;

// Empty env values count as unset
const fromEnv = (env: Env, key: string) => env[key] || undefined;

const parseConfig = <T extends z.ZodTypeAny>(schema: T, candidate: unknown): z.infer<T> => {
  const result = schema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
      )
    );
  }
  return result.data;
};

export const loadRealignConfig = (
  flags: CliFlags,
  env: Env = process.env
): RealignConfig =>
  parseConfig(realignConfigSchema, {
    input: flags.input,
    output: flags.output,
    sourceLanguage: flags.from ?? fromEnv(env, "SOURCE_LANGUAGE"),
    targetLanguage: flags.to ?? fromEnv(env, "TARGET_LANGUAGE"),
    engine: flags.engine ?? fromEnv(env, "TRANSLATION_ENGINE"),
    provider: flags.provider ?? fromEnv(env, "TRANSLATION_PROVIDER"),
    model: flags.model ?? fromEnv(env, "TRANSLATION_MODEL"),
    maxSentencesPerBatch: flags.maxSentences,
    maxCharsPerBatch: flags.maxChars,
    maxCharsPerLine: flags.lineLength,
    wrap: flags.wrap,
    segmenter: flags.segmenter,
    termsFile: flags.terms,
    renumber: flags.renumber,
    quiet: flags.quiet,
    python: flags.python ?? fromEnv(env, "ARGOS_PYTHON"),
  });

export const loadInstallModelConfig = (
  flags: CliFlags,
  env: Env = process.env
): InstallModelConfig =>
  parseConfig(installModelConfigSchema, {
    sourceLanguage: flags.from ?? fromEnv(env, "SOURCE_LANGUAGE"),
    targetLanguage: flags.to ?? fromEnv(env, "TARGET_LANGUAGE"),
    url: flags.url,
    python: flags.python ?? fromEnv(env, "ARGOS_PYTHON"),
  });

/** `talk.srt` -> `talk.<target>.srt`, beside the input. */
export const defaultOutputPath = (input: string, targetLanguage: string) => {
  const name = path.basename(input, path.extname(input));
  return path.join(path.dirname(input), `${name}.${targetLanguage}.srt`);
};
