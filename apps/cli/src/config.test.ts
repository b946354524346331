import { describe, expect, it } from "vitest";
import path from "path";
import {
  ConfigError,
  defaultOutputPath,
  loadInstallModelConfig,
  loadRealignConfig,
} from "./config";

describe("loadRealignConfig", () => {
  it("applies defaults when only the input is given", () => {
    expect(loadRealignConfig({ input: "talk.srt" }, {})).toEqual({
      input: "talk.srt",
      sourceLanguage: "en",
      targetLanguage: "hu",
      engine: "llm",
      provider: "google",
      maxSentencesPerBatch: 5,
      maxCharsPerBatch: 512,
      maxCharsPerLine: 65,
      wrap: "balanced",
      segmenter: "sentence",
      renumber: false,
      quiet: false,
      python: "python3",
    });
  });

  it("reads languages, provider and interpreter from the environment", () => {
    const config = loadRealignConfig(
      { input: "talk.srt" },
      {
        SOURCE_LANGUAGE: "de",
        TARGET_LANGUAGE: "fr",
        TRANSLATION_PROVIDER: "openai",
        TRANSLATION_MODEL: "gpt-4o",
        ARGOS_PYTHON: "/opt/venv/bin/python",
      }
    );

    expect(config.sourceLanguage).toBe("de");
    expect(config.targetLanguage).toBe("fr");
    expect(config.provider).toBe("openai");
    expect(config.model).toBe("gpt-4o");
    expect(config.python).toBe("/opt/venv/bin/python");
  });

  it("lets flags override the environment and coerces numeric flags", () => {
    const config = loadRealignConfig(
      {
        input: "talk.srt",
        from: "en",
        to: "es",
        engine: "argos",
        maxSentences: "3",
        maxChars: "200",
        lineLength: "42",
        wrap: "greedy",
        segmenter: "clause",
        terms: "terms.json",
        renumber: true,
      },
      { TARGET_LANGUAGE: "fr", SOURCE_LANGUAGE: "" }
    );

    expect(config).toMatchObject({
      sourceLanguage: "en",
      targetLanguage: "es",
      engine: "argos",
      maxSentencesPerBatch: 3,
      maxCharsPerBatch: 200,
      maxCharsPerLine: 42,
      wrap: "greedy",
      segmenter: "clause",
      termsFile: "terms.json",
      renumber: true,
    });
  });

  it("treats empty environment values as unset", () => {
    const config = loadRealignConfig(
      { input: "talk.srt" },
      { SOURCE_LANGUAGE: "", TRANSLATION_MODEL: "" }
    );

    expect(config.sourceLanguage).toBe("en");
    expect(config.model).toBeUndefined();
  });

  it("collects every invalid field into one ConfigError", () => {
    let caught: unknown;
    try {
      loadRealignConfig(
        { input: "talk.srt", engine: "deepl", maxSentences: "0" },
        {}
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^engine: /);
    expect(issues[1]).toMatch(/^maxSentencesPerBatch: /);
  });

  it("rejects a malformed language code", () => {
    expect(() =>
      loadRealignConfig({ input: "talk.srt", to: "Hungarian" }, {})
    ).toThrow("targetLanguage: Expected a language code such as en or pt-BR");
  });
});

describe("loadInstallModelConfig", () => {
  it("accepts an explicit model URL", () => {
    expect(
      loadInstallModelConfig(
        { from: "en", to: "de", url: "https://models.example/en_de.argosmodel" },
        {}
      )
    ).toEqual({
      sourceLanguage: "en",
      targetLanguage: "de",
      url: "https://models.example/en_de.argosmodel",
      python: "python3",
    });
  });

  it("rejects a URL that does not parse", () => {
    expect(() => loadInstallModelConfig({ url: "not a url" }, {})).toThrow(
      ConfigError
    );
  });
});

describe("defaultOutputPath", () => {
  it("places the translation beside the input", () => {
    expect(defaultOutputPath(path.join("videos", "talk.srt"), "hu")).toBe(
      path.join("videos", "talk.hu.srt")
    );
  });
});
