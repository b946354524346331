#!/usr/bin/env tsx
import dotenv from "dotenv";
import { Command } from "commander";
import type { Logger } from "@srt-realign/core";
import { loadInstallModelConfig, loadRealignConfig } from "./config";
import { installModel } from "./tools/install-model";
import { realignFile } from "./tools/realign";

dotenv.config();

const createLogger = (quiet: boolean): Logger =>
  quiet
    ? {
        log: () => {},
        warn: console.warn.bind(console),
        error: console.error.bind(console),
      }
    : console;

const program = new Command();

program
  .name("srt-realign")
  .description(
    "Translate subtitle files sentence by sentence while keeping every block and time range"
  )
  .version("0.1.0");

program
  .command("translate")
  .description("Translate an .srt file and realign the result to the source blocks")
  .argument("<input>", "source subtitle file")
  .option("-o, --output <file>", "output file (default: <name>.<to>.srt beside the input)")
  .option("--from <lang>", "source language code")
  .option("--to <lang>", "target language code")
  .option("--engine <engine>", "translation engine: llm or argos")
  .option("--provider <provider>", "LLM provider: openai or google")
  .option("--model <model>", "LLM model id")
  .option("--max-sentences <n>", "sentences per translation request")
  .option("--max-chars <n>", "characters per translation request")
  .option("--line-length <n>", "maximum characters per subtitle line")
  .option("--wrap <strategy>", "line wrapping: balanced or greedy")
  .option("--segmenter <kind>", "sentence or clause segmentation")
  .option("--terms <file>", "JSON array of terms to keep untranslated")
  .option("--python <bin>", "Python interpreter with argostranslate installed")
  .option("--renumber", "write indices 1..n")
  .option("--quiet", "only print warnings and errors")
  .action(async (input: string, flags: Record<string, unknown>) => {
    const config = loadRealignConfig({ ...flags, input });
    const logger = createLogger(config.quiet);

    const { outputPath, summary } = await realignFile(config, logger);

    console.log(
      `Wrote ${summary.outputBlocks} blocks to ${outputPath}` +
        (summary.discrepancy !== 0
          ? ` (sentence discrepancy: ${summary.discrepancy})`
          : "")
    );
  });

program
  .command("install-model")
  .description("Download and install the Argos model for a language pair")
  .option("--from <lang>", "source language code")
  .option("--to <lang>", "target language code")
  .option("--url <url>", "model package URL")
  .option("--python <bin>", "Python interpreter with argostranslate installed")
  .action(async (flags: Record<string, unknown>) => {
    const config = loadInstallModelConfig(flags);
    const installed = await installModel(config);

    console.log(
      installed
        ? `Installed ${config.sourceLanguage} -> ${config.targetLanguage}`
        : `${config.sourceLanguage} -> ${config.targetLanguage} is already installed`
    );
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(
    "Error:",
    error instanceof Error ? error.message : error
  );
  process.exit(1);
});
