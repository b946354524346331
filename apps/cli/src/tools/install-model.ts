import { ensureModelInstalled } from "@srt-realign/core";
import type { Logger } from "@srt-realign/core";
import type { InstallModelConfig } from "../config";
import { argosModelUrl, createArgosProvisioner } from "../lib/argos";
import { downloadFile } from "../lib/download";

export const installModel = async (
  config: InstallModelConfig,
  logger: Logger = console
): Promise<boolean> => {
  const { sourceLanguage, targetLanguage, python } = config;

  return ensureModelInstalled(createArgosProvisioner({ python }), {
    sourceLanguage,
    targetLanguage,
    modelUrl: config.url ?? argosModelUrl(sourceLanguage, targetLanguage),
    download: downloadFile,
    logger,
  });
};
