import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Logger } from "../types/translation";

export interface ModelProvisioner {
  isInstalled(sourceLanguage: string, targetLanguage: string): Promise<boolean>;
  installFrom(artifactPath: string): Promise<void>;
}

export type ArtifactDownloader = (url: string, destination: string) => Promise<void>;

export interface EnsureModelOptions {
  sourceLanguage: string;
  targetLanguage: string;
  modelUrl: string;
  download: ArtifactDownloader;
  tempDir?: string;
  logger?: Logger;
}

/**
 * Installs the translation model for a language pair unless it is already
 * present. Safe to call repeatedly; the downloaded artifact is always removed.
 *
 * @returns `true` when a model was installed by this call
 */
export async function ensureModelInstalled(
  provisioner: ModelProvisioner,
  options: EnsureModelOptions
): Promise<boolean> {
  const {
    sourceLanguage,
    targetLanguage,
    modelUrl,
    download,
    tempDir = os.tmpdir(),
    logger = console,
  } = options;

  if (await provisioner.isInstalled(sourceLanguage, targetLanguage)) {
    return false;
  }

  const workDir = await fs.mkdtemp(path.join(tempDir, "srt-realign-model-"));
  const artifactPath = path.join(workDir, path.basename(new URL(modelUrl).pathname) || "model");

  try {
    logger.log("[Model Download]", {
      sourceLanguage,
      targetLanguage,
      url: modelUrl,
      timestamp: new Date().toISOString(),
    });
    await download(modelUrl, artifactPath);
    await provisioner.installFrom(artifactPath);
    logger.log("[Model Installed]", {
      sourceLanguage,
      targetLanguage,
      timestamp: new Date().toISOString(),
    });
    return true;
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
}
