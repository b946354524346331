import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ensureModelInstalled } from "./ensure-model";
import type { ModelProvisioner } from "./ensure-model";

const silentLogger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
const MODEL_URL = "https://models.example.test/v1/translate-en_hu-1_9.argosmodel";

describe("ensureModelInstalled", () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "ensure-model-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const createProvisioner = (installed: boolean) => {
    const seenArtifacts: string[] = [];
    const provisioner: ModelProvisioner = {
      isInstalled: vi.fn(async () => installed),
      installFrom: vi.fn(async (artifactPath: string) => {
        seenArtifacts.push(await fs.readFile(artifactPath, "utf8"));
      }),
    };
    return { provisioner, seenArtifacts };
  };

  it("does nothing when the model is already installed", async () => {
    const { provisioner } = createProvisioner(true);
    const download = vi.fn(async () => {});

    const installed = await ensureModelInstalled(provisioner, {
      sourceLanguage: "en",
      targetLanguage: "hu",
      modelUrl: MODEL_URL,
      download,
      tempDir,
      logger: silentLogger,
    });

    expect(installed).toBe(false);
    expect(provisioner.isInstalled).toHaveBeenCalledWith("en", "hu");
    expect(download).not.toHaveBeenCalled();
    expect(provisioner.installFrom).not.toHaveBeenCalled();
  });

  it("downloads, installs and removes the artifact", async () => {
    const { provisioner, seenArtifacts } = createProvisioner(false);
    const download = vi.fn(async (_url: string, destination: string) => {
      await fs.writeFile(destination, "model-bytes");
    });

    const installed = await ensureModelInstalled(provisioner, {
      sourceLanguage: "en",
      targetLanguage: "hu",
      modelUrl: MODEL_URL,
      download,
      tempDir,
      logger: silentLogger,
    });

    expect(installed).toBe(true);
    expect(download).toHaveBeenCalledWith(
      MODEL_URL,
      expect.stringMatching(/translate-en_hu-1_9\.argosmodel$/)
    );
    expect(seenArtifacts).toEqual(["model-bytes"]);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("removes the artifact when installation fails", async () => {
    const provisioner: ModelProvisioner = {
      isInstalled: async () => false,
      installFrom: async () => {
        throw new Error("corrupt package");
      },
    };

    await expect(
      ensureModelInstalled(provisioner, {
        sourceLanguage: "en",
        targetLanguage: "hu",
        modelUrl: MODEL_URL,
        download: async (_url, destination) => {
          await fs.writeFile(destination, "partial");
        },
        tempDir,
        logger: silentLogger,
      })
    ).rejects.toThrow("corrupt package");
    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
