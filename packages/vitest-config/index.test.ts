import { describe, expect, it } from "vitest";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { sharedConfig } from "@srt-realign/vitest-config";

const packageDir = path.dirname(fileURLToPath(import.meta.url));

describe("shared vitest config", () => {
  it("runs tests in a node environment", () => {
    expect(sharedConfig.test.environment).toBe("node");
  });

  it("resolves to a JavaScript entry Node can load without a build", async () => {
    const manifest: unknown = JSON.parse(
      await fs.readFile(path.join(packageDir, "package.json"), "utf8")
    );
    const entry =
      typeof manifest === "object" && manifest !== null && "main" in manifest
        ? manifest.main
        : undefined;

    expect(entry).toBe("./index.js");
    await expect(fs.access(path.join(packageDir, "index.js"))).resolves.toBeUndefined();
  });
});
