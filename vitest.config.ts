import { defineConfig } from "vitest/config";
import { sharedConfig } from "@srt-realign/vitest-config";

export default defineConfig({
  ...sharedConfig,
  test: {
    ...sharedConfig.test,
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/*.test.ts",
      "apps/*/src/**/*.test.ts",
    ],
  },
});
