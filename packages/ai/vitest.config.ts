import { defineConfig } from "vitest/config";
import { sharedConfig } from "@srt-realign/vitest-config";

export default defineConfig({
  ...sharedConfig,
  test: {
    ...sharedConfig.test,
    // Package-specific overrides if needed
  },
});
