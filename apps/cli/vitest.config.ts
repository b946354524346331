import { defineConfig } from "vitest/config";
import { sharedConfig } from "@srt-realign/vitest-config";

export default defineConfig({
  ...sharedConfig,
  test: {
    ...sharedConfig.test,
    // Run CLI tests in a Node environment
    environment: "node",
  },
});
