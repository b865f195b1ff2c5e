import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@keystone": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    // config-loader tests chdir into a temp directory
    pool: "forks",
    env: {
      KEYSTONE_LOG_LEVEL: "silent",
      KEYSTONE_LOG_CONSOLE_ENABLED: "false",
    },
  },
});
