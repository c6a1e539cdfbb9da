import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Suppress the diagnostics the reporter echoes to stdout/stderr.
    silent: true,
    include: ["src/test/ts/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
