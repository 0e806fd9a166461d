import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // The runtime echoes diagnostics through console; keep test output quiet.
    silent: true,
    include: ["src/test/ts/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
