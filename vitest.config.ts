import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // sharp encodes multi-megapixel canvases in the end-to-end tests
    testTimeout: 30000,
  },
});
