import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "siwb/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
  },
});
