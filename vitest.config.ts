import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 30_000,
    hookTimeout: 30_000,
    unstubEnvs: true,
    pool: "forks",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["./src/**/*.ts"],
      exclude: ["test/**", "src/**/*.test.ts", "src/index.ts"],
    },
  },
});
