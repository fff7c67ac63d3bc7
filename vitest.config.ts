import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const isCI = process.env.CI === "1" || process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "geogrid-model": fileURLToPath(new URL("./model/src/index.ts", import.meta.url)),
      "geogrid-engine": fileURLToPath(new URL("./engine/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["model/tests/**/*.test.ts", "engine/tests/**/*.test.ts"],
    pool: isCI ? "forks" : "threads",
    poolOptions: {
      threads: {
        singleThread: isCI,
      },
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
    slowTestThreshold: isCI ? 2000 : 1000,
  },
});
