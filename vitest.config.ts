import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "1" || process.env.CI === "true";
const pool = process.env.VITEST_POOL ?? (isCI ? "forks" : "threads");

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "grid-props-engine": fromRoot("./engine/src/index.ts"),
      "grid-props-registry": fromRoot("./registry/src/index.ts"),
      "grid-props-units": fromRoot("./units/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["units/tests/**/*.test.ts", "registry/tests/**/*.test.ts", "engine/tests/**/*.test.ts", "tests/**/*.test.ts"],
    pool,
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
