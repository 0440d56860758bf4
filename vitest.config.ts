import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@netpulse/shared/errors": fromRoot("./packages/shared/src/errors/index.ts"),
      "@netpulse/shared/middleware": fromRoot("./packages/shared/src/middleware/index.ts"),
      "@netpulse/shared/utils": fromRoot("./packages/shared/src/utils/index.ts"),
      "@netpulse/shared/db": fromRoot("./packages/shared/src/db/index.ts"),
      "@netpulse/monitor": fromRoot("./packages/monitor/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/src/**/*.test.ts", "scripts/src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.test.ts",
        "**/index.ts",
        "**/types.ts",
      ],
    },
    testTimeout: 15000,
    hookTimeout: 10000,
    pool: "forks",
    fileParallelism: true,
  },
});
