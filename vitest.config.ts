import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["packages/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "packages/*/src/**/*.test.ts",
        "packages/*/src/testing/**", // test fixtures
        "packages/*/src/**/index.ts", // barrel re-exports
        "packages/core/src/types/*.ts", // type-only
        "packages/cli/src/cli/bin.ts", // entry-point shim
        "**/dist/**",
      ],
    },
  },
});
