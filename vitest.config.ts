import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // esbuild renames parameters that shadow outer bindings (db -> db2), which
  // breaks name-based injection; swc keeps source parameter names.
  plugins: [swc.vite()],
  test: {
    projects: ["core", "http", "telemetry", "types"].map((pkg) => ({
      extends: true,
      root: `packages/${pkg}`,
      test: { name: `@argwire/${pkg}` },
    })),
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/index.ts", "packages/types/**"],
      thresholds: process.env.CI
        ? {
            functions: 85,
            branches: 80,
            lines: 85,
            statements: 85,
          }
        : undefined,
    },
  },
});
