import { defineConfig } from "vitest/config";

import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    include: resolveIncludes(),
    exclude: defaultExclude,
    environment: "node",
    testTimeout: 15_000,
    pool: "forks",
  },
});

function resolveIncludes(): string[] {
  const includeEnv = process.env.VITEST_INCLUDE;
  if (includeEnv) {
    const parsed = includeEnv
      .split(",")
      .map((pattern) => pattern.trim())
      .filter(Boolean);
    if (parsed.length > 0) {
      return parsed;
    }
  }

  return ["packages/*/src/**/*.test.ts"];
}
