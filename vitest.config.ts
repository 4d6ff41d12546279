import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const WORKSPACE_PACKAGES = ["types", "ledger", "processor", "csv", "cli"] as const;

// Tests run against package sources; dist/ only exists after a build.
const alias = Object.fromEntries(
  WORKSPACE_PACKAGES.map((name) => [
    `@clearledger/${name}`,
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
  ]),
);

export default defineConfig({
  resolve: { alias },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts", "packages/cli/src/main.ts"],
      thresholds: {
        statements: 90,
        branches: 80,
        functions: 90,
        lines: 90,
      },
    },
  },
});
