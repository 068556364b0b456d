import { fileURLToPath } from "node:url";

import { defineConfig, defineProject } from "vitest/config";

const rootDir = fileURLToPath(new URL(".", import.meta.url));

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

// Workspace packages resolve to their sources so tests need no build first
const aliases = [
  {
    find: "@linebuf/core",
    replacement: fileURLToPath(new URL("packages/core/src/index.ts", import.meta.url)),
  },
];

export default defineConfig({
  root: rootDir,
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: defaultExclude,
    projects: [
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "core",
          include: ["packages/core/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "cli",
          include: ["packages/cli/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
    ],
  },
});
