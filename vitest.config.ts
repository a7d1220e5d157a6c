import { fileURLToPath } from "node:url";

import { defineConfig, defineProject } from "vitest/config";

const rootDir = fileURLToPath(new URL(".", import.meta.url));

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

// Workspace packages resolve to their sources so tests need no build
const aliases = [
  {
    find: "@status-hud/shared",
    replacement: `${rootDir}packages/shared/src/index.ts`,
  },
  {
    find: "@status-hud/overlay",
    replacement: `${rootDir}packages/overlay/src/index.ts`,
  },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    projects: [
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "shared",
          include: ["packages/shared/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "overlay",
          include: ["packages/overlay/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
    ],
  },
});
