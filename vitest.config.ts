import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    environment: "node",
    include: ["__tests__/backend/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    coverage: {
      reporter: ["text", "json", "html"],
      reportsDirectory: "coverage/backend",
      include: ["server/**/*.ts"],
      exclude: ["server/index.ts", "node_modules/**", "__tests__/**"],
      thresholds: {
        lines: 75,
        functions: 75,
        statements: 75,
        branches: 65,
      },
    },
  },
  resolve: {
    alias: [
      {
        find: /^@\/test-utils\//,
        replacement: fileURLToPath(new URL("./test/utils/", import.meta.url)),
      },
      {
        find: /^@\/test-mocks\//,
        replacement: fileURLToPath(new URL("./test/mocks/", import.meta.url)),
      },
      {
        find: /^@\/server\//,
        replacement: fileURLToPath(new URL("./server/", import.meta.url)),
      },
    ],
  },
});
