import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const testsDir = fileURLToPath(new URL("./tests", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Test-only helpers (supports @tests and @tests/*)
      { find: /^@tests$/, replacement: testsDir },
      { find: /^@tests\//, replacement: testsDir + "/" },
    ],
  },
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
  },
});
