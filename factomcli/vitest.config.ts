import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// biome-ignore lint/style/noDefaultExport: vitest expects a default export
export default defineConfig({
  resolve: {
    alias: {
      factomjs: fileURLToPath(new URL("../factomjs/src/index.ts", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    disableConsoleIntercept: true,
    globals: true,
    coverage: {
      reportsDirectory: "./test/coverage",
      provider: "v8",
      reportOnFailure: true,
    },
    reporters: ["verbose"],
  },
});
