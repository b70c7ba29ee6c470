import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@fingerprint-bridge/core": path.resolve(
        __dirname,
        "packages/core/src/index.ts"
      ),
      "@fingerprint-bridge/capture": path.resolve(
        __dirname,
        "packages/capture/src/index.ts"
      )
    }
  },
  test: {
    include: ["packages/**/__tests__/**/*.test.ts", "apps/**/__tests__/**/*.test.ts"]
  }
});
