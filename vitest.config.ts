import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@ferry/core": workspace("./packages/core/src/index.ts"),
      "@ferry/tui": workspace("./apps/tui/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/__tests__/**/*.test.ts"]
  }
});
