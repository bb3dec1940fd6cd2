import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@rentwatch/shared-utils": path.resolve(__dirname, "shared-utils/src/index.ts"),
    },
  },
  test: {
    include: ["shared-utils/tests/**/*.test.ts", "listing-watcher/tests/**/*.test.ts"],
    environment: "node",
  },
});
