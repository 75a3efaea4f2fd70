import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "#logging.js": fileURLToPath(new URL("./server/src/logging.ts", import.meta.url)),
    },
  },
  test: {
    include: ["shared/**/*.test.ts", "server/src/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    environment: "node",
  },
});
