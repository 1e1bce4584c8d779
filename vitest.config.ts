import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["server/src/**/*.test.ts"],
    setupFiles: ["server/src/__tests__/setup.ts"],
    environment: "node",
  },
});
