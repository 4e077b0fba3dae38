import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["workers/src/**/*.test.ts"],
    environment: "node",
  },
});
