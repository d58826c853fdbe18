import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["workflows/**/*.test.ts"],
    environment: "node",
  },
});
