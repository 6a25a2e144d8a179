import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@refold/schemes",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
