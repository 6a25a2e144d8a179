import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@refold/type-system",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
