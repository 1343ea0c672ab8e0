import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["agents/**/src/__tests__/**/*.test.ts"],
    environment: "node"
  }
});
