import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["clauselens-*/tests/**/*.test.ts"],
    environment: "node",
  },
});
