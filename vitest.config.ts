import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["*.test.ts", "examples/**/*.test.ts"],
    environment: "node",
  },
});
