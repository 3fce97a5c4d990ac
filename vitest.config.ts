import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["formatter/test/**/*.test.ts"],
  },
});
