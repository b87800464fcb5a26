import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["nekomaid/tests/**/*.test.ts"],
    environment: "node",
  },
});
