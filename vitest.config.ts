import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["deployctl/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
  },
});
