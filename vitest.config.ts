import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["slc-cli/**/*.test.ts"],
    environment: "node",
  },
});
