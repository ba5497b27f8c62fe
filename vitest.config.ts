import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["clip-miner/src/**/*.test.ts"],
    environment: "node",
  },
});
