import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    setupFiles: ["./packages/core/src/test-setup.ts"],
    environment: "node",
  },
})
