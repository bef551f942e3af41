import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
    // pino stays quiet unless LOG_LEVEL is set explicitly
    env: { NODE_ENV: "test" },
  },
});
