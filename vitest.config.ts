import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      DATABASE_URL: "postgres://localhost:5432/run_coach_test",
    },
  },
});
