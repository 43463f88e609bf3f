import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["astro/**/__tests__/**/*.test.ts", "crew_vedic/**/__tests__/**/*.test.ts"],
  },
});
