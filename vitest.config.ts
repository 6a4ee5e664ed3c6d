import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.{test,spec}.{js,ts}"],
    env: {
      LOG_LEVEL: "error",
    },
  },
});
