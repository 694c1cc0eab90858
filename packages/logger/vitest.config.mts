import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "logger",
    globals: true,
    include: ["src/**/*.test.mts"],
  },
});
