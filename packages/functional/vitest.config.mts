import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "functional",
    globals: true,
    include: ["src/**/*.test.mts"],
  },
});
