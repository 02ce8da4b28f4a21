import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "price-feed",
    include: ["tests/**/*.test.ts"],
  },
});
