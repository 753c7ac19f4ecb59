import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    reporters: "default",
    env: {
      NODE_ENV: "test",
    },
  },
});
