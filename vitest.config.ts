import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/*.test.ts", "services/**/*.test.ts", "apps/**/*.test.ts"]
  }
});
