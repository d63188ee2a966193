import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      JWT_PRIVATE_KEY: "test-secret",
      SALT: "4",
      CLIENT_URL: "http://localhost:5173",
    },
    restoreMocks: true,
  },
});
