import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["server/**/*.test.{ts,tsx}", "src/**/*.test.{ts,tsx}"],
    setupFiles: ["src/test-setup.ts"],
    // React 19 only exports `act` from its development build.
    env: { NODE_ENV: "test" },
  },
});
