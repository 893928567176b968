// vitest.config.ts (workspace root)
import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@flock/shared": path.resolve(process.cwd(), "backend/services/shared/src"),
    },
  },
  test: {
    environment: "node",
    reporters: ["default"],
    include: ["backend/services/**/test/**/*.spec.ts"],
    setupFiles: ["backend/services/flock/test/setup.ts"],
    testTimeout: 10_000,
  },
});
