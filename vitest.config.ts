import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolvePath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@seigniorage/shared": resolvePath("./packages/shared/src/index.ts"),
      "@seigniorage/treasury": resolvePath("./services/treasury/src/index.ts"),
      "@seigniorage/reward-pool": resolvePath("./services/reward-pool/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "services/*/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
  },
});
