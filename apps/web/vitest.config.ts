import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import { resolve } from "node:path";

const workspaceRoot = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": resolve(workspaceRoot, "src"),
      "@foundry-console/types": resolve(workspaceRoot, "../../platform/core/types/src/index.ts"),
      "@foundry-console/api-client": resolve(
        workspaceRoot,
        "../../platform/integrations/api-client/src/index.ts",
      ),
    },
  },
  test: {
    environment: "jsdom",
    // vite-env.ts is a Node-side helper for vite.config.ts: transform it for
    // Node so its node: imports are not replaced by browser externals.
    testTransformMode: { ssr: ["**/vite-env.test.ts"] },
    setupFiles: ["./vitest.setup.ts"],
    include: ["src/**/*.test.{ts,tsx}", "*.test.ts"],
    pool: "forks",
    css: false,
  },
});
