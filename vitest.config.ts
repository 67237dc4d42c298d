import { defineConfig } from "vitest/config";

const workspaceProjects = [
  ["./platform/core/types/vitest.config.ts", "./platform/core/types"],
  ["./platform/core/config/vitest.config.ts", "./platform/core/config"],
  ["./platform/runtime/io/vitest.config.ts", "./platform/runtime/io"],
  [
    "./platform/integrations/api-client/vitest.config.ts",
    "./platform/integrations/api-client",
  ],
  ["./apps/api/vitest.config.ts", "./apps/api"],
  ["./apps/web/vitest.config.ts", "./apps/web"],
] as const;

export default defineConfig({
  test: {
    projects: workspaceProjects.map(([configPath, root]) => ({
      root,
      extends: configPath,
    })),
  },
});
