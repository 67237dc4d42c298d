import { defineConfig } from "vite";
import react from "@vitejs/plugin-react-swc";
import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { loadWorkspaceEnv } from "./vite-env";

const rootDir = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig(({ mode }) => {
  const env = loadWorkspaceEnv(mode, rootDir);
  const devApiTarget = env.VITE_DEV_API_TARGET ?? "http://localhost:3000";

  return {
    plugins: [react()],
    resolve: {
      alias: [
        { find: "@", replacement: resolve(rootDir, "src") },
        {
          find: "@foundry-console/types",
          replacement: resolve(rootDir, "../../platform/core/types/src/index.ts"),
        },
        {
          find: "@foundry-console/api-client",
          replacement: resolve(rootDir, "../../platform/integrations/api-client/src/index.ts"),
        },
      ],
    },
    server: {
      host: "0.0.0.0",
      proxy: {
        "/api": {
          target: devApiTarget,
          changeOrigin: true,
          rewrite: (path) => path.replace(/^\/api/u, ""),
        },
      },
    },
  };
});
