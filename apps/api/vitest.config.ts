import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const workspaceRoot = path.resolve(
  fileURLToPath(new URL(".", import.meta.url)),
  "..",
  ".."
);

const packageDirectoryMap = {
  config: path.join("core", "config"),
  io: path.join("runtime", "io"),
  types: path.join("core", "types"),
} as const;

const packageAliases = Object.entries(packageDirectoryMap).map(([name, relativeDir]) => ({
  find: `@foundry-console/${name}`,
  replacement: path.resolve(workspaceRoot, "platform", relativeDir, "src", "index.ts"),
}));

export default defineConfig({
  resolve: {
    alias: packageAliases,
  },
  esbuild: {
    tsconfigRaw: {
      compilerOptions: {
        experimentalDecorators: true,
        useDefineForClassFields: false,
      },
    },
  },
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
  },
});
