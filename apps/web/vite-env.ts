import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { loadEnv } from "vite";

function findRepoRoot(workspaceRoot: string): string {
  let candidate = dirname(workspaceRoot);

  while (candidate !== dirname(candidate)) {
    if (existsSync(join(candidate, "package.json"))) {
      return candidate;
    }

    candidate = dirname(candidate);
  }

  return existsSync(join(candidate, "package.json")) ? candidate : workspaceRoot;
}

/**
 * Reads `.env` files from the repository root (shared with the API) and from
 * the web workspace. Workspace values win.
 */
export function loadWorkspaceEnv(mode: string, workspaceRoot: string): Record<string, string> {
  const repoRoot = findRepoRoot(workspaceRoot);
  const rootEnv = loadEnv(mode, repoRoot, "VITE_");
  const workspaceEnv = loadEnv(mode, workspaceRoot, "VITE_");

  return { ...rootEnv, ...workspaceEnv };
}
