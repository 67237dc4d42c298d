export const SESSION_STORAGE_KEY = "foundry-console.session";

interface EnvironmentConfig {
  apiUrl: string;
}

function readEnv(): EnvironmentConfig {
  return {
    apiUrl: import.meta.env.VITE_API_URL ?? "/api",
  };
}

export const env = readEnv();

/**
 * Returns this tab's console session id, creating one on first use. Session
 * storage is per tab, so two tabs work on separate threads.
 */
export function resolveSessionId(
  storage: Pick<Storage, "getItem" | "setItem">,
  createId: () => string = () => crypto.randomUUID(),
): string {
  const existing = storage.getItem(SESSION_STORAGE_KEY);
  if (existing) {
    return existing;
  }

  const created = createId();
  storage.setItem(SESSION_STORAGE_KEY, created);
  return created;
}
