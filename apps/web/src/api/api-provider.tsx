import { createContext, useContext, useState, type ReactNode } from "react";
import { createApiClient, type ApiClient } from "@foundry-console/api-client";
import { env, resolveSessionId } from "../config/env";

const ApiContext = createContext<ApiClient | null>(null);

export function ApiProvider({ children }: { children: ReactNode }): JSX.Element {
  const [client] = useState<ApiClient>(() =>
    createApiClient({
      baseUrl: env.apiUrl,
      sessionId: resolveSessionId(window.sessionStorage),
    })
  );

  return <ApiContext.Provider value={client}>{children}</ApiContext.Provider>;
}

export function useApi(): ApiClient {
  const context = useContext(ApiContext);
  if (!context) {
    throw new Error("useApi must be used within ApiProvider");
  }
  return context;
}
