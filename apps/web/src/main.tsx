import React from "react";
import ReactDOM from "react-dom/client";
import { QueryClient, QueryClientProvider } from "@tanstack/react-query";
import { Theme } from "@radix-ui/themes";
import { ApiProvider } from "./api/api-provider";
import { ConsolePage } from "./console/ConsolePage";
import "@radix-ui/themes/styles.css";
import "./styles/global.css";

const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      refetchOnWindowFocus: false,
      staleTime: 30_000,
    },
  },
});

const container = document.getElementById("root");
if (!container) {
  throw new Error("Missing #root element");
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <QueryClientProvider client={queryClient}>
      <ApiProvider>
        <Theme appearance="dark" accentColor="iris" radius="large">
          <ConsolePage />
        </Theme>
      </ApiProvider>
    </QueryClientProvider>
  </React.StrictMode>
);
