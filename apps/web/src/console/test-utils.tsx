import type { ReactElement } from "react";
import { render, type RenderResult } from "@testing-library/react";
import { QueryClient, QueryClientProvider } from "@tanstack/react-query";
import { Theme } from "@radix-ui/themes";
import { vi } from "vitest";
import type { ApiClient } from "@foundry-console/api-client";

export function createApiMock() {
  return {
    sessionId: "test-session",
    http: {
      agents: {
        list: vi.fn().mockResolvedValue([
          { id: "asst_orchestrator", label: "Orchestrator" },
          { id: "asst_analyst", label: "Analyst" },
        ]),
      },
      files: {
        list: vi.fn().mockResolvedValue([]),
        upload: vi.fn(),
        delete: vi.fn(),
      },
      threads: {
        create: vi.fn(),
      },
      runs: {
        submit: vi.fn(),
      },
      session: {
        get: vi.fn().mockResolvedValue({
          sessionId: "test-session",
          threadId: null,
          lastUploadedFileId: null,
          logs: [],
        }),
      },
    },
  } satisfies ApiClient;
}

export type ApiMock = ReturnType<typeof createApiMock>;

export function renderWithProviders(element: ReactElement): RenderResult & { client: QueryClient } {
  const client = new QueryClient({
    defaultOptions: { queries: { retry: false }, mutations: { retry: false } },
  });
  const result = render(
    <QueryClientProvider client={client}>
      <Theme>{element}</Theme>
    </QueryClientProvider>,
  );
  return { ...result, client };
}
