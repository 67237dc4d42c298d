import { useQuery } from "@tanstack/react-query";
import type { AgentSummary } from "@foundry-console/types";
import { useApi } from "@/api/api-provider";

export const AGENTS_QUERY_KEY = ["agents"] as const;
export const SESSION_QUERY_KEY = ["session"] as const;

export const agentFilesQueryKey = (agentId: string) =>
  ["agent-files", agentId] as const;

export function useAgentsQuery() {
  const api = useApi();
  return useQuery({
    queryKey: AGENTS_QUERY_KEY,
    queryFn: () => api.http.agents.list(),
  });
}

export function useAgentFilesQuery(agentId: string | undefined) {
  const api = useApi();
  return useQuery({
    queryKey: agentFilesQueryKey(agentId ?? ""),
    queryFn: () => (agentId ? api.http.files.list(agentId) : Promise.resolve([])),
    enabled: Boolean(agentId),
  });
}

export function useSessionQuery() {
  const api = useApi();
  return useQuery({
    queryKey: SESSION_QUERY_KEY,
    queryFn: () => api.http.session.get(),
  });
}

/** The selected agent while it is still listed, otherwise the first one. */
export function resolveActiveAgentId(
  agents: readonly AgentSummary[],
  selectedAgentId: string | undefined,
): string | undefined {
  if (selectedAgentId && agents.some((agent) => agent.id === selectedAgentId)) {
    return selectedAgentId;
  }
  return agents[0]?.id;
}

export function describeError(error: unknown): string {
  return error instanceof Error && error.message ? error.message : String(error);
}
