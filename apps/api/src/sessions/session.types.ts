import type { ActivityLogEntry, AgentSummary } from "@foundry-console/types";

/** Per-browser-tab state. Lives only in the API process. */
export interface SessionState {
  id: string;
  threadId: string | null;
  lastUploadedFileId: string | null;
  agentList: AgentSummary[];
  logs: ActivityLogEntry[];
  lastSeenAt: number;
}
