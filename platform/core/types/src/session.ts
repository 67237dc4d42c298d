export const SESSION_HEADER = "x-console-session";

export type ActivityLogLevel = "info" | "warn" | "error";

export interface ActivityLogEntry {
  id: string;
  level: ActivityLogLevel;
  message: string;
  createdAt: string;
}

export interface SessionSnapshot {
  sessionId: string;
  threadId: string | null;
  lastUploadedFileId: string | null;
  logs: ActivityLogEntry[];
}
