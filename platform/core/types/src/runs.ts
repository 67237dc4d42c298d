/**
 * Statuses reported by the agent service for a run. The service may add
 * statuses over time, so unknown strings are carried through untouched.
 */
export type KnownRunStatus =
  | "queued"
  | "in_progress"
  | "requires_action"
  | "cancelling"
  | "completed"
  | "failed"
  | "cancelled"
  | "expired"
  | "incomplete";

export type RunStatus = KnownRunStatus | (string & {});

export const RUN_POLLING_STATUSES: readonly RunStatus[] = [
  "queued",
  "in_progress",
  "requires_action",
];

export function isRunPollingStatus(status: RunStatus): boolean {
  return RUN_POLLING_STATUSES.includes(status);
}

export type RunOutput =
  | { type: "assistant"; text: string }
  | { type: "no-response" };

export interface RunResult {
  threadId: string;
  runId: string;
  status: RunStatus;
  attachedFileId: string | null;
  output: RunOutput;
}

export interface SubmitRunRequest {
  prompt?: string;
}

export interface ThreadSummary {
  threadId: string;
}
