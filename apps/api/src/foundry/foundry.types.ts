import type { RunStatus } from "@foundry-console/types";

/** Wire shapes of the Foundry Agents REST surface (assistants-compatible). */

export interface FoundryTool {
  type: string;
  [key: string]: unknown;
}

export interface FoundryToolResources {
  code_interpreter?: { file_ids?: string[] };
  [key: string]: unknown;
}

export interface FoundryAgent {
  id: string;
  name?: string | null;
  tools?: FoundryTool[];
  tool_resources?: FoundryToolResources | null;
}

export interface FoundryList<T> {
  data: T[];
  has_more?: boolean;
  first_id?: string | null;
  last_id?: string | null;
}

export interface FoundryFile {
  id: string;
  filename?: string | null;
  bytes?: number | null;
  purpose?: string;
}

export interface FoundryDeletion {
  id: string;
  deleted: boolean;
}

export interface FoundryThread {
  id: string;
}

export interface FoundryMessageAttachment {
  file_id: string;
  tools: FoundryTool[];
}

/** Only `type: "text"` parts carry `text`; images and file citations do not. */
export interface FoundryMessageContent {
  type: string;
  text?: { value?: string | null; annotations?: unknown[] };
}

export interface FoundryMessage {
  id: string;
  role: "user" | "assistant" | (string & {});
  content?: FoundryMessageContent[] | null;
  run_id?: string | null;
}

export interface CreateMessageInput {
  role: "user";
  content: string;
  attachments?: FoundryMessageAttachment[];
}

export interface FoundryRun {
  id: string;
  thread_id?: string;
  status: RunStatus;
}

export interface UpdateAgentInput {
  tools: FoundryTool[];
  tool_resources: FoundryToolResources;
}

export interface UploadFileInput {
  filename: string;
  bytes: Uint8Array;
  purpose?: string;
}

export interface ListMessagesOptions {
  runId?: string;
  order?: "asc" | "desc";
  limit?: number;
}

export const CODE_INTERPRETER_TOOL: FoundryTool = { type: "code_interpreter" };
