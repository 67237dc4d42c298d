import type { ConsoleSettings } from "@foundry-console/config";
import type { Logger } from "pino";
import { vi } from "vitest";
import type { FoundryClient } from "../../../src/foundry/foundry.client";
import type {
  FoundryAgent,
  FoundryFile,
  FoundryMessage,
  FoundryRun,
} from "../../../src/foundry/foundry.types";
import { SessionStore } from "../../../src/sessions/session.store";

export const createSettings = (overrides: Partial<ConsoleSettings> = {}): ConsoleSettings => ({
  projectEndpoint: "https://foundry.test/api/projects/demo",
  orchestratorAgentId: "asst_orchestrator",
  foundry: {
    apiVersion: "v1",
    tokenScope: "https://ai.azure.com/.default",
    requestTimeoutMs: 1_000,
  },
  runs: { pollIntervalMs: 2_000, pollTimeoutMs: 600_000 },
  agents: { listCacheTtlSeconds: 60 },
  sessions: { idleTtlMinutes: 120 },
  logging: { level: "silent" },
  api: {
    port: 3_000,
    host: "127.0.0.1",
    cors: { origin: true },
    exposeErrorStack: false,
  },
  ...overrides,
});

export type LoggerMock = {
  [K in "trace" | "debug" | "info" | "warn" | "error" | "fatal"]: ReturnType<typeof vi.fn>;
};

export const createLogger = (): LoggerMock & Logger => {
  const logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };
  return logger as unknown as LoggerMock & Logger;
};

export const createSessionStore = (settings = createSettings()) =>
  new SessionStore(settings, createLogger());

/**
 * In-memory stand-in for the Foundry project. Methods are spies so tests can
 * inject failures with `mockRejectedValueOnce`.
 */
export class FakeFoundry {
  readonly agents = new Map<string, FoundryAgent>();
  readonly files = new Map<string, FoundryFile>();
  readonly messages: FoundryMessage[] = [];
  private nextId = 1;

  runStatuses: string[] = ["completed"];
  private runStatusIndex = 0;

  listAgents = vi.fn(async (): Promise<FoundryAgent[]> => [...this.agents.values()]);

  getAgent = vi.fn(async (agentId: string): Promise<FoundryAgent> => {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new Error(`agent ${agentId} not found`);
    }
    return structuredClone(agent);
  });

  setCodeInterpreterFileIds = vi.fn(
    async (agentId: string, fileIds: string[]): Promise<FoundryAgent> => {
      const agent = await this.getAgent(agentId);
      const updated: FoundryAgent = {
        ...agent,
        tool_resources: { code_interpreter: { file_ids: [...fileIds] } },
      };
      this.agents.set(agentId, updated);
      return updated;
    },
  );

  getFile = vi.fn(async (fileId: string): Promise<FoundryFile> => {
    const file = this.files.get(fileId);
    if (!file) {
      throw new Error(`file ${fileId} not found`);
    }
    return { ...file };
  });

  uploadFile = vi.fn(
    async ({ filename, bytes }: { filename: string; bytes: Uint8Array }): Promise<FoundryFile> => {
      const file = { id: this.id("file"), filename, bytes: bytes.byteLength };
      this.files.set(file.id, file);
      return { ...file };
    },
  );

  deleteFile = vi.fn(async (fileId: string) => {
    this.files.delete(fileId);
    return { id: fileId, deleted: true };
  });

  createThread = vi.fn(async () => ({ id: this.id("thread") }));

  createMessage = vi.fn(async (threadId: string, input: { content: string }): Promise<FoundryMessage> => ({
    id: this.id("msg"),
    role: "user",
    content: [{ type: "text", text: { value: input.content } }],
    run_id: null,
  }));

  createRun = vi.fn(async (): Promise<FoundryRun> => ({
    id: this.id("run"),
    status: this.nextRunStatus(),
  }));

  getRun = vi.fn(async (_threadId: string, runId: string): Promise<FoundryRun> => ({
    id: runId,
    status: this.nextRunStatus(),
  }));

  listMessages = vi.fn(async (): Promise<FoundryMessage[]> => [...this.messages]);

  addAgent(agent: FoundryAgent): void {
    this.agents.set(agent.id, agent);
  }

  /** Registers files and attaches them to the agent in the given order. */
  attach(agentId: string, files: Array<{ id: string; filename: string; bytes?: number }>): void {
    for (const file of files) {
      this.files.set(file.id, { bytes: 10, ...file });
    }
    const agent = this.agents.get(agentId) ?? { id: agentId, name: agentId, tools: [] };
    this.agents.set(agentId, {
      ...agent,
      tool_resources: { code_interpreter: { file_ids: files.map((file) => file.id) } },
    });
  }

  fileIds(agentId: string): string[] {
    return this.agents.get(agentId)?.tool_resources?.code_interpreter?.file_ids ?? [];
  }

  asClient(): FoundryClient {
    return this as unknown as FoundryClient;
  }

  private nextRunStatus(): string {
    const status =
      this.runStatuses[Math.min(this.runStatusIndex, this.runStatuses.length - 1)];
    this.runStatusIndex += 1;
    return status;
  }

  private id(prefix: string): string {
    const value = `${prefix}-new-${this.nextId}`;
    this.nextId += 1;
    return value;
  }
}
