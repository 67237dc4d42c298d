import { Inject, Injectable } from "@nestjs/common";
import { CONSOLE_SETTINGS } from "@foundry-console/config";
import type { ConsoleSettings } from "@foundry-console/config";
import { InjectLogger } from "@foundry-console/io";
import type { Logger } from "pino";
import { ACCESS_TOKEN_PROVIDER } from "./credential.provider";
import type { AccessTokenProvider } from "./credential.provider";
import {
  FoundryCredentialError,
  FoundryNetworkError,
  FoundryRequestError,
  FoundryResponseError,
} from "./foundry.errors";
import {
  CODE_INTERPRETER_TOOL,
  type CreateMessageInput,
  type FoundryAgent,
  type FoundryDeletion,
  type FoundryFile,
  type FoundryList,
  type FoundryMessage,
  type FoundryRun,
  type FoundryThread,
  type ListMessagesOptions,
  type UpdateAgentInput,
  type UploadFileInput,
} from "./foundry.types";

type HttpMethod = "GET" | "POST" | "DELETE";

interface RequestOptions {
  query?: Record<string, string | number | undefined>;
  json?: unknown;
  form?: FormData;
}

const segment = (value: string): string => encodeURIComponent(value);

/**
 * One method per remote call against the project endpoint. Every call carries
 * a fresh bearer token and the configured `api-version`. Nothing is retried.
 */
@Injectable()
export class FoundryClient {
  private readonly baseUrl: string;

  constructor(
    @Inject(CONSOLE_SETTINGS) private readonly settings: ConsoleSettings,
    @Inject(ACCESS_TOKEN_PROVIDER) private readonly tokens: AccessTokenProvider,
    @InjectLogger("foundry") private readonly logger: Logger,
  ) {
    this.baseUrl = settings.projectEndpoint;
  }

  async listAgents(): Promise<FoundryAgent[]> {
    const page = await this.request<FoundryList<FoundryAgent>>("GET", "/assistants");
    return page.data ?? [];
  }

  getAgent(agentId: string): Promise<FoundryAgent> {
    return this.request("GET", `/assistants/${segment(agentId)}`);
  }

  updateAgent(agentId: string, input: UpdateAgentInput): Promise<FoundryAgent> {
    return this.request("POST", `/assistants/${segment(agentId)}`, { json: input });
  }

  /**
   * Replaces the agent's code-interpreter file list, adding the
   * code-interpreter tool when the agent does not have it yet.
   */
  async setCodeInterpreterFileIds(agentId: string, fileIds: string[]): Promise<FoundryAgent> {
    const agent = await this.getAgent(agentId);
    const tools = [...(agent.tools ?? [])];
    if (!tools.some((tool) => tool.type === CODE_INTERPRETER_TOOL.type)) {
      tools.push({ ...CODE_INTERPRETER_TOOL });
    }

    return this.updateAgent(agentId, {
      tools,
      tool_resources: { code_interpreter: { file_ids: fileIds } },
    });
  }

  getFile(fileId: string): Promise<FoundryFile> {
    return this.request("GET", `/files/${segment(fileId)}`);
  }

  uploadFile({ filename, bytes, purpose = "assistants" }: UploadFileInput): Promise<FoundryFile> {
    const form = new FormData();
    form.append("purpose", purpose);
    form.append("file", new Blob([Uint8Array.from(bytes)]), filename);
    return this.request("POST", "/files", { form });
  }

  deleteFile(fileId: string): Promise<FoundryDeletion> {
    return this.request("DELETE", `/files/${segment(fileId)}`);
  }

  createThread(): Promise<FoundryThread> {
    return this.request("POST", "/threads", { json: {} });
  }

  createMessage(threadId: string, input: CreateMessageInput): Promise<FoundryMessage> {
    return this.request("POST", `/threads/${segment(threadId)}/messages`, { json: input });
  }

  createRun(threadId: string, input: { assistant_id: string }): Promise<FoundryRun> {
    return this.request("POST", `/threads/${segment(threadId)}/runs`, { json: input });
  }

  getRun(threadId: string, runId: string): Promise<FoundryRun> {
    return this.request("GET", `/threads/${segment(threadId)}/runs/${segment(runId)}`);
  }

  async listMessages(threadId: string, options: ListMessagesOptions = {}): Promise<FoundryMessage[]> {
    const page = await this.request<FoundryList<FoundryMessage>>(
      "GET",
      `/threads/${segment(threadId)}/messages`,
      {
        query: {
          run_id: options.runId,
          order: options.order,
          limit: options.limit,
        },
      },
    );
    return page.data ?? [];
  }

  private buildUrl(path: string, query: RequestOptions["query"] = {}): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set("api-version", this.settings.foundry.apiVersion);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async authorize(method: HttpMethod, path: string): Promise<string> {
    try {
      return await this.tokens.getToken(this.settings.foundry.tokenScope);
    } catch (error) {
      throw new FoundryCredentialError(method, path, error);
    }
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<T> {
    const url = this.buildUrl(path, options.query);
    const token = await this.authorize(method, path);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    }

    const startedAt = Date.now();
    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.settings.foundry.requestTimeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      this.logger.debug({ method, path, error }, "Foundry request failed before a response");
      throw new FoundryNetworkError(method, path, error);
    }

    this.logger.debug(
      { method, path, status, durationMs: Date.now() - startedAt },
      "Foundry request completed",
    );

    if (!ok) {
      throw new FoundryRequestError(method, path, status, text);
    }
    if (!text.trim()) {
      throw new FoundryResponseError(method, path, "empty body");
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new FoundryResponseError(
        method,
        path,
        error instanceof Error ? error.message : String(error),
      );
    }
  }
}
