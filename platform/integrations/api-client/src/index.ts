import {
  SESSION_HEADER,
  type AgentFile,
  type AgentSummary,
  type DeleteResult,
  type RunResult,
  type SessionSnapshot,
  type SubmitRunRequest,
  type ThreadSummary,
  type UploadResult,
} from "@foundry-console/types";
import { ApiRequestError, describeErrorPayload, parseErrorPayload } from "./errors";

export { ApiRequestError } from "./errors";

export interface ApiClientOptions {
  baseUrl: string;
  /** Sent as the session header on every request. */
  sessionId: string;
}

export interface UploadFileInput {
  file: Blob;
  /** Original filename; the API keeps it as-is. */
  filename: string;
}

export interface ApiClient {
  http: {
    agents: {
      list(options?: { refresh?: boolean }): Promise<AgentSummary[]>;
    };
    files: {
      list(agentId: string): Promise<AgentFile[]>;
      upload(agentId: string, input: UploadFileInput): Promise<UploadResult>;
      delete(agentId: string, fileId: string): Promise<DeleteResult>;
    };
    threads: {
      create(): Promise<ThreadSummary>;
    };
    runs: {
      submit(input: SubmitRunRequest, signal?: AbortSignal): Promise<RunResult>;
    };
    session: {
      get(): Promise<SessionSnapshot>;
    };
  };
  readonly sessionId: string;
}

function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/u, "");
}

const agentPath = (agentId: string): string =>
  `/agents/${ encodeURIComponent(agentId) }`;

export function createApiClient(options: ApiClientOptions): ApiClient {
  const httpBase = normalizeBaseUrl(options.baseUrl);
  const sessionId = options.sessionId;

  const performRequest = async <T>(
    path: string,
    init: RequestInit = {}
  ): Promise<T> => {
    const headers: Record<string, string> = {
      Accept: "application/json",
      [ SESSION_HEADER ]: sessionId,
    };

    if (init.body !== undefined && !(init.body instanceof FormData)) {
      headers[ "Content-Type" ] = "application/json";
    }

    const response = await fetch(`${ httpBase }${ path }`, {
      ...init,
      headers,
    });

    if (!response.ok) {
      const payload = parseErrorPayload(await response.text());
      throw new ApiRequestError(
        describeErrorPayload(
          payload,
          `Request to ${ path } failed with status ${ response.status }`
        ),
        response.status,
        path,
        payload
      );
    }

    return response.json();
  };

  return {
    sessionId,
    http: {
      agents: {
        list: ({ refresh = false } = {}) =>
          performRequest<AgentSummary[]>(
            refresh ? "/agents?refresh=true" : "/agents"
          ),
      },
      files: {
        list: (agentId) =>
          performRequest<AgentFile[]>(`${ agentPath(agentId) }/files`),
        upload: (agentId, { file, filename }) => {
          const body = new FormData();
          body.append("file", file, filename);
          return performRequest<UploadResult>(`${ agentPath(agentId) }/files`, {
            method: "POST",
            body,
          });
        },
        delete: (agentId, fileId) =>
          performRequest<DeleteResult>(
            `${ agentPath(agentId) }/files/${ encodeURIComponent(fileId) }`,
            { method: "DELETE" }
          ),
      },
      threads: {
        create: () => performRequest<ThreadSummary>("/threads", { method: "POST" }),
      },
      runs: {
        submit: (input, signal) =>
          performRequest<RunResult>("/runs", {
            method: "POST",
            body: JSON.stringify(input),
            signal,
          }),
      },
      session: {
        get: () => performRequest<SessionSnapshot>("/session"),
      },
    },
  };
}
