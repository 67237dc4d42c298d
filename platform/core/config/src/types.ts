export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface LoggingDestination {
  type: "file";
  path: string;
}

export interface LoggingConfig {
  level?: LogLevel;
  /** Standard output when absent. */
  destination?: LoggingDestination;
  /** Human-readable output; defaults to whether stdout is a terminal. */
  pretty?: boolean;
}

export interface FoundrySettings {
  /** Version tag appended to every call as `api-version`. */
  apiVersion: string;
  /** Audience requested from the identity library. */
  tokenScope: string;
  requestTimeoutMs: number;
}

export interface RunSettings {
  pollIntervalMs: number;
  /** Zero disables the polling deadline. */
  pollTimeoutMs: number;
}

export interface ApiCorsSettings {
  origin: string[] | true;
}

export interface ApiSettings {
  port: number;
  host: string;
  cors: ApiCorsSettings;
  exposeErrorStack: boolean;
}

export interface ConsoleSettings {
  projectEndpoint: string;
  orchestratorAgentId: string;
  foundry: FoundrySettings;
  runs: RunSettings;
  agents: { listCacheTtlSeconds: number };
  sessions: { idleTtlMinutes: number };
  logging: LoggingConfig;
  api: ApiSettings;
}

export type SettingsEnv = Record<string, string | undefined>;
