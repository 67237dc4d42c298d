import { z } from "zod";
import type { ConsoleSettings, SettingsEnv } from "./types";

export const REQUIRED_SETTINGS = ["PROJECT_ENDPOINT", "ORCHESTRATOR_AGENT_ID"] as const;

export type RequiredSetting = (typeof REQUIRED_SETTINGS)[number];

export const DEFAULT_TOKEN_SCOPE = "https://ai.azure.com/.default";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/**
 * Raised for missing or malformed settings. Always fatal: the process stops
 * before any remote call is attempted.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly keys: string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Trims the raw value and strips one layer of surrounding quotes, the way
 * values copied out of a `.env` file often arrive.
 */
export function normalizeSettingValue(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().replace(/^["']+/u, "").replace(/["']+$/u, "").trim();
  return normalized.length > 0 ? normalized : undefined;
}

export function readRequiredSetting(env: SettingsEnv, key: RequiredSetting): string {
  const value = normalizeSettingValue(env[key]);
  if (value === undefined) {
    throw new ConfigurationError(
      `Missing setting: ${key}. Add it to .env or environment variables.`,
      [key],
    );
  }
  return value;
}

function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return value;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }

  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const optionalSettingsShape = z.object({
  FOUNDRY_API_VERSION: z.string().min(1).default("v1"),
  FOUNDRY_TOKEN_SCOPE: z.string().min(1).default(DEFAULT_TOKEN_SCOPE),
  FOUNDRY_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  RUN_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2_000),
  RUN_POLL_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(600_000),
  AGENT_LIST_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(60),
  SESSION_IDLE_TTL_MINUTES: z.coerce.number().int().positive().default(120),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_FILE: z.string().min(1).optional(),
  LOG_PRETTY: z.boolean().optional(),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3_000),
  HOST: z.string().min(1).default("0.0.0.0"),
  CORS_ORIGIN: z.array(z.string()).optional(),
  EXPOSE_ERROR_STACK: z.boolean().default(false),
});

// A deadline shorter than one interval would fail every run before its first poll.
const optionalSettingsSchema = optionalSettingsShape.superRefine((values, ctx) => {
  if (values.RUN_POLL_TIMEOUT_MS > 0 && values.RUN_POLL_TIMEOUT_MS < values.RUN_POLL_INTERVAL_MS) {
    ctx.addIssue({
      code: "custom",
      path: ["RUN_POLL_TIMEOUT_MS"],
      message: `must be 0 or at least RUN_POLL_INTERVAL_MS (${values.RUN_POLL_INTERVAL_MS})`,
    });
  }
});

type OptionalSettingKey = keyof z.input<typeof optionalSettingsShape>;

const LIST_KEYS = new Set<OptionalSettingKey>(["CORS_ORIGIN"]);
const BOOLEAN_KEYS = new Set<OptionalSettingKey>(["EXPOSE_ERROR_STACK", "LOG_PRETTY"]);

function collectOptionalInput(env: SettingsEnv): Record<string, unknown> {
  const input: Record<string, unknown> = {};

  for (const key of optionalSettingsShape.keyof().options) {
    const value = normalizeSettingValue(env[key]);
    if (value === undefined) {
      continue;
    }

    if (LIST_KEYS.has(key)) {
      input[key] = parseList(value);
    } else if (BOOLEAN_KEYS.has(key)) {
      input[key] = parseBoolean(value);
    } else {
      input[key] = value;
    }
  }

  return input;
}

/**
 * Resolves the console settings from an environment record. Required values
 * are checked first so a missing endpoint is reported on its own.
 */
export function loadSettings(env: SettingsEnv): ConsoleSettings {
  const projectEndpoint = readRequiredSetting(env, "PROJECT_ENDPOINT").replace(/\/+$/u, "");
  const orchestratorAgentId = readRequiredSetting(env, "ORCHESTRATOR_AGENT_ID");

  const parsed = optionalSettingsSchema.safeParse(collectOptionalInput(env));
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid settings: ${details}`, keys);
  }

  const values = parsed.data;

  return {
    projectEndpoint,
    orchestratorAgentId,
    foundry: {
      apiVersion: values.FOUNDRY_API_VERSION,
      tokenScope: values.FOUNDRY_TOKEN_SCOPE,
      requestTimeoutMs: values.FOUNDRY_REQUEST_TIMEOUT_MS,
    },
    runs: {
      pollIntervalMs: values.RUN_POLL_INTERVAL_MS,
      pollTimeoutMs: values.RUN_POLL_TIMEOUT_MS,
    },
    agents: { listCacheTtlSeconds: values.AGENT_LIST_CACHE_TTL_SECONDS },
    sessions: { idleTtlMinutes: values.SESSION_IDLE_TTL_MINUTES },
    logging: {
      level: values.LOG_LEVEL,
      destination: values.LOG_FILE
        ? { type: "file", path: values.LOG_FILE }
        : undefined,
      pretty: values.LOG_PRETTY,
    },
    api: {
      port: values.PORT,
      host: values.HOST,
      cors: {
        origin:
          values.CORS_ORIGIN && values.CORS_ORIGIN.length > 0
            ? values.CORS_ORIGIN
            : true,
      },
      exposeErrorStack: values.EXPOSE_ERROR_STACK,
    },
  };
}
