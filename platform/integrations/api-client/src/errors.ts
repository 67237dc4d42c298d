import type { ApiErrorPayload } from "@foundry-console/types";

/** A non-2xx answer from the console API. */
export class ApiRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly path: string,
    readonly payload: ApiErrorPayload | null,
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

const isErrorPayload = (value: unknown): value is ApiErrorPayload =>
  typeof value === "object" &&
  value !== null &&
  "message" in value &&
  (typeof value.message === "string" || Array.isArray(value.message));

export function parseErrorPayload(body: string): ApiErrorPayload | null {
  if (!body) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return isErrorPayload(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function describeErrorPayload(
  payload: ApiErrorPayload | null,
  fallback: string,
): string {
  if (!payload) {
    return fallback;
  }
  return Array.isArray(payload.message)
    ? payload.message.join("; ")
    : payload.message;
}
