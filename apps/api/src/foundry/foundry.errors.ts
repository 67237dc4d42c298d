/** Base class for failed calls to the Foundry project endpoint. */
export abstract class FoundryError extends Error {
  constructor(
    message: string,
    readonly method: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The service answered with a non-2xx status. */
export class FoundryRequestError extends FoundryError {
  constructor(
    method: string,
    path: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(
      `Foundry request ${method} ${path} failed with status ${status}${summarizeBody(body)}`,
      method,
      path,
    );
  }
}

/** The request never produced a response: DNS, TLS, reset or timeout. */
export class FoundryNetworkError extends FoundryError {
  constructor(method: string, path: string, cause: unknown) {
    super(
      `Foundry request ${method} ${path} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      method,
      path,
      { cause },
    );
  }
}

/** The identity library could not issue a token for the project scope. */
export class FoundryCredentialError extends FoundryError {
  constructor(method: string, path: string, cause: unknown) {
    super(
      `Could not acquire a Foundry access token: ${cause instanceof Error ? cause.message : String(cause)}`,
      method,
      path,
      { cause },
    );
  }
}

/** A 2xx response whose body was not the JSON we expected. */
export class FoundryResponseError extends FoundryError {
  constructor(method: string, path: string, detail: string) {
    super(`Foundry request ${method} ${path} returned an unreadable body: ${detail}`, method, path);
  }
}

const MAX_BODY_SUMMARY = 300;

/** Pulls `error.message` out of an OpenAI-style error body when present. */
function extractErrorMessage(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }

  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "error" in parsed &&
    typeof parsed.error === "object" &&
    parsed.error !== null &&
    "message" in parsed.error &&
    typeof parsed.error.message === "string"
  ) {
    return parsed.error.message;
  }
  return undefined;
}

function summarizeBody(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) {
    return "";
  }

  const summary = extractErrorMessage(trimmed) ?? trimmed;
  return `: ${summary.length > MAX_BODY_SUMMARY ? `${summary.slice(0, MAX_BODY_SUMMARY)}…` : summary}`;
}
