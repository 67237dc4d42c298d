export * from "./agents";
export * from "./runs";
export * from "./session";
export type { ApiErrorPayload } from "./errors";
