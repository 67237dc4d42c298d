import {
  createParamDecorator,
  InternalServerErrorException,
  type ExecutionContext,
} from "@nestjs/common";
import type { Request } from "express";
import { sessionFromRequest } from "./session.middleware";
import type { SessionState } from "./session.types";

export function resolveRequestSession(request: Request): SessionState {
  const session = sessionFromRequest(request);
  if (!session) {
    throw new InternalServerErrorException("No console session is bound to this request");
  }
  return session;
}

/** Injects the {@link SessionState} resolved by `SessionMiddleware`. */
export const CurrentSession = createParamDecorator(
  (_data: unknown, context: ExecutionContext): SessionState =>
    resolveRequestSession(context.switchToHttp().getRequest<Request>()),
);
