import { Injectable, type NestMiddleware } from "@nestjs/common";
import { SESSION_HEADER } from "@foundry-console/types";
import type { NextFunction, Request, Response } from "express";
import { SessionStore } from "./session.store";
import type { SessionState } from "./session.types";

const requestSessions = new WeakMap<Request, SessionState>();

export function attachSession(request: Request, session: SessionState): void {
  requestSessions.set(request, session);
}

export function sessionFromRequest(request: Request): SessionState | undefined {
  return requestSessions.get(request);
}

/**
 * Resolves the caller's session from the session header and echoes the id
 * back so a client without one learns the id it was given.
 */
@Injectable()
export class SessionMiddleware implements NestMiddleware {
  constructor(private readonly store: SessionStore) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const header = req.get(SESSION_HEADER);
    const session = this.store.resolve(header);
    attachSession(req, session);
    res.setHeader(SESSION_HEADER, session.id);
    next();
  }
}
