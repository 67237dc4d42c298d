import { Inject, Injectable } from "@nestjs/common";
import { randomUUID } from "crypto";
import { CONSOLE_SETTINGS } from "@foundry-console/config";
import type { ConsoleSettings } from "@foundry-console/config";
import { InjectLogger } from "@foundry-console/io";
import type {
  ActivityLogEntry,
  ActivityLogLevel,
  SessionSnapshot,
} from "@foundry-console/types";
import type { Logger } from "pino";
import type { SessionState } from "./session.types";

export const MAX_ACTIVITY_ENTRIES = 200;

const SESSION_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/u;

@Injectable()
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly idleTtlMs: number;

  constructor(
    @Inject(CONSOLE_SETTINGS) settings: ConsoleSettings,
    @InjectLogger("sessions") private readonly logger: Logger,
  ) {
    this.idleTtlMs = settings.sessions.idleTtlMinutes * 60_000;
  }

  /**
   * Returns the session for a client-supplied id, creating it on first use.
   * Ids that are absent or malformed get a fresh server-generated session.
   */
  resolve(sessionId: string | undefined): SessionState {
    const now = Date.now();
    this.evictIdle(now);

    const requested = sessionId?.trim();
    const id = requested && SESSION_ID_PATTERN.test(requested) ? requested : randomUUID();

    const existing = this.sessions.get(id);
    if (existing) {
      existing.lastSeenAt = now;
      return existing;
    }

    const session: SessionState = {
      id,
      threadId: null,
      lastUploadedFileId: null,
      agentList: [],
      logs: [],
      lastSeenAt: now,
    };
    this.sessions.set(id, session);
    this.logger.debug({ sessionId: id }, "Session created");
    return session;
  }

  get(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  evictIdle(now = Date.now()): number {
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > this.idleTtlMs) {
        this.sessions.delete(id);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      this.logger.debug({ evicted }, "Evicted idle sessions");
    }
    return evicted;
  }

  record(session: SessionState, level: ActivityLogLevel, message: string): ActivityLogEntry {
    const entry: ActivityLogEntry = {
      id: randomUUID(),
      level,
      message,
      createdAt: new Date().toISOString(),
    };
    session.logs.push(entry);
    if (session.logs.length > MAX_ACTIVITY_ENTRIES) {
      session.logs.splice(0, session.logs.length - MAX_ACTIVITY_ENTRIES);
    }
    return entry;
  }

  clearLogs(session: SessionState): void {
    session.logs = [];
  }

  snapshot(session: SessionState): SessionSnapshot {
    return {
      sessionId: session.id,
      threadId: session.threadId,
      lastUploadedFileId: session.lastUploadedFileId,
      logs: session.logs.map((entry) => ({ ...entry })),
    };
  }
}
