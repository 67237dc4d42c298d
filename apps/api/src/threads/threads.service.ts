import { Injectable } from "@nestjs/common";
import { InjectLogger } from "@foundry-console/io";
import type { ThreadSummary } from "@foundry-console/types";
import type { Logger } from "pino";
import { FoundryClient } from "../foundry/foundry.client";
import { SessionStore } from "../sessions/session.store";
import type { SessionState } from "../sessions/session.types";

@Injectable()
export class ThreadsService {
  constructor(
    private readonly foundry: FoundryClient,
    private readonly sessions: SessionStore,
    @InjectLogger("threads") private readonly logger: Logger,
  ) {}

  /** Always opens a fresh thread and clears the session activity log. */
  async startThread(session: SessionState): Promise<ThreadSummary> {
    const thread = await this.foundry.createThread();
    session.threadId = thread.id;
    this.sessions.clearLogs(session);
    this.sessions.record(session, "info", `Started a new thread: ${thread.id}`);
    this.logger.info({ sessionId: session.id, threadId: thread.id }, "Thread started");
    return { threadId: thread.id };
  }
}
