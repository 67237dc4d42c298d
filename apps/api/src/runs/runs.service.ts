import { Inject, Injectable } from "@nestjs/common";
import { CONSOLE_SETTINGS } from "@foundry-console/config";
import type { ConsoleSettings } from "@foundry-console/config";
import { InjectLogger } from "@foundry-console/io";
import type { RunResult, SubmitRunRequest } from "@foundry-console/types";
import type { Logger } from "pino";
import { FoundryClient } from "../foundry/foundry.client";
import { CODE_INTERPRETER_TOOL, type FoundryMessageAttachment } from "../foundry/foundry.types";
import { SessionStore } from "../sessions/session.store";
import type { SessionState } from "../sessions/session.types";
import { extractRunOutput } from "./run-output";
import { RunPoller } from "./run-poller";

export const DEFAULT_RUN_PROMPT = "Please analyze the uploaded file.";
export const RUN_MESSAGE_LIMIT = 100;

/**
 * Sends one prompt to the orchestrator agent on the session's thread and
 * waits for the run to finish.
 */
@Injectable()
export class RunsService {
  constructor(
    private readonly foundry: FoundryClient,
    private readonly poller: RunPoller,
    private readonly sessions: SessionStore,
    @Inject(CONSOLE_SETTINGS) private readonly settings: ConsoleSettings,
    @InjectLogger("runs") private readonly logger: Logger,
  ) {}

  async submit(
    session: SessionState,
    request: SubmitRunRequest,
    signal?: AbortSignal,
  ): Promise<RunResult> {
    const threadId = await this.ensureThread(session);

    const prompt = request.prompt?.trim() || DEFAULT_RUN_PROMPT;
    const attachments: FoundryMessageAttachment[] = [];
    const attachedFileId = session.lastUploadedFileId;
    if (attachedFileId) {
      attachments.push({ file_id: attachedFileId, tools: [{ ...CODE_INTERPRETER_TOOL }] });
      this.sessions.record(
        session,
        "info",
        "File attached to Code Interpreter for this run (message-level).",
      );
    }

    await this.foundry.createMessage(threadId, {
      role: "user",
      content: prompt,
      ...(attachments.length > 0 ? { attachments } : {}),
    });

    const queued = await this.foundry.createRun(threadId, {
      assistant_id: this.settings.orchestratorAgentId,
    });
    this.logger.info({ threadId, runId: queued.id }, "Run created");

    const run = await this.poller.waitForTerminal(threadId, queued, { signal });
    this.sessions.record(session, "info", `Run ${run.id} finished with status: ${run.status}.`);

    const messages = await this.foundry.listMessages(threadId, {
      runId: run.id,
      order: "asc",
      limit: RUN_MESSAGE_LIMIT,
    });

    return {
      threadId,
      runId: run.id,
      status: run.status,
      attachedFileId: attachedFileId ?? null,
      output: extractRunOutput(messages, run.id),
    };
  }

  private async ensureThread(session: SessionState): Promise<string> {
    if (session.threadId) {
      return session.threadId;
    }

    const thread = await this.foundry.createThread();
    session.threadId = thread.id;
    this.sessions.record(session, "info", `Thread created: ${thread.id}.`);
    return thread.id;
  }
}
