import { Injectable, NotFoundException } from "@nestjs/common";
import { InjectLogger } from "@foundry-console/io";
import {
  UNAVAILABLE_FILE_LABEL,
  type AgentFile,
  type DeleteResult,
  type UploadResult,
} from "@foundry-console/types";
import type { Logger } from "pino";
import { AgentCatalogService } from "../agents/agent-catalog.service";
import { FoundryClient } from "../foundry/foundry.client";
import { SessionStore } from "../sessions/session.store";
import type { SessionState } from "../sessions/session.types";
import { KeyedLock } from "./keyed-lock";

export interface UploadFileRequest {
  filename: string;
  bytes: Uint8Array;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Keeps an agent's code-interpreter attachments at one file per
 * case-insensitive filename. Writes for the same agent are serialized.
 */
@Injectable()
export class AgentFilesService {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly foundry: FoundryClient,
    private readonly catalog: AgentCatalogService,
    private readonly sessions: SessionStore,
    @InjectLogger("agent-files") private readonly logger: Logger,
  ) {}

  async listFiles(agentId: string): Promise<AgentFile[]> {
    const agent = await this.foundry.getAgent(agentId);
    const fileIds = agent.tool_resources?.code_interpreter?.file_ids ?? [];
    return Promise.all(fileIds.map((fileId) => this.describeFile(fileId)));
  }

  async deleteFile(session: SessionState, agentId: string, fileId: string): Promise<DeleteResult> {
    return this.lock.run(agentId, async () => {
      try {
        const rows = await this.listFiles(agentId);
        const target = rows.find((row) => row.fileId === fileId);
        if (!target) {
          throw new NotFoundException(
            `File ${fileId} is not attached to Code Interpreter for agent ${agentId}`,
          );
        }

        const remaining = rows.filter((row) => row.fileId !== fileId);
        await this.foundry.setCodeInterpreterFileIds(
          agentId,
          remaining.map((row) => row.fileId),
        );

        const warnings: string[] = [];
        await this.deleteBestEffort(session, fileId, warnings);

        this.catalog.invalidate();
        this.sessions.record(
          session,
          "info",
          `Deleted ${target.filename} from CI and project.`,
        );
        return { fileId, files: remaining, warnings };
      } catch (error) {
        this.sessions.record(session, "error", `Delete failed: ${describeError(error)}`);
        throw error;
      }
    });
  }

  /**
   * Uploads the bytes under their original filename, then attaches the new
   * file to the agent. A case-insensitive name match takes the first
   * matching slot and every other same-name attachment is removed.
   */
  async uploadAndPersist(
    session: SessionState,
    agentId: string,
    { filename, bytes }: UploadFileRequest,
  ): Promise<UploadResult> {
    const uploaded = await this.foundry.uploadFile({ filename, bytes, purpose: "assistants" });
    const newId = uploaded.id;
    session.lastUploadedFileId = newId;
    this.sessions.record(session, "info", `Uploaded new file_id=${newId} for '${filename}'.`);

    return this.lock.run(agentId, async () => {
      try {
        return await this.reconcile(session, agentId, {
          fileId: newId,
          filename,
          bytes: uploaded.bytes ?? bytes.byteLength,
          available: true,
        });
      } catch (error) {
        this.logger.error(
          { agentId, fileId: newId, error },
          "Uploaded file could not be attached; it remains in project storage",
        );
        this.sessions.record(
          session,
          "error",
          `Persist/overwrite failed: ${describeError(error)}`,
        );
        throw error;
      }
    });
  }

  private async reconcile(
    session: SessionState,
    agentId: string,
    upload: AgentFile,
  ): Promise<UploadResult> {
    const rows = await this.listFiles(agentId);
    const name = upload.filename.toLowerCase();
    const matches = rows.filter(
      (row) => row.available && row.filename.toLowerCase() === name,
    );
    const warnings: string[] = [];

    if (matches.length === 0) {
      const files = [...rows, upload];
      await this.foundry.setCodeInterpreterFileIds(
        agentId,
        files.map((row) => row.fileId),
      );
      this.catalog.invalidate();
      this.sessions.record(
        session,
        "info",
        `Persisted new file to CI: '${upload.filename}' id=${upload.fileId}.`,
      );
      return {
        fileId: upload.fileId,
        filename: upload.filename,
        outcome: "attached",
        files,
        warnings,
      };
    }

    const supersededIds = new Set(matches.map((row) => row.fileId));
    const slot = rows.indexOf(matches[0]);
    const files = rows.flatMap((row, index) => {
      if (index === slot) {
        return [upload];
      }
      return supersededIds.has(row.fileId) ? [] : [row];
    });

    await this.foundry.setCodeInterpreterFileIds(
      agentId,
      files.map((row) => row.fileId),
    );
    for (const supersededId of supersededIds) {
      await this.deleteBestEffort(session, supersededId, warnings);
    }

    const replacedFileId = matches[0].fileId;
    this.catalog.invalidate();
    this.sessions.record(
      session,
      "info",
      `Overwritten: '${upload.filename}' old_id=${replacedFileId} -> new_id=${upload.fileId}.`,
    );
    return {
      fileId: upload.fileId,
      filename: upload.filename,
      outcome: "replaced",
      replacedFileId,
      files,
      warnings,
    };
  }

  private async describeFile(fileId: string): Promise<AgentFile> {
    try {
      const file = await this.foundry.getFile(fileId);
      return {
        fileId,
        filename: file.filename ?? "",
        bytes: file.bytes ?? null,
        available: true,
      };
    } catch (error) {
      this.logger.warn({ fileId, error }, "File metadata unavailable");
      return { fileId, filename: UNAVAILABLE_FILE_LABEL, bytes: null, available: false };
    }
  }

  private async deleteBestEffort(
    session: SessionState,
    fileId: string,
    warnings: string[],
  ): Promise<void> {
    try {
      await this.foundry.deleteFile(fileId);
    } catch (error) {
      const message = `Could not delete file object ${fileId}: ${describeError(error)}`;
      this.logger.warn({ fileId, error }, "Best-effort file deletion failed");
      this.sessions.record(session, "warn", message);
      warnings.push(message);
    }
  }
}
