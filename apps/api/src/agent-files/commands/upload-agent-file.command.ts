import type { ICommand } from "@nestjs/cqrs";
import type { SessionState } from "../../sessions/session.types";
import type { UploadFileRequest } from "../agent-files.service";

export class UploadAgentFileCommand implements ICommand {
  constructor(
    public readonly session: SessionState,
    public readonly agentId: string,
    public readonly file: UploadFileRequest,
  ) {}
}
