import { CommandHandler, type ICommandHandler } from "@nestjs/cqrs";
import type { UploadResult } from "@foundry-console/types";
import { AgentFilesService } from "../agent-files.service";
import { UploadAgentFileCommand } from "./upload-agent-file.command";

@CommandHandler(UploadAgentFileCommand)
export class UploadAgentFileHandler implements ICommandHandler<
  UploadAgentFileCommand,
  UploadResult
> {
  constructor(private readonly agentFiles: AgentFilesService) {}

  async execute({ session, agentId, file }: UploadAgentFileCommand): Promise<UploadResult> {
    return this.agentFiles.uploadAndPersist(session, agentId, file);
  }
}
