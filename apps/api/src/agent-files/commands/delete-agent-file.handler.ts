import { CommandHandler, type ICommandHandler } from "@nestjs/cqrs";
import type { DeleteResult } from "@foundry-console/types";
import { AgentFilesService } from "../agent-files.service";
import { DeleteAgentFileCommand } from "./delete-agent-file.command";

@CommandHandler(DeleteAgentFileCommand)
export class DeleteAgentFileHandler implements ICommandHandler<
  DeleteAgentFileCommand,
  DeleteResult
> {
  constructor(private readonly agentFiles: AgentFilesService) {}

  async execute({ session, agentId, fileId }: DeleteAgentFileCommand): Promise<DeleteResult> {
    return this.agentFiles.deleteFile(session, agentId, fileId);
  }
}
