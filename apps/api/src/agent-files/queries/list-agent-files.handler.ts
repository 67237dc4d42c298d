import { QueryHandler, type IQueryHandler } from "@nestjs/cqrs";
import type { AgentFile } from "@foundry-console/types";
import { AgentFilesService } from "../agent-files.service";
import { ListAgentFilesQuery } from "./list-agent-files.query";

@QueryHandler(ListAgentFilesQuery)
export class ListAgentFilesHandler implements IQueryHandler<ListAgentFilesQuery, AgentFile[]> {
  constructor(private readonly agentFiles: AgentFilesService) {}

  async execute({ agentId }: ListAgentFilesQuery): Promise<AgentFile[]> {
    return this.agentFiles.listFiles(agentId);
  }
}
