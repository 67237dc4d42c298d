import { QueryHandler, type IQueryHandler } from "@nestjs/cqrs";
import type { AgentSummary } from "@foundry-console/types";
import { AgentCatalogService } from "../agent-catalog.service";
import { ListAgentsQuery } from "./list-agents.query";

@QueryHandler(ListAgentsQuery)
export class ListAgentsHandler implements IQueryHandler<ListAgentsQuery, AgentSummary[]> {
  constructor(private readonly catalog: AgentCatalogService) {}

  async execute({ session, refresh }: ListAgentsQuery): Promise<AgentSummary[]> {
    const agents = await this.catalog.listAgents({ refresh });
    session.agentList = agents;
    return agents;
  }
}
