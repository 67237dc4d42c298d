import { Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";
import { AgentCatalogService } from "./agent-catalog.service";
import { AgentsController } from "./agents.controller";
import { agentQueryHandlers } from "./queries";

@Module({
  imports: [CqrsModule],
  providers: [AgentCatalogService, ...agentQueryHandlers],
  controllers: [AgentsController],
  exports: [AgentCatalogService],
})
export class AgentsModule {}
