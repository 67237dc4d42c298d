import { Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";
import { AgentsModule } from "../agents/agents.module";
import { AgentFilesController } from "./agent-files.controller";
import { AgentFilesService } from "./agent-files.service";
import { agentFileCommandHandlers } from "./commands";
import { agentFileQueryHandlers } from "./queries";

@Module({
  imports: [CqrsModule, AgentsModule],
  providers: [AgentFilesService, ...agentFileCommandHandlers, ...agentFileQueryHandlers],
  controllers: [AgentFilesController],
})
export class AgentFilesModule {}
