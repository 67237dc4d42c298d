import { Controller, Get, Query } from "@nestjs/common";
import { QueryBus } from "@nestjs/cqrs";
import { ApiHeader, ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";
import { SESSION_HEADER } from "@foundry-console/types";
import { CurrentSession } from "../sessions/session.decorator";
import type { SessionState } from "../sessions/session.types";
import { AgentSummaryDto } from "./dto/agent-summary.dto";
import { ListAgentsQueryDto } from "./dto/list-agents-query.dto";
import { ListAgentsQuery } from "./queries";

@ApiTags("agents")
@ApiHeader({ name: SESSION_HEADER, required: false })
@Controller("agents")
export class AgentsController {
  constructor(private readonly queryBus: QueryBus) {}

  @ApiOperation({ summary: "List agents in the project" })
  @ApiOkResponse({ type: AgentSummaryDto, isArray: true })
  @Get()
  async list(
    @CurrentSession() session: SessionState,
    @Query() query: ListAgentsQueryDto,
  ): Promise<AgentSummaryDto[]> {
    return this.queryBus.execute(new ListAgentsQuery(session, query.refresh ?? false));
  }
}
