import { Controller, Get } from "@nestjs/common";
import { QueryBus } from "@nestjs/cqrs";
import { ApiHeader, ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";
import { SESSION_HEADER } from "@foundry-console/types";
import { SessionSnapshotDto } from "./dto/session.dto";
import { GetSessionQuery } from "./queries";
import { CurrentSession } from "./session.decorator";
import type { SessionState } from "./session.types";

@ApiTags("session")
@ApiHeader({ name: SESSION_HEADER, required: false })
@Controller("session")
export class SessionController {
  constructor(private readonly queryBus: QueryBus) {}

  @ApiOperation({ summary: "Current session state and activity log" })
  @ApiOkResponse({ type: SessionSnapshotDto })
  @Get()
  async get(@CurrentSession() session: SessionState): Promise<SessionSnapshotDto> {
    return this.queryBus.execute(new GetSessionQuery(session));
  }
}
