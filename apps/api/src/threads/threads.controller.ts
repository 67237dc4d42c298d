import { Controller, Post } from "@nestjs/common";
import { CommandBus } from "@nestjs/cqrs";
import { ApiCreatedResponse, ApiHeader, ApiOperation, ApiTags } from "@nestjs/swagger";
import { SESSION_HEADER } from "@foundry-console/types";
import { CurrentSession } from "../sessions/session.decorator";
import type { SessionState } from "../sessions/session.types";
import { CreateThreadCommand } from "./commands";
import { ThreadSummaryDto } from "./dto/thread-summary.dto";

@ApiTags("threads")
@ApiHeader({ name: SESSION_HEADER, required: false })
@Controller("threads")
export class ThreadsController {
  constructor(private readonly commandBus: CommandBus) {}

  @ApiOperation({ summary: "Start a new conversation thread for this session" })
  @ApiCreatedResponse({ type: ThreadSummaryDto })
  @Post()
  async create(@CurrentSession() session: SessionState): Promise<ThreadSummaryDto> {
    return this.commandBus.execute(new CreateThreadCommand(session));
  }
}
