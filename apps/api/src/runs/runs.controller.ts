import { Body, Controller, Post, Res } from "@nestjs/common";
import { CommandBus } from "@nestjs/cqrs";
import {
  ApiCreatedResponse,
  ApiGatewayTimeoutResponse,
  ApiHeader,
  ApiOperation,
  ApiTags,
} from "@nestjs/swagger";
import { SESSION_HEADER } from "@foundry-console/types";
import type { Response } from "express";
import { CurrentSession } from "../sessions/session.decorator";
import type { SessionState } from "../sessions/session.types";
import { SubmitRunCommand } from "./commands";
import { RunResultDto } from "./dto/run-result.dto";
import { SubmitRunDto } from "./dto/submit-run.dto";

/** Aborts once the client goes away before the response is written. */
export function abortOnDisconnect(response: Response): AbortSignal {
  const controller = new AbortController();
  response.on("close", () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

@ApiTags("runs")
@ApiHeader({ name: SESSION_HEADER, required: false })
@Controller("runs")
export class RunsController {
  constructor(private readonly commandBus: CommandBus) {}

  @ApiOperation({ summary: "Send a prompt to the orchestrator and wait for the run to finish" })
  @ApiCreatedResponse({ type: RunResultDto })
  @ApiGatewayTimeoutResponse({ description: "The run did not finish before the polling deadline" })
  @Post()
  async submit(
    @CurrentSession() session: SessionState,
    @Body() body: SubmitRunDto,
    @Res({ passthrough: true }) response: Response,
  ): Promise<RunResultDto> {
    return this.commandBus.execute(
      new SubmitRunCommand(session, { prompt: body.prompt }, abortOnDisconnect(response)),
    );
  }
}
