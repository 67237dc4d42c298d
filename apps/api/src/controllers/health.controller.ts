import {
  Controller,
  Get,
  Inject,
  ServiceUnavailableException,
} from "@nestjs/common";
import { ApiOkResponse, ApiServiceUnavailableResponse, ApiTags } from "@nestjs/swagger";
import { CONSOLE_SETTINGS, type ConsoleSettings } from "@foundry-console/config";
import { InjectLogger } from "@foundry-console/io";
import type { Logger } from "pino";
import {
  ACCESS_TOKEN_PROVIDER,
  type AccessTokenProvider,
} from "../foundry/credential.provider";

@ApiTags("health")
@Controller("health")
export class HealthController {
  constructor(
    @Inject(ACCESS_TOKEN_PROVIDER) private readonly tokens: AccessTokenProvider,
    @Inject(CONSOLE_SETTINGS) private readonly settings: ConsoleSettings,
    @InjectLogger("health") private readonly logger: Logger,
  ) {}

  @ApiOkResponse({ description: "Liveness state" })
  @Get()
  check(): Record<string, string> {
    return { status: "ok" };
  }

  /** Ready once a token for the project audience can be issued. */
  @ApiOkResponse({ description: "Project credential resolves" })
  @ApiServiceUnavailableResponse({ description: "No token for the project audience" })
  @Get("ready")
  async readiness(): Promise<Record<string, string>> {
    try {
      await this.tokens.getToken(this.settings.foundry.tokenScope);
    } catch (error) {
      this.logger.warn({ err: error }, "Readiness check could not obtain a token");
      throw new ServiceUnavailableException("Project credential is not available");
    }
    return { status: "ready", projectEndpoint: this.settings.projectEndpoint };
  }
}
