import {
  BadRequestException,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  UploadedFile,
  UseInterceptors,
} from "@nestjs/common";
import { CommandBus, QueryBus } from "@nestjs/cqrs";
import { FileInterceptor } from "@nestjs/platform-express";
import {
  ApiBody,
  ApiConsumes,
  ApiCreatedResponse,
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from "@nestjs/swagger";
import {
  ALLOWED_UPLOAD_EXTENSIONS,
  SESSION_HEADER,
  isAllowedUploadFilename,
} from "@foundry-console/types";
import { CurrentSession } from "../sessions/session.decorator";
import type { SessionState } from "../sessions/session.types";
import { DeleteAgentFileCommand, UploadAgentFileCommand } from "./commands";
import { AgentFileDto, DeleteResultDto, UploadResultDto } from "./dto/agent-file.dto";
import { ListAgentFilesQuery } from "./queries";

export const MAX_UPLOAD_BYTES = 200 * 1024 * 1024;

/** Filename parameters are decoded as UTF-8; multer defaults to latin1. */
export const UPLOAD_OPTIONS = {
  defParamCharset: "utf8",
  limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 },
};

export function assertUploadAccepted(
  file: Express.Multer.File | undefined,
): Express.Multer.File {
  if (!file) {
    throw new BadRequestException("Attach a file in the 'file' form field.");
  }
  if (!isAllowedUploadFilename(file.originalname)) {
    throw new BadRequestException(
      `Unsupported file type for '${file.originalname}'. Allowed: ${ALLOWED_UPLOAD_EXTENSIONS.join(", ")}.`,
    );
  }
  return file;
}

@ApiTags("agent files")
@ApiHeader({ name: SESSION_HEADER, required: false })
@Controller("agents/:agentId/files")
export class AgentFilesController {
  constructor(
    private readonly commandBus: CommandBus,
    private readonly queryBus: QueryBus,
  ) {}

  @ApiOperation({ summary: "List the agent's code-interpreter files" })
  @ApiOkResponse({ type: AgentFileDto, isArray: true })
  @Get()
  async list(@Param("agentId") agentId: string): Promise<AgentFileDto[]> {
    return this.queryBus.execute(new ListAgentFilesQuery(agentId));
  }

  @ApiOperation({ summary: "Upload a file and attach it, replacing any file with the same name" })
  @ApiConsumes("multipart/form-data")
  @ApiBody({
    schema: {
      type: "object",
      required: ["file"],
      properties: { file: { type: "string", format: "binary" } },
    },
  })
  @ApiCreatedResponse({ type: UploadResultDto })
  @Post()
  @UseInterceptors(FileInterceptor("file", UPLOAD_OPTIONS))
  async upload(
    @CurrentSession() session: SessionState,
    @Param("agentId") agentId: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<UploadResultDto> {
    const accepted = assertUploadAccepted(file);
    return this.commandBus.execute(
      new UploadAgentFileCommand(session, agentId, {
        filename: accepted.originalname,
        bytes: accepted.buffer,
      }),
    );
  }

  @ApiOperation({ summary: "Detach a file from the agent and delete it" })
  @ApiOkResponse({ type: DeleteResultDto })
  @Delete(":fileId")
  async remove(
    @CurrentSession() session: SessionState,
    @Param("agentId") agentId: string,
    @Param("fileId") fileId: string,
  ): Promise<DeleteResultDto> {
    return this.commandBus.execute(new DeleteAgentFileCommand(session, agentId, fileId));
  }
}
