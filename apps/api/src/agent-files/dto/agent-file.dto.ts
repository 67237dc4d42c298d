import { ApiProperty } from "@nestjs/swagger";
import type {
  AgentFile,
  DeleteResult,
  UploadOutcome,
  UploadResult,
} from "@foundry-console/types";

export class AgentFileDto implements AgentFile {
  @ApiProperty({ description: "File identifier" })
  fileId!: string;

  @ApiProperty({ description: "Stored filename, or (unavailable) when metadata could not be read" })
  filename!: string;

  @ApiProperty({ description: "Size in bytes", type: Number, nullable: true })
  bytes!: number | null;

  @ApiProperty({ description: "False when the file metadata could not be resolved" })
  available!: boolean;
}

export class UploadResultDto implements UploadResult {
  @ApiProperty({ description: "Identifier of the uploaded file" })
  fileId!: string;

  @ApiProperty({ description: "Original filename of the upload" })
  filename!: string;

  @ApiProperty({ enum: ["attached", "replaced"] })
  outcome!: UploadOutcome;

  @ApiProperty({ description: "File replaced by this upload", required: false })
  replacedFileId?: string;

  @ApiProperty({ type: AgentFileDto, isArray: true })
  files!: AgentFileDto[];

  @ApiProperty({ description: "Best-effort cleanup failures", type: String, isArray: true })
  warnings!: string[];
}

export class DeleteResultDto implements DeleteResult {
  @ApiProperty({ description: "Identifier of the removed file" })
  fileId!: string;

  @ApiProperty({ type: AgentFileDto, isArray: true })
  files!: AgentFileDto[];

  @ApiProperty({ description: "Best-effort cleanup failures", type: String, isArray: true })
  warnings!: string[];
}
