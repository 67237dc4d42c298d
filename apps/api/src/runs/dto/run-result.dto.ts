import { ApiProperty } from "@nestjs/swagger";
import type { RunOutput, RunResult, RunStatus } from "@foundry-console/types";

export class RunOutputDto {
  @ApiProperty({ enum: ["assistant", "no-response"] })
  type!: RunOutput["type"];

  @ApiProperty({ description: "Assistant text joined by blank lines", required: false })
  text?: string;
}

export class RunResultDto implements RunResult {
  @ApiProperty({ description: "Thread the prompt was posted to" })
  threadId!: string;

  @ApiProperty({ description: "Run identifier" })
  runId!: string;

  @ApiProperty({ description: "Terminal status reported by the service" })
  status!: RunStatus;

  @ApiProperty({ description: "File attached to the prompt message", type: String, nullable: true })
  attachedFileId!: string | null;

  @ApiProperty({ type: RunOutputDto })
  output!: RunOutput;
}
