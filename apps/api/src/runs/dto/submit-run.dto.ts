import { ApiProperty } from "@nestjs/swagger";
import { IsOptional, IsString, MaxLength } from "class-validator";
import type { SubmitRunRequest } from "@foundry-console/types";

export class SubmitRunDto implements SubmitRunRequest {
  @ApiProperty({
    description: "Question or instructions for the orchestrator; blank uses the default analysis prompt",
    required: false,
  })
  @IsOptional()
  @IsString()
  @MaxLength(32_000)
    prompt?: string;
}
