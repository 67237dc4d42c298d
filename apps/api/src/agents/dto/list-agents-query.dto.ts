import { ApiProperty } from "@nestjs/swagger";
import { Transform } from "class-transformer";
import { IsBoolean, IsOptional } from "class-validator";

export class ListAgentsQueryDto {
  @ApiProperty({
    description: "Bypass the agent list cache",
    required: false,
    type: Boolean,
  })
  @IsOptional()
  @IsBoolean()
  @Transform(({ obj }: { obj: Record<string, unknown> }) =>
    obj.refresh === true || obj.refresh === "true" || obj.refresh === "1"
  )
    refresh?: boolean;
}
