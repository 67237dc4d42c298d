import { ApiProperty } from "@nestjs/swagger";
import type { ThreadSummary } from "@foundry-console/types";

export class ThreadSummaryDto implements ThreadSummary {
  @ApiProperty({ description: "Identifier of the new thread" })
  threadId!: string;
}
