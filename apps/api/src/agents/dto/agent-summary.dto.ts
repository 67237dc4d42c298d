import { ApiProperty } from "@nestjs/swagger";
import type { AgentSummary } from "@foundry-console/types";

export class AgentSummaryDto implements AgentSummary {
  @ApiProperty({ description: "Agent identifier" })
  id!: string;

  @ApiProperty({ description: "Display name, or the id when the agent has no name" })
  label!: string;
}
