import { ApiProperty } from "@nestjs/swagger";
import type {
  ActivityLogEntry,
  ActivityLogLevel,
  SessionSnapshot,
} from "@foundry-console/types";

export class ActivityLogEntryDto implements ActivityLogEntry {
  @ApiProperty()
  id!: string;

  @ApiProperty({ enum: ["info", "warn", "error"] })
  level!: ActivityLogLevel;

  @ApiProperty()
  message!: string;

  @ApiProperty({ format: "date-time" })
  createdAt!: string;
}

export class SessionSnapshotDto implements SessionSnapshot {
  @ApiProperty()
  sessionId!: string;

  @ApiProperty({ type: String, nullable: true })
  threadId!: string | null;

  @ApiProperty({ type: String, nullable: true })
  lastUploadedFileId!: string | null;

  @ApiProperty({ type: ActivityLogEntryDto, isArray: true })
  logs!: ActivityLogEntryDto[];
}
