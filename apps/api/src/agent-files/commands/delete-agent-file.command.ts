import type { ICommand } from "@nestjs/cqrs";
import type { SessionState } from "../../sessions/session.types";

export class DeleteAgentFileCommand implements ICommand {
  constructor(
    public readonly session: SessionState,
    public readonly agentId: string,
    public readonly fileId: string,
  ) {}
}
