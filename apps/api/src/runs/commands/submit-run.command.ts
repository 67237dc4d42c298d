import type { ICommand } from "@nestjs/cqrs";
import type { SubmitRunRequest } from "@foundry-console/types";
import type { SessionState } from "../../sessions/session.types";

export class SubmitRunCommand implements ICommand {
  constructor(
    public readonly session: SessionState,
    public readonly request: SubmitRunRequest,
    public readonly signal?: AbortSignal,
  ) {}
}
