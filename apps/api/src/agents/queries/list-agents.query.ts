import type { IQuery } from "@nestjs/cqrs";
import type { SessionState } from "../../sessions/session.types";

export class ListAgentsQuery implements IQuery {
  constructor(
    public readonly session: SessionState,
    public readonly refresh: boolean = false,
  ) {}
}
