import type { ICommand } from "@nestjs/cqrs";
import type { SessionState } from "../../sessions/session.types";

export class CreateThreadCommand implements ICommand {
  constructor(public readonly session: SessionState) {}
}
