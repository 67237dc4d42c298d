import type { IQuery } from "@nestjs/cqrs";
import type { SessionState } from "../session.types";

export class GetSessionQuery implements IQuery {
  constructor(public readonly session: SessionState) {}
}
