import { QueryHandler, type IQueryHandler } from "@nestjs/cqrs";
import type { SessionSnapshot } from "@foundry-console/types";
import { SessionStore } from "../session.store";
import { GetSessionQuery } from "./get-session.query";

@QueryHandler(GetSessionQuery)
export class GetSessionHandler implements IQueryHandler<GetSessionQuery, SessionSnapshot> {
  constructor(private readonly store: SessionStore) {}

  async execute({ session }: GetSessionQuery): Promise<SessionSnapshot> {
    return this.store.snapshot(session);
  }
}
